export { ChatReplyDto, ReplyButtonDto, UpdateContextDto } from './chat-reply.dto';
