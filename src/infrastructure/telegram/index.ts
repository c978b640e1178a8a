export { TelegramModule } from './telegram.module';
export { TelegramBotService } from './telegram-bot.service';
export { TelegramUpdateHandler } from './telegram-update.handler';
export {
  TelegramReplySender,
  ReplyChannel,
  CallbackReplyChannel,
  TextReplyOptions,
  PhotoReplyOptions,
  InlineKeyboard,
} from './telegram-reply.sender';
export { TELEGRAF_BOT, MAX_CAPTION_LENGTH, MAX_MESSAGE_LENGTH } from './telegram.constants';
