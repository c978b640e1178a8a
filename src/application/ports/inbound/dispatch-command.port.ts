import { ChatReplyDto, UpdateContextDto } from '@application/dtos';
import { CallbackAction, ChatCommand } from '@domain/value-objects';

export interface IDispatchCommandPort {
  /**
   * Answers a chat command. Never rejects: failures become an error reply.
   */
  handleCommand(command: ChatCommand, context: UpdateContextDto): Promise<ChatReplyDto>;

  /**
   * Answers an inline button press. Never rejects.
   */
  handleCallback(action: CallbackAction, context: UpdateContextDto): Promise<ChatReplyDto>;
}
