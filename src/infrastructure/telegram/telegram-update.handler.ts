import { Inject, Injectable, Logger } from '@nestjs/common';
import { ChatReplyDto, UpdateContextDto } from '@application/dtos';
import { IDispatchCommandPort } from '@application/ports/inbound';
import { ChatCommand, parseCallbackAction, parseChatCommand } from '@domain/value-objects';
import { AppLoggerService } from '@infrastructure/observability';
import { CallbackReplyChannel, ReplyChannel, TelegramReplySender } from './telegram-reply.sender';

/**
 * Turns raw Telegram input (message text, callback data) into dispatcher
 * calls and delivers the replies.
 *
 * Each update is handled on its own; nothing here is shared between them.
 */
@Injectable()
export class TelegramUpdateHandler {
  private readonly logger = new Logger(TelegramUpdateHandler.name);

  constructor(
    @Inject('IDispatchCommand')
    private readonly dispatcher: IDispatchCommandPort,
    private readonly replySender: TelegramReplySender,
    private readonly appLogger: AppLoggerService,
  ) {}

  /**
   * Answers a text message. Messages that are not commands are ignored.
   */
  async handleText(text: string, context: UpdateContextDto, channel: ReplyChannel): Promise<void> {
    const command = parseChatCommand(text);
    if (!command) {
      return;
    }

    const startedAt = Date.now();
    if (queriesCatalog(command)) {
      await this.showTyping(channel);
    }
    const reply = await this.dispatcher.handleCommand(command, context);
    await this.deliver(reply, channel, {
      kind: 'command',
      name: command.kind === 'unknown' ? `/${command.name}` : `/${command.kind}`,
      context,
      startedAt,
    });
  }

  /**
   * Answers an inline button press. The callback query is acknowledged first
   * so the client stops its loading indicator even if the lookup is slow.
   */
  async handleCallback(
    data: string,
    context: UpdateContextDto,
    channel: CallbackReplyChannel,
  ): Promise<void> {
    const startedAt = Date.now();

    try {
      await channel.acknowledge();
    } catch (error) {
      this.logger.warn(`Could not answer callback query: ${describe(error)}`);
    }

    const action = parseCallbackAction(data);
    if (!action) {
      this.logger.warn(`Ignoring callback with empty data from user ${context.userId ?? 'unknown'}`);
      return;
    }

    await this.showTyping(channel);
    const reply = await this.dispatcher.handleCallback(action, context);
    await this.deliver(reply, channel, {
      kind: 'callback',
      name: action.kind === 'lookup' ? `lookup:${action.cocktailId.toString()}` : 'random',
      context,
      startedAt,
    });
  }

  // Cosmetic: a failed chat action never blocks the reply
  private async showTyping(channel: ReplyChannel): Promise<void> {
    try {
      await channel.showTyping();
    } catch (error) {
      this.logger.warn(`Could not send typing action: ${describe(error)}`);
    }
  }

  private async deliver(
    reply: ChatReplyDto,
    channel: ReplyChannel,
    update: {
      kind: 'command' | 'callback';
      name: string;
      context: UpdateContextDto;
      startedAt: number;
    },
  ): Promise<void> {
    const logEntry = {
      kind: update.kind,
      name: update.name,
      chatId: update.context.chatId,
      userId: update.context.userId,
    };

    try {
      await this.replySender.send(channel, reply);
      this.appLogger.logUpdate({
        ...logEntry,
        durationMs: Date.now() - update.startedAt,
        delivered: true,
      });
    } catch (error) {
      this.appLogger.logUpdate({
        ...logEntry,
        durationMs: Date.now() - update.startedAt,
        delivered: false,
        error: describe(error),
      });
    }
  }
}

// Commands that wait on the recipe API; usage hints and static texts are instant
function queriesCatalog(command: ChatCommand): boolean {
  switch (command.kind) {
    case 'random':
      return true;
    case 'search':
      return command.query !== null;
    case 'ingredient':
      return command.ingredient !== null;
    default:
      return false;
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
