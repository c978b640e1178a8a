import { Inject, Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { Context, Telegraf } from 'telegraf';
import { UpdateContextDto } from '@application/dtos';
import { SERVICE_UNAVAILABLE_MESSAGE } from '@application/services';
import { TELEGRAF_BOT } from './telegram.constants';
import { TelegramUpdateHandler } from './telegram-update.handler';

interface UpdateSource {
  readonly chat?: { readonly id: number };
  readonly from?: { readonly id: number; readonly username?: string };
}

/**
 * Owns the telegraf instance's lifecycle: routes updates to the
 * TelegramUpdateHandler, runs long polling and stops it on shutdown.
 *
 * telegraf runs one middleware chain per update, so updates from different
 * chats are handled independently and may complete in any order.
 */
@Injectable()
export class TelegramBotService implements OnApplicationShutdown {
  private readonly logger = new Logger(TelegramBotService.name);
  private polling = false;

  constructor(
    @Inject(TELEGRAF_BOT)
    private readonly bot: Telegraf,
    private readonly updateHandler: TelegramUpdateHandler,
  ) {}

  /**
   * Registers the update handlers and polls until the bot is stopped.
   *
   * Rejects when polling cannot start or breaks off (invalid token, another
   * instance polling with the same token, network failure); the caller
   * treats that as fatal.
   */
  async start(): Promise<void> {
    this.registerHandlers();

    try {
      await this.bot.launch({ allowedUpdates: ['message', 'callback_query'] }, () => {
        this.polling = true;
        this.logger.log(`Bot @${this.bot.botInfo?.username ?? 'unknown'} is polling for updates`);
      });
    } catch (error) {
      this.logger.error(`Polling failed: ${describe(error)}`);
      throw error;
    } finally {
      this.polling = false;
    }
  }

  onApplicationShutdown(signal?: string): void {
    // Nothing to stop until telegraf reports that polling has begun
    if (!this.polling) {
      return;
    }
    this.polling = false;
    this.logger.log(`Stopping bot (${signal ?? 'shutdown'})`);
    this.bot.stop(signal ?? 'shutdown');
  }

  registerHandlers(): void {
    this.bot.on('message', async (ctx) => {
      if (!('text' in ctx.message)) {
        return;
      }

      await this.updateHandler.handleText(ctx.message.text, contextOf(ctx), {
        sendText: (text, options) => ctx.reply(text, options),
        sendPhoto: (photoUrl, options) => ctx.replyWithPhoto(photoUrl, options),
        showTyping: () => ctx.sendChatAction('typing'),
      });
    });

    this.bot.on('callback_query', async (ctx) => {
      const data = 'data' in ctx.callbackQuery ? ctx.callbackQuery.data : '';

      await this.updateHandler.handleCallback(data, contextOf(ctx), {
        sendText: (text, options) => ctx.reply(text, options),
        sendPhoto: (photoUrl, options) => ctx.replyWithPhoto(photoUrl, options),
        showTyping: () => ctx.sendChatAction('typing'),
        acknowledge: () => ctx.answerCbQuery(),
      });
    });

    // Last resort for anything the handlers let through
    this.bot.catch(async (error: unknown, ctx: Context) => {
      this.logger.error(`Unhandled error in update ${ctx.update.update_id}: ${describe(error)}`);
      if (!ctx.chat) {
        return;
      }
      try {
        await ctx.reply(SERVICE_UNAVAILABLE_MESSAGE);
      } catch (replyError) {
        this.logger.error(`Could not notify chat ${ctx.chat.id}: ${describe(replyError)}`);
      }
    });
  }
}

function contextOf(source: UpdateSource): UpdateContextDto {
  return {
    chatId: source.chat?.id ?? null,
    userId: source.from?.id ?? null,
    username: source.from?.username,
  };
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
