import { Injectable, Logger } from '@nestjs/common';
import { Markup } from 'telegraf';
import { ChatReplyDto, ReplyButtonDto } from '@application/dtos';
import { MAX_CAPTION_LENGTH, MAX_MESSAGE_LENGTH } from './telegram.constants';

export type InlineKeyboard = ReturnType<typeof Markup.inlineKeyboard>['reply_markup'];

export interface TextReplyOptions {
  parse_mode?: 'HTML';
  reply_markup?: InlineKeyboard;
}

export interface PhotoReplyOptions {
  caption?: string;
  parse_mode?: 'HTML';
  reply_markup?: InlineKeyboard;
}

/**
 * Where a reply goes: the chat an update came from.
 * The bot service backs this with the telegraf context of the update.
 */
export interface ReplyChannel {
  sendText(text: string, options: TextReplyOptions): Promise<unknown>;
  sendPhoto(photoUrl: string, options: PhotoReplyOptions): Promise<unknown>;
  /** Shows "typing…" in the chat while a slow reply is prepared. */
  showTyping(): Promise<unknown>;
}

export interface CallbackReplyChannel extends ReplyChannel {
  /** Answers the callback query so the client stops its loading indicator. */
  acknowledge(): Promise<unknown>;
}

/**
 * Delivers ChatReplyDto payloads through the Bot API.
 *
 * A reply with an image goes out as a photo with the text as caption. Captions
 * over Telegram's limit are sent as a bare photo followed by a text message, and
 * a photo that Telegram refuses falls back to text only. Text over the message
 * limit goes out shortened and without markup, since a cut can land inside a
 * tag or an entity.
 */
@Injectable()
export class TelegramReplySender {
  private readonly logger = new Logger(TelegramReplySender.name);

  async send(channel: ReplyChannel, reply: ChatReplyDto): Promise<void> {
    const keyboard = this.keyboardFor(reply.buttons);

    if (reply.imageUrl) {
      const delivered = await this.trySendPhoto(channel, reply.imageUrl, reply.text, keyboard);
      if (delivered) {
        return;
      }
    }

    if (reply.text.length <= MAX_MESSAGE_LENGTH) {
      await channel.sendText(reply.text, { parse_mode: 'HTML', reply_markup: keyboard });
      return;
    }

    await channel.sendText(truncate(stripHtml(reply.text), MAX_MESSAGE_LENGTH), {
      reply_markup: keyboard,
    });
  }

  /**
   * Returns true when the text went out as the caption, false when it still
   * has to be sent as a message.
   */
  private async trySendPhoto(
    channel: ReplyChannel,
    imageUrl: string,
    text: string,
    keyboard: InlineKeyboard | undefined,
  ): Promise<boolean> {
    try {
      if (text.length <= MAX_CAPTION_LENGTH) {
        await channel.sendPhoto(imageUrl, {
          caption: text,
          parse_mode: 'HTML',
          reply_markup: keyboard,
        });
        return true;
      }

      await channel.sendPhoto(imageUrl, {});
      return false;
    } catch (error) {
      this.logger.warn(
        `Could not send photo ${imageUrl}, falling back to text: ${
          error instanceof Error ? error.message : 'Unknown error'
        }`,
      );
      return false;
    }
  }

  // One button per row, in reply order
  private keyboardFor(buttons: readonly ReplyButtonDto[]): InlineKeyboard | undefined {
    if (buttons.length === 0) {
      return undefined;
    }
    return Markup.inlineKeyboard(
      buttons.map((button) => [Markup.button.callback(button.label, button.callbackData)]),
    ).reply_markup;
  }
}

// Reverses escapeHtml and drops tags, leaving the text a user would see
function stripHtml(html: string): string {
  return html
    .replace(/<[^>]*>/g, '')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&amp;/g, '&');
}

function truncate(text: string, limit: number): string {
  if (text.length <= limit) {
    return text;
  }

  let cut = text.slice(0, limit - 1);
  // Never end on the first half of a surrogate pair
  if (/[\uD800-\uDBFF]$/.test(cut)) {
    cut = cut.slice(0, -1);
  }
  return `${cut}…`;
}
