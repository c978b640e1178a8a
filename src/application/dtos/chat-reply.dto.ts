/**
 * DTOs exchanged between the dispatcher and the chat transport.
 */

/**
 * An inline button. `callbackData` comes back verbatim when the button is pressed.
 */
export interface ReplyButtonDto {
  readonly label: string;
  readonly callbackData: string;
}

/**
 * A message ready for delivery: Telegram HTML text, an optional image
 * (sent as a photo with the text as caption) and buttons in display order.
 */
export interface ChatReplyDto {
  readonly text: string;
  readonly imageUrl: string | null;
  readonly buttons: readonly ReplyButtonDto[];
}

/**
 * Who sent the update. Used for logging only.
 */
export interface UpdateContextDto {
  readonly chatId: number | null;
  readonly userId: number | null;
  readonly username?: string;
}
