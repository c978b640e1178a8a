export const TELEGRAF_BOT = 'TELEGRAF_BOT';

// Bot API limits
export const MAX_CAPTION_LENGTH = 1024;
export const MAX_MESSAGE_LENGTH = 4096;
