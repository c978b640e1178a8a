export { CocktailReplyFormatter, escapeHtml } from './cocktail-reply.formatter';
export * from './bot-messages';
