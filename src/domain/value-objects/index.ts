export { CocktailId } from './cocktail-id.vo';
export { IngredientPortion } from './ingredient-portion.vo';
export { CocktailSummary } from './cocktail-summary.vo';
export { ChatCommand, parseChatCommand } from './chat-command.vo';
export {
  CallbackAction,
  RANDOM_CALLBACK_DATA,
  encodeCallbackAction,
  parseCallbackAction,
} from './callback-action.vo';
