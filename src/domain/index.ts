/**
 * DOMAIN LAYER
 *
 * Recipe records and the closed sets of commands and button intents the bot
 * understands. No framework, network or Telegram types belong here.
 *
 * Contains:
 * - Entities: Cocktail
 * - Value Objects: CocktailId, IngredientPortion, CocktailSummary, ChatCommand, CallbackAction
 * - Exceptions: DomainException, InvalidValueException
 *
 * Rules:
 * - NO imports from application or infrastructure layers
 */

export * from './entities';
export * from './value-objects';
export * from './exceptions';
