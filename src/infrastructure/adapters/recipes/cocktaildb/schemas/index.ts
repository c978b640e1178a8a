export {
  drinksEnvelopeSchema,
  drinkDetailSchema,
  drinkSummarySchema,
  DrinkDetailPayload,
  DrinkSummaryPayload,
} from './cocktaildb.schemas';
