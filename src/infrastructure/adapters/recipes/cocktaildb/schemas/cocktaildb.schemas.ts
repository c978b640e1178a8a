import { z } from 'zod';

// TheCocktailDB sends ids as strings; accept numbers too and normalise.
const drinkIdSchema = z.union([z.string(), z.number()]).transform((id) => String(id));

/**
 * Envelope shared by every endpoint. `drinks` is null (or, for some filter
 * queries, the string "no data found") when nothing matched.
 */
export const drinksEnvelopeSchema = z.object({
  drinks: z.union([z.array(z.unknown()), z.string(), z.null()]).optional(),
});

/**
 * Full drink as returned by random.php, search.php and lookup.php.
 * Ingredient/measure pairs arrive as strIngredient1..15 / strMeasure1..15 and
 * localized instructions as strInstructionsDE etc., so extra keys are kept.
 */
export const drinkDetailSchema = z
  .object({
    idDrink: drinkIdSchema,
    strDrink: z.string().min(1),
    strDrinkThumb: z.string().nullish(),
    strCategory: z.string().nullish(),
    strAlcoholic: z.string().nullish(),
    strGlass: z.string().nullish(),
    strInstructions: z.string().nullish(),
  })
  .catchall(z.unknown());

/**
 * Partial drink as returned by filter.php.
 */
export const drinkSummarySchema = z.object({
  idDrink: drinkIdSchema,
  strDrink: z.string().min(1),
  strDrinkThumb: z.string().nullish(),
});

export type DrinkDetailPayload = z.infer<typeof drinkDetailSchema>;
export type DrinkSummaryPayload = z.infer<typeof drinkSummarySchema>;
