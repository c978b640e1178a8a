import { Cocktail } from '@domain/entities';
import { CocktailId, CocktailSummary } from '@domain/value-objects';

/**
 * Read-only access to the cocktail recipe database.
 *
 * Every method performs exactly one upstream request. An empty upstream result
 * resolves to `null` or `[]`; transport failures reject with
 * `CocktailServiceError`. Nothing is retried or cached.
 */
export interface ICocktailCatalogPort {
  /**
   * Fetches one random recipe.
   *
   * @returns the recipe, or null when the API sent none
   */
  getRandom(): Promise<Cocktail | null>;

  /**
   * Searches recipes by (partial) name.
   *
   * @param name - Non-empty search term, e.g. "margarita"
   * @returns matches in the order the API ranked them
   *
   * @example
   * ```typescript
   * const matches = await catalog.searchByName('mojito');
   * // [Mojito, Mojito Extra, ...]
   * ```
   */
  searchByName(name: string): Promise<Cocktail[]>;

  /**
   * Lists drinks containing an ingredient. The API only returns id, name and
   * thumbnail here; use `lookupById` for the full recipe.
   *
   * @param ingredient - Non-empty ingredient name, e.g. "Vodka"
   */
  filterByIngredient(ingredient: string): Promise<CocktailSummary[]>;

  /**
   * Fetches the full recipe for an id taken from an earlier result.
   */
  lookupById(id: CocktailId): Promise<Cocktail | null>;
}
