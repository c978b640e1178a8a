import { InvalidValueException } from '../exceptions';
import { CocktailId } from './cocktail-id.vo';

/**
 * Partial match returned by the ingredient filter.
 *
 * The recipe API only sends id, name and thumbnail for filter queries, so a
 * summary is never shown as a recipe: its id must go through a full lookup first.
 */
export class CocktailSummary {
  private constructor(
    public readonly id: CocktailId,
    public readonly name: string,
    public readonly thumbnailUrl: string | null,
  ) {
    this.validate();
  }

  static create(props: { id: CocktailId; name: string; thumbnailUrl?: string | null }): CocktailSummary {
    return new CocktailSummary(props.id, props.name.trim(), props.thumbnailUrl ?? null);
  }

  private validate(): void {
    if (this.name.length === 0) {
      throw new InvalidValueException('CocktailSummary', 'name cannot be empty');
    }
  }
}
