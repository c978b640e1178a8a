import { CocktailId, IngredientPortion } from '../value-objects';
import { InvalidValueException } from '../exceptions';

export type AlcoholKind = 'alcoholic' | 'non_alcoholic' | 'optional' | 'unknown';

/**
 * Entity representing a full cocktail recipe as fetched from the recipe API.
 * Created per response and never persisted.
 */
export class Cocktail {
  private constructor(
    public readonly id: CocktailId,
    public readonly name: string,
    public readonly category: string | null,
    public readonly alcoholic: string | null,
    public readonly glass: string | null,
    public readonly instructions: string | null,
    public readonly imageUrl: string | null,
    public readonly ingredients: readonly IngredientPortion[],
  ) {
    this.validate();
  }

  // Factory method: rebuild from an API payload
  static reconstitute(props: {
    id: CocktailId;
    name: string;
    category?: string | null;
    alcoholic?: string | null;
    glass?: string | null;
    instructions?: string | null;
    imageUrl?: string | null;
    ingredients?: IngredientPortion[];
  }): Cocktail {
    return new Cocktail(
      props.id,
      props.name.trim(),
      blankToNull(props.category),
      blankToNull(props.alcoholic),
      blankToNull(props.glass),
      blankToNull(props.instructions),
      blankToNull(props.imageUrl),
      Object.freeze([...(props.ingredients ?? [])]),
    );
  }

  private validate(): void {
    if (this.name.length === 0) {
      throw new InvalidValueException('Cocktail', 'name cannot be empty');
    }
  }

  alcoholKind(): AlcoholKind {
    switch (this.alcoholic?.toLowerCase()) {
      case 'alcoholic':
        return 'alcoholic';
      case 'non alcoholic':
        return 'non_alcoholic';
      case 'optional alcohol':
        return 'optional';
      default:
        return 'unknown';
    }
  }

}

function blankToNull(value: string | null | undefined): string | null {
  const trimmed = value?.trim() ?? '';
  return trimmed.length > 0 ? trimmed : null;
}
