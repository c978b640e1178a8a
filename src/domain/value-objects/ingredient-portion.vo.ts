import { InvalidValueException } from '../exceptions';

/**
 * One line of a recipe: an ingredient and, when the recipe gives one, its measure.
 */
export class IngredientPortion {
  private constructor(
    public readonly ingredient: string,
    public readonly measure: string | null,
  ) {
    this.validate();
  }

  static create(ingredient: string, measure?: string | null): IngredientPortion {
    const trimmedMeasure = measure?.trim() ?? '';
    return new IngredientPortion(
      ingredient.trim(),
      trimmedMeasure.length > 0 ? trimmedMeasure : null,
    );
  }

  private validate(): void {
    if (this.ingredient.length === 0) {
      throw new InvalidValueException('IngredientPortion', 'ingredient cannot be empty');
    }
  }

  toString(): string {
    return this.measure ? `${this.ingredient} — ${this.measure}` : this.ingredient;
  }
}
