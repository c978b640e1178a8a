import { InvalidValueException } from '../exceptions';

/**
 * Value Object wrapping the identifier the recipe API assigns to a drink.
 * The value is opaque: it is only ever echoed back to the lookup endpoint.
 */
export class CocktailId {
  private constructor(public readonly value: string) {
    this.validate();
  }

  static fromString(id: string): CocktailId {
    return new CocktailId(id.trim());
  }

  private validate(): void {
    if (this.value.length === 0) {
      throw new InvalidValueException('CocktailId', 'cannot be empty');
    }
  }

  toString(): string {
    return this.value;
  }
}
