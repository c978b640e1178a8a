import { Cocktail } from '@domain/entities';
import { CocktailId, CocktailSummary, IngredientPortion } from '@domain/value-objects';
import { InstructionLanguage } from '@infrastructure/config/env.validation';
import { DrinkDetailPayload, DrinkSummaryPayload } from '../schemas';

/**
 * Mapper for converting TheCocktailDB payloads into domain objects.
 */
export class CocktailMapper {
  static readonly INGREDIENT_SLOTS = 15;

  /**
   * Converts a full drink payload to a Cocktail.
   * Instructions use the requested language when the API has them, English otherwise.
   */
  static toDomain(payload: DrinkDetailPayload, language: InstructionLanguage = 'EN'): Cocktail {
    return Cocktail.reconstitute({
      id: CocktailId.fromString(payload.idDrink),
      name: payload.strDrink,
      category: payload.strCategory,
      alcoholic: payload.strAlcoholic,
      glass: payload.strGlass,
      instructions: this.instructionsOf(payload, language),
      imageUrl: payload.strDrinkThumb,
      ingredients: this.ingredientsOf(payload),
    });
  }

  static toSummary(payload: DrinkSummaryPayload): CocktailSummary {
    return CocktailSummary.create({
      id: CocktailId.fromString(payload.idDrink),
      name: payload.strDrink,
      thumbnailUrl: payload.strDrinkThumb,
    });
  }

  /**
   * Collects strIngredientN/strMeasureN pairs in slot order, skipping empty slots.
   */
  private static ingredientsOf(payload: DrinkDetailPayload): IngredientPortion[] {
    const portions: IngredientPortion[] = [];

    for (let slot = 1; slot <= this.INGREDIENT_SLOTS; slot++) {
      const ingredient = textField(payload, `strIngredient${slot}`);
      if (ingredient) {
        portions.push(IngredientPortion.create(ingredient, textField(payload, `strMeasure${slot}`)));
      }
    }

    return portions;
  }

  private static instructionsOf(
    payload: DrinkDetailPayload,
    language: InstructionLanguage,
  ): string | null {
    const localized = language === 'EN' ? null : textField(payload, `strInstructions${language}`);
    return localized ?? payload.strInstructions ?? null;
  }
}

function textField(payload: DrinkDetailPayload, key: string): string | null {
  const value = payload[key];
  return typeof value === 'string' && value.trim().length > 0 ? value : null;
}
