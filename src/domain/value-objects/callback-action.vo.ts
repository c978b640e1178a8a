import { CocktailId } from './cocktail-id.vo';

/**
 * Intent carried by an inline button.
 *
 * Telegram hands back only the button's callback data, so everything the
 * follow-up needs lives in that string: the literal "random", or a cocktail id.
 */
export type CallbackAction =
  | { readonly kind: 'random' }
  | { readonly kind: 'lookup'; readonly cocktailId: CocktailId };

export const RANDOM_CALLBACK_DATA = 'random';

export function encodeCallbackAction(action: CallbackAction): string {
  switch (action.kind) {
    case 'random':
      return RANDOM_CALLBACK_DATA;
    case 'lookup':
      return action.cocktailId.toString();
  }
}

/**
 * Returns null for blank callback data.
 */
export function parseCallbackAction(data: string): CallbackAction | null {
  const trimmed = data.trim();
  if (trimmed.length === 0) {
    return null;
  }
  if (trimmed === RANDOM_CALLBACK_DATA) {
    return { kind: 'random' };
  }
  return { kind: 'lookup', cocktailId: CocktailId.fromString(trimmed) };
}
