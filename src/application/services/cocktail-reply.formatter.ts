import { Injectable } from '@nestjs/common';
import { ChatReplyDto, ReplyButtonDto } from '@application/dtos';
import { AlcoholKind, Cocktail } from '@domain/entities';
import { CocktailSummary, encodeCallbackAction } from '@domain/value-objects';
import {
  ANOTHER_RANDOM_LABEL,
  HELP_MESSAGE,
  INGREDIENT_USAGE_MESSAGE,
  LOOKUP_EMPTY_MESSAGE,
  RANDOM_EMPTY_MESSAGE,
  SEARCH_USAGE_MESSAGE,
  SERVICE_UNAVAILABLE_MESSAGE,
  START_RANDOM_LABEL,
  UNKNOWN_COMMAND_MESSAGE,
  WELCOME_MESSAGE,
} from './bot-messages';

const ALCOHOL_EMOJI: Record<AlcoholKind, string> = {
  alcoholic: '🍸',
  non_alcoholic: '🥤',
  optional: '🍹',
  unknown: '🍹',
};

/**
 * Turns recipes and lookup outcomes into chat replies.
 *
 * Every method is pure: the same input always yields the same text and the
 * same buttons. Text is Telegram HTML; anything coming from the user or the
 * recipe API is escaped. Button labels are plain text and left as is.
 * Long instructions are not shortened here.
 */
@Injectable()
export class CocktailReplyFormatter {
  // Additional /search matches offered as buttons under the first one
  static readonly MAX_SEARCH_BUTTONS = 5;

  // Telegram allows 100 inline buttons; a long list is unusable well before that
  static readonly MAX_INGREDIENT_BUTTONS = 20;

  /**
   * A full recipe card with the "another random" button last.
   */
  formatCocktail(cocktail: Cocktail, extraButtons: readonly ReplyButtonDto[] = []): ChatReplyDto {
    return {
      text: this.composeCaption(cocktail),
      imageUrl: cocktail.imageUrl,
      buttons: [...extraButtons, this.anotherRandomButton()],
    };
  }

  /**
   * The first match in full, the next few as lookup buttons.
   * Callers handle the empty case with `noSearchResults`.
   */
  formatSearchResults(matches: readonly [Cocktail, ...Cocktail[]]): ChatReplyDto {
    const [first, ...others] = matches;
    const otherButtons = others
      .slice(0, CocktailReplyFormatter.MAX_SEARCH_BUTTONS)
      .map((cocktail) => this.lookupButton(cocktail.name, cocktail));

    return this.formatCocktail(first, otherButtons);
  }

  formatIngredientMatches(ingredient: string, matches: readonly CocktailSummary[]): ChatReplyDto {
    const shown = matches.slice(0, CocktailReplyFormatter.MAX_INGREDIENT_BUTTONS);
    const countLine =
      matches.length === 1 ? 'Found 1 cocktail.' : `Found ${matches.length} cocktails.`;
    const limitNote =
      matches.length > shown.length ? ` Showing the first ${shown.length}.` : '';

    return {
      text: [
        `🍋 <b>Cocktails with ${escapeHtml(ingredient)}</b>`,
        '',
        `${countLine}${limitNote}`,
        'Tap a name to see the full recipe.',
      ].join('\n'),
      imageUrl: null,
      buttons: shown.map((summary) => this.lookupButton(summary.name, summary)),
    };
  }

  composeCaption(cocktail: Cocktail): string {
    const header = `${ALCOHOL_EMOJI[cocktail.alcoholKind()]} <b>${escapeHtml(cocktail.name)}</b>`;

    const details = [
      cocktail.category && `🏷️ <b>Category:</b> ${escapeHtml(cocktail.category)}`,
      cocktail.alcoholic && `🍷 <b>Type:</b> ${escapeHtml(cocktail.alcoholic)}`,
      cocktail.glass && `🥃 <b>Glass:</b> ${escapeHtml(cocktail.glass)}`,
    ].filter(isPresent);

    const ingredients =
      cocktail.ingredients.length > 0
        ? [
            '📋 <b>Ingredients:</b>',
            ...cocktail.ingredients.map((portion) => `• ${escapeHtml(portion.toString())}`),
          ]
        : [];

    const instructions = cocktail.instructions
      ? ['📝 <b>Instructions:</b>', escapeHtml(cocktail.instructions)]
      : [];

    return [header, details, ingredients, instructions]
      .map((block) => (Array.isArray(block) ? block.join('\n') : block))
      .filter((block) => block.length > 0)
      .join('\n\n');
  }

  // ============ Fixed replies ============

  welcome(): ChatReplyDto {
    return this.textReply(WELCOME_MESSAGE, [
      { label: START_RANDOM_LABEL, callbackData: encodeCallbackAction({ kind: 'random' }) },
    ]);
  }

  help(): ChatReplyDto {
    return this.textReply(HELP_MESSAGE);
  }

  usage(command: 'search' | 'ingredient'): ChatReplyDto {
    return this.textReply(command === 'search' ? SEARCH_USAGE_MESSAGE : INGREDIENT_USAGE_MESSAGE);
  }

  noSearchResults(query: string): ChatReplyDto {
    return this.textReply(
      `😔 No cocktails found for “${escapeHtml(query)}”.\n\nTry another name, or /random for a surprise.`,
    );
  }

  noIngredientResults(ingredient: string): ChatReplyDto {
    return this.textReply(
      `😔 No cocktails found with “${escapeHtml(ingredient)}”.\n\nCheck the spelling, e.g. /ingredient gin`,
    );
  }

  randomUnavailable(): ChatReplyDto {
    return this.textReply(RANDOM_EMPTY_MESSAGE, [this.anotherRandomButton()]);
  }

  lookupUnavailable(): ChatReplyDto {
    return this.textReply(LOOKUP_EMPTY_MESSAGE);
  }

  unknownCommand(): ChatReplyDto {
    return this.textReply(UNKNOWN_COMMAND_MESSAGE, [
      { label: START_RANDOM_LABEL, callbackData: encodeCallbackAction({ kind: 'random' }) },
    ]);
  }

  serviceUnavailable(): ChatReplyDto {
    return this.textReply(SERVICE_UNAVAILABLE_MESSAGE);
  }

  // ============ Private Helper Methods ============

  private textReply(text: string, buttons: ReplyButtonDto[] = []): ChatReplyDto {
    return { text, imageUrl: null, buttons };
  }

  private anotherRandomButton(): ReplyButtonDto {
    return { label: ANOTHER_RANDOM_LABEL, callbackData: encodeCallbackAction({ kind: 'random' }) };
  }

  private lookupButton(label: string, target: Cocktail | CocktailSummary): ReplyButtonDto {
    return {
      label,
      callbackData: encodeCallbackAction({ kind: 'lookup', cocktailId: target.id }),
    };
  }
}

/**
 * Escapes the characters Telegram's HTML parse mode treats as markup.
 */
export function escapeHtml(text: string): string {
  const htmlEntities: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
  };

  return text.replace(/[&<>]/g, (char) => htmlEntities[char] ?? char);
}

function isPresent(value: string | null | false): value is string {
  return typeof value === 'string' && value.length > 0;
}
