/**
 * Commands the bot understands, parsed from the text of an incoming message.
 *
 * The union is closed: every consumer switches over `kind` and the compiler
 * flags a variant that is not handled.
 */
export type ChatCommand =
  | { readonly kind: 'start' }
  | { readonly kind: 'help' }
  | { readonly kind: 'random' }
  | { readonly kind: 'search'; readonly query: string | null }
  | { readonly kind: 'ingredient'; readonly ingredient: string | null }
  | { readonly kind: 'unknown'; readonly name: string };

// "/search@CocktailBot  blue  lagoon" -> name "search", argument "blue  lagoon"
const COMMAND_PATTERN = /^\/([A-Za-z0-9_]+)(?:@[A-Za-z0-9_]+)?(?:\s+([\s\S]*))?$/;

/**
 * Parses message text into a command.
 * Returns null when the text is not a command at all.
 */
export function parseChatCommand(text: string): ChatCommand | null {
  const match = COMMAND_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }

  const name = match[1].toLowerCase();
  const argument = normalizeArgument(match[2]);

  switch (name) {
    case 'start':
      return { kind: 'start' };
    case 'help':
      return { kind: 'help' };
    case 'random':
      return { kind: 'random' };
    case 'search':
      return { kind: 'search', query: argument };
    case 'ingredient':
      return { kind: 'ingredient', ingredient: argument };
    default:
      return { kind: 'unknown', name };
  }
}

function normalizeArgument(raw: string | undefined): string | null {
  const collapsed = (raw ?? '').split(/\s+/).filter(Boolean).join(' ');
  return collapsed.length > 0 ? collapsed : null;
}
