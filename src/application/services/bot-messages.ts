// Static texts in Telegram HTML. Literal angle brackets must stay escaped.

export const ANOTHER_RANDOM_LABEL = '🔀 Another random';
export const START_RANDOM_LABEL = '🎲 Random cocktail';

export const WELCOME_MESSAGE = [
  '🍹 <b>Welcome to Cocktail Bot!</b>',
  '',
  'I look up cocktail recipes for you.',
  '',
  '<b>Commands:</b>',
  '🎲 /random — a random cocktail',
  '🔍 /search &lt;name&gt; — find cocktails by name',
  '🍋 /ingredient &lt;ingredient&gt; — cocktails made with an ingredient',
  '❓ /help — how to use the bot',
  '',
  'Tap the button below to start.',
].join('\n');

export const HELP_MESSAGE = [
  '🍹 <b>Cocktail Bot — Help</b>',
  '',
  '🎲 /random',
  'A random cocktail with photo and recipe.',
  '',
  '🔍 /search &lt;name&gt;',
  'Find cocktails by name. The best match is shown in full, other matches as buttons.',
  '<i>Example:</i> <code>/search margarita</code>',
  '',
  '🍋 /ingredient &lt;ingredient&gt;',
  'List cocktails made with an ingredient. Tap one to open the recipe.',
  '<i>Example:</i> <code>/ingredient vodka</code>',
  '',
  '💡 English names give the best results.',
].join('\n');

export const SEARCH_USAGE_MESSAGE = [
  '🔍 <b>Search by name</b>',
  '',
  'Add a cocktail name after the command.',
  '<i>Example:</i> <code>/search mojito</code>',
].join('\n');

export const INGREDIENT_USAGE_MESSAGE = [
  '🍋 <b>Search by ingredient</b>',
  '',
  'Add an ingredient after the command.',
  '<i>Example:</i> <code>/ingredient gin</code>',
].join('\n');

export const SERVICE_UNAVAILABLE_MESSAGE =
  '❌ The cocktail service is temporarily unavailable. Please try again in a moment.';

export const RANDOM_EMPTY_MESSAGE = '😔 No cocktail came back this time. Try again?';

export const LOOKUP_EMPTY_MESSAGE = '😔 That cocktail is no longer available. Try /random instead.';

export const UNKNOWN_COMMAND_MESSAGE = '🤔 I don\'t know that command.\n\nUse /help to see what I can do.';
