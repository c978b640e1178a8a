import { CocktailReplyFormatter, escapeHtml } from '@application/services';
import { Cocktail } from '@domain/entities';
import { CocktailId, CocktailSummary, IngredientPortion } from '@domain/value-objects';

describe('CocktailReplyFormatter', () => {
  let formatter: CocktailReplyFormatter;

  const margarita = (): Cocktail =>
    Cocktail.reconstitute({
      id: CocktailId.fromString('11007'),
      name: 'Margarita',
      category: 'Cocktail',
      instructions: 'Shake and strain.',
      imageUrl: 'https://img.test/margarita.jpg',
      ingredients: [
        IngredientPortion.create('Tequila', '1.5 oz'),
        IngredientPortion.create('Lime', '1 oz'),
      ],
    });

  const createCocktail = (id: string, name: string): Cocktail =>
    Cocktail.reconstitute({ id: CocktailId.fromString(id), name });

  const createSummary = (id: string, name: string): CocktailSummary =>
    CocktailSummary.create({ id: CocktailId.fromString(id), name });

  beforeEach(() => {
    formatter = new CocktailReplyFormatter();
  });

  describe('composeCaption', () => {
    it('should list name, category, ingredients and instructions', () => {
      expect(formatter.composeCaption(margarita())).toBe(
        [
          '🍹 <b>Margarita</b>',
          '',
          '🏷️ <b>Category:</b> Cocktail',
          '',
          '📋 <b>Ingredients:</b>',
          '• Tequila — 1.5 oz',
          '• Lime — 1 oz',
          '',
          '📝 <b>Instructions:</b>',
          'Shake and strain.',
        ].join('\n'),
      );
    });

    it('should include type and glass, and omit absent measures', () => {
      const cocktail = Cocktail.reconstitute({
        id: CocktailId.fromString('11008'),
        name: 'Salty Margarita',
        category: 'Ordinary Drink',
        alcoholic: 'Alcoholic',
        glass: 'Cocktail glass',
        instructions: 'Rub the rim with salt.',
        ingredients: [
          IngredientPortion.create('Tequila', '1.5 oz'),
          IngredientPortion.create('Salt', null),
        ],
      });

      expect(formatter.composeCaption(cocktail)).toBe(
        [
          '🍸 <b>Salty Margarita</b>',
          '',
          '🏷️ <b>Category:</b> Ordinary Drink',
          '🍷 <b>Type:</b> Alcoholic',
          '🥃 <b>Glass:</b> Cocktail glass',
          '',
          '📋 <b>Ingredients:</b>',
          '• Tequila — 1.5 oz',
          '• Salt',
          '',
          '📝 <b>Instructions:</b>',
          'Rub the rim with salt.',
        ].join('\n'),
      );
    });

    it('should omit every missing block instead of printing null', () => {
      const caption = formatter.composeCaption(
        Cocktail.reconstitute({
          id: CocktailId.fromString('1'),
          name: 'Virgin Mary',
          alcoholic: 'Non alcoholic',
        }),
      );

      expect(caption).toBe('🥤 <b>Virgin Mary</b>\n\n🍷 <b>Type:</b> Non alcoholic');
    });

    it('should escape HTML in values from the API', () => {
      const caption = formatter.composeCaption(createCocktail('2', 'Rum & <Coke>'));

      expect(caption).toBe('🍹 <b>Rum &amp; &lt;Coke&gt;</b>');
    });

    it('should not shorten long instructions', () => {
      const instructions = 'Stir. '.repeat(500).trim();
      const caption = formatter.composeCaption(
        Cocktail.reconstitute({ id: CocktailId.fromString('3'), name: 'Long', instructions }),
      );

      expect(caption.endsWith(instructions)).toBe(true);
    });
  });

  describe('formatCocktail', () => {
    it('should attach the image and the another-random button', () => {
      const reply = formatter.formatCocktail(margarita());

      expect(reply.imageUrl).toBe('https://img.test/margarita.jpg');
      expect(reply.buttons).toEqual([{ label: '🔀 Another random', callbackData: 'random' }]);
    });

    it('should be pure: the same cocktail gives an identical reply', () => {
      const cocktail = margarita();

      expect(formatter.formatCocktail(cocktail)).toEqual(formatter.formatCocktail(cocktail));
      expect(formatter.formatCocktail(cocktail).text).toBe(formatter.formatCocktail(margarita()).text);
    });
  });

  describe('formatSearchResults', () => {
    it('should show the first match and offer the others as buttons in order', () => {
      const reply = formatter.formatSearchResults([
        createCocktail('1', 'Mojito'),
        createCocktail('2', 'Mojito Extra'),
        createCocktail('3', 'Dirty Mojito'),
      ]);

      expect(reply.text).toBe('🍹 <b>Mojito</b>');
      expect(reply.buttons).toEqual([
        { label: 'Mojito Extra', callbackData: '2' },
        { label: 'Dirty Mojito', callbackData: '3' },
        { label: '🔀 Another random', callbackData: 'random' },
      ]);
    });

    it('should offer at most five additional matches', () => {
      const matches = Array.from({ length: 9 }, (_, index) =>
        createCocktail(String(index + 1), `Drink ${index + 1}`),
      );

      const reply = formatter.formatSearchResults([matches[0], ...matches.slice(1)]);

      expect(reply.buttons.map((button) => button.callbackData)).toEqual([
        '2',
        '3',
        '4',
        '5',
        '6',
        'random',
      ]);
    });
  });

  describe('formatIngredientMatches', () => {
    it('should create one lookup button per match in API order', () => {
      const reply = formatter.formatIngredientMatches('Vodka', [
        createSummary('1', 'Screwdriver'),
        createSummary('2', 'Moscow Mule'),
      ]);

      expect(reply.text).toBe(
        '🍋 <b>Cocktails with Vodka</b>\n\nFound 2 cocktails.\nTap a name to see the full recipe.',
      );
      expect(reply.imageUrl).toBeNull();
      expect(reply.buttons).toEqual([
        { label: 'Screwdriver', callbackData: '1' },
        { label: 'Moscow Mule', callbackData: '2' },
      ]);
    });

    it('should cap the list and say so', () => {
      const matches = Array.from({ length: 25 }, (_, index) =>
        createSummary(String(index + 1), `Drink ${index + 1}`),
      );

      const reply = formatter.formatIngredientMatches('Gin', matches);

      expect(reply.buttons).toHaveLength(20);
      expect(reply.buttons[19]).toEqual({ label: 'Drink 20', callbackData: '20' });
      expect(reply.text).toContain('Found 25 cocktails. Showing the first 20.');
    });

    it('should use the singular for one match', () => {
      const reply = formatter.formatIngredientMatches('Absinthe', [createSummary('9', 'Green Fairy')]);

      expect(reply.text).toContain('Found 1 cocktail.\n');
    });
  });

  describe('fixed replies', () => {
    it('should echo the escaped query in the no-results reply without buttons', () => {
      const reply = formatter.noSearchResults('<Mojito>');

      expect(reply).toEqual({
        text: '😔 No cocktails found for “&lt;Mojito&gt;”.\n\nTry another name, or /random for a surprise.',
        imageUrl: null,
        buttons: [],
      });
    });

    it('should offer a random cocktail from the welcome message', () => {
      const reply = formatter.welcome();

      expect(reply.text).toContain('/search &lt;name&gt;');
      expect(reply.buttons).toEqual([{ label: '🎲 Random cocktail', callbackData: 'random' }]);
    });

    it('should pick the usage hint for the command', () => {
      expect(formatter.usage('search').text).toContain('<code>/search mojito</code>');
      expect(formatter.usage('ingredient').text).toContain('<code>/ingredient gin</code>');
    });

    it('should never include error details in the service-unavailable reply', () => {
      expect(formatter.serviceUnavailable()).toEqual({
        text: '❌ The cocktail service is temporarily unavailable. Please try again in a moment.',
        imageUrl: null,
        buttons: [],
      });
    });
  });

  describe('escapeHtml', () => {
    it('should escape ampersands and angle brackets only', () => {
      expect(escapeHtml(`Tom & Jerry's <b>"mix"</b>`)).toBe(
        `Tom &amp; Jerry's &lt;b&gt;"mix"&lt;/b&gt;`,
      );
    });
  });
});
