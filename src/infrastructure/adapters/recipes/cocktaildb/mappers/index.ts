export { CocktailMapper } from './cocktail.mapper';
