export { ICocktailCatalogPort } from './cocktail-catalog.port';
