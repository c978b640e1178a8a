export { CocktailDbAdapter, CocktailDbAdapterOptions } from './cocktaildb.adapter';
export { CocktailDbModule } from './cocktaildb.module';
export { CocktailMapper } from './mappers';
export * from './schemas';
