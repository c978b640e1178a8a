export {
  ApplicationError,
  CocktailNotFoundError,
  CocktailServiceError,
  UsageError,
  UnexpectedError,
  CocktailLookupError,
  CommandError,
} from './application.errors';
