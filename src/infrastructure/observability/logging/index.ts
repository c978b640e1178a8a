export { LoggerModule } from './logger.module';
export { AppLoggerService, RecipeApiOperation } from './app-logger.service';
