import { Module } from '@nestjs/common';
import { ICocktailCatalogPort } from '@application/ports/outbound';
import { EnvConfigService } from '@infrastructure/config/env-config.service';
import { AppLoggerService } from '@infrastructure/observability';
import { CocktailDbAdapter } from './cocktaildb.adapter';

/**
 * Module that provides the cocktail catalog backed by TheCocktailDB.
 *
 * One adapter instance is built at startup and shared by every update.
 */
@Module({
  providers: [
    {
      provide: 'ICocktailCatalog',
      useFactory: (
        envConfig: EnvConfigService,
        appLogger: AppLoggerService,
      ): ICocktailCatalogPort => {
        return new CocktailDbAdapter(
          {
            baseUrl: envConfig.cocktailApiBaseUrl,
            timeoutMs: envConfig.cocktailApiTimeoutMs,
            instructionsLanguage: envConfig.instructionsLanguage,
          },
          appLogger,
        );
      },
      inject: [EnvConfigService, AppLoggerService],
    },
  ],
  exports: ['ICocktailCatalog'],
})
export class CocktailDbModule {}
