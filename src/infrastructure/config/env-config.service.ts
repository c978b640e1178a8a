import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EnvConfig } from './env.validation';

/**
 * Typed configuration service for environment variables.
 *
 * Values are guaranteed to exist because they are validated at startup
 * by the Zod schema.
 */
@Injectable()
export class EnvConfigService {
  constructor(private readonly configService: ConfigService<EnvConfig, true>) {}

  get nodeEnv(): EnvConfig['NODE_ENV'] {
    return this.configService.get('NODE_ENV', { infer: true });
  }

  get botToken(): EnvConfig['BOT_TOKEN'] {
    return this.configService.get('BOT_TOKEN', { infer: true });
  }

  get cocktailApiBaseUrl(): EnvConfig['COCKTAIL_API_BASE_URL'] {
    return this.configService.get('COCKTAIL_API_BASE_URL', { infer: true });
  }

  get cocktailApiTimeoutMs(): EnvConfig['COCKTAIL_API_TIMEOUT_MS'] {
    return this.configService.get('COCKTAIL_API_TIMEOUT_MS', { infer: true });
  }

  get instructionsLanguage(): EnvConfig['COCKTAIL_INSTRUCTIONS_LANGUAGE'] {
    return this.configService.get('COCKTAIL_INSTRUCTIONS_LANGUAGE', { infer: true });
  }

  get isProduction(): boolean {
    return this.nodeEnv === 'production';
  }
}
