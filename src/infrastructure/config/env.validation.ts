import { z } from 'zod';

export const INSTRUCTION_LANGUAGES = ['EN', 'ES', 'DE', 'FR', 'IT'] as const;

export type InstructionLanguage = (typeof INSTRUCTION_LANGUAGES)[number];

/**
 * Environment variables schema using Zod.
 *
 * Only BOT_TOKEN is mandatory; everything else has a working default.
 */
export const envSchema = z.object({
  // Application
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Telegram
  BOT_TOKEN: z
    .string({ message: 'BOT_TOKEN is required' })
    .trim()
    .min(1, 'BOT_TOKEN is required'),

  // TheCocktailDB (v1 with the public test key "1")
  COCKTAIL_API_BASE_URL: z
    .url({ message: 'COCKTAIL_API_BASE_URL must be a valid URL' })
    .default('https://www.thecocktaildb.com/api/json/v1/1'),
  COCKTAIL_API_TIMEOUT_MS: z
    .string()
    .default('10000')
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().positive().max(120000)),
  COCKTAIL_INSTRUCTIONS_LANGUAGE: z
    .string()
    .default('EN')
    .transform((val) => val.toUpperCase())
    .pipe(z.enum(INSTRUCTION_LANGUAGES)),
});

/**
 * Inferred TypeScript type from the env schema.
 */
export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Raised when the environment cannot start the bot. Fatal: the process exits.
 */
export class ConfigurationError extends Error {
  constructor(public readonly issues: string[]) {
    super(
      `\n❌ Environment validation failed:\n${issues.join(
        '\n',
      )}\n\nPlease check your .env file or environment variables.`,
    );
    this.name = 'ConfigurationError';
  }
}

/**
 * Validates environment variables using Zod schema.
 *
 * Used by NestJS ConfigModule.forRoot() at application startup.
 *
 * @param config - Raw environment variables from process.env
 * @returns Validated and transformed configuration
 * @throws ConfigurationError listing every failed variable
 */
export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`),
    );
  }

  return result.data;
}
