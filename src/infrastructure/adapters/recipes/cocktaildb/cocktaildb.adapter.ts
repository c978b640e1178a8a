import { Logger } from '@nestjs/common';
import { CocktailServiceError } from '@application/errors';
import { ICocktailCatalogPort } from '@application/ports/outbound';
import { Cocktail } from '@domain/entities';
import { DomainException } from '@domain/exceptions';
import { CocktailId, CocktailSummary } from '@domain/value-objects';
import { InstructionLanguage } from '@infrastructure/config/env.validation';
import { AppLoggerService, RecipeApiOperation } from '@infrastructure/observability';
import { CocktailMapper } from './mappers';
import { drinkDetailSchema, drinksEnvelopeSchema, drinkSummarySchema } from './schemas';

export interface CocktailDbAdapterOptions {
  /** e.g. https://www.thecocktaildb.com/api/json/v1/1 */
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly instructionsLanguage: InstructionLanguage;
}

const ENDPOINTS: Record<RecipeApiOperation, string> = {
  random: 'random.php',
  search: 'search.php',
  filter: 'filter.php',
  lookup: 'lookup.php',
};

/**
 * TheCocktailDB implementation of the cocktail catalog.
 *
 * One GET per call, no retries and no caching. Responses are validated with
 * Zod before they become domain objects; anything that is not a 2xx JSON body
 * of the expected shape becomes a CocktailServiceError.
 */
export class CocktailDbAdapter implements ICocktailCatalogPort {
  private readonly logger = new Logger(CocktailDbAdapter.name);
  private readonly baseUrl: string;

  constructor(
    private readonly options: CocktailDbAdapterOptions,
    private readonly appLogger: AppLoggerService,
  ) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  async getRandom(): Promise<Cocktail | null> {
    const drinks = await this.fetchDrinks('random', {});
    return this.firstCocktail('random', drinks);
  }

  async searchByName(name: string): Promise<Cocktail[]> {
    const drinks = await this.fetchDrinks('search', { s: name.trim() });
    return this.toCocktails('search', drinks);
  }

  async filterByIngredient(ingredient: string): Promise<CocktailSummary[]> {
    const drinks = await this.fetchDrinks('filter', { i: ingredient.trim() });
    const parsed = drinkSummarySchema.array().safeParse(drinks);

    if (!parsed.success) {
      throw this.payloadError('filter', parsed.error.issues[0]?.message);
    }
    return this.mapPayload('filter', () =>
      parsed.data.map((payload) => CocktailMapper.toSummary(payload)),
    );
  }

  async lookupById(id: CocktailId): Promise<Cocktail | null> {
    const drinks = await this.fetchDrinks('lookup', { i: id.toString() });
    return this.firstCocktail('lookup', drinks);
  }

  // ============ Private Helper Methods ============

  /**
   * Performs the request and returns the raw `drinks` array,
   * or an empty array when the API reports no match.
   */
  private async fetchDrinks(
    operation: RecipeApiOperation,
    params: Record<string, string>,
  ): Promise<unknown[]> {
    const endpoint = ENDPOINTS[operation];
    const url = this.buildUrl(endpoint, params);
    const startedAt = Date.now();

    try {
      const response = await fetch(url, {
        headers: { accept: 'application/json' },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });

      if (!response.ok) {
        throw new CocktailServiceError(operation, `HTTP ${response.status}`, response.status);
      }

      const body = await response.text();
      const envelope = drinksEnvelopeSchema.safeParse(this.parseBody(operation, body));
      if (!envelope.success) {
        throw this.payloadError(operation, envelope.error.issues[0]?.message);
      }

      const drinks = Array.isArray(envelope.data.drinks) ? envelope.data.drinks : [];
      this.appLogger.logApiCall({
        operation,
        endpoint,
        durationMs: Date.now() - startedAt,
        success: true,
        status: response.status,
        resultCount: drinks.length,
      });
      return drinks;
    } catch (error) {
      const serviceError =
        error instanceof CocktailServiceError
          ? error
          : new CocktailServiceError(operation, this.describeFailure(error));

      this.appLogger.logApiCall({
        operation,
        endpoint,
        durationMs: Date.now() - startedAt,
        success: false,
        status: serviceError.status,
        error: serviceError.message,
      });
      throw serviceError;
    }
  }

  private buildUrl(endpoint: string, params: Record<string, string>): string {
    const url = new URL(`${this.baseUrl}/${endpoint}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  // An empty body means "nothing found" for some endpoints
  private parseBody(operation: RecipeApiOperation, body: string): unknown {
    if (body.trim().length === 0) {
      return {};
    }
    try {
      return JSON.parse(body);
    } catch {
      throw new CocktailServiceError(operation, 'response body is not valid JSON');
    }
  }

  private toCocktails(operation: RecipeApiOperation, drinks: unknown[]): Cocktail[] {
    const parsed = drinkDetailSchema.array().safeParse(drinks);
    if (!parsed.success) {
      throw this.payloadError(operation, parsed.error.issues[0]?.message);
    }
    return this.mapPayload(operation, () =>
      parsed.data.map((payload) =>
        CocktailMapper.toDomain(payload, this.options.instructionsLanguage),
      ),
    );
  }

  private firstCocktail(operation: RecipeApiOperation, drinks: unknown[]): Cocktail | null {
    const [first] = this.toCocktails(operation, drinks.slice(0, 1));
    return first ?? null;
  }

  // Well-formed JSON can still carry values the domain rejects, such as a blank name
  private mapPayload<T>(operation: RecipeApiOperation, map: () => T): T {
    try {
      return map();
    } catch (error) {
      if (error instanceof DomainException) {
        throw this.payloadError(operation, error.message);
      }
      throw error;
    }
  }

  private payloadError(operation: RecipeApiOperation, detail?: string): CocktailServiceError {
    this.logger.warn(`Unexpected ${operation} payload: ${detail ?? 'unknown shape'}`);
    return new CocktailServiceError(operation, 'unexpected response payload');
  }

  private describeFailure(error: unknown): string {
    if (error instanceof Error) {
      return error.name === 'TimeoutError'
        ? `timed out after ${this.options.timeoutMs} ms`
        : error.message;
    }
    return 'network failure';
  }
}
