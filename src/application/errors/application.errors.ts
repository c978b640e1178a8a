/**
 * Base class for all application-level errors.
 *
 * These never reach the chat as raw text: the dispatcher turns each one into
 * a fixed user-facing reply and logs the details.
 */
export abstract class ApplicationError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON(): { code: string; message: string; name: string } {
    return {
      code: this.code,
      message: this.message,
      name: this.name,
    };
  }
}

// ============ Lookup Errors ============

export class CocktailNotFoundError extends ApplicationError {
  readonly code = 'COCKTAIL_NOT_FOUND';

  constructor(public readonly query: string) {
    super(`No cocktails found for '${query}'`);
  }
}

/**
 * The recipe API could not be reached or answered with something unusable
 * (non-2xx status, network failure, timeout, malformed body).
 */
export class CocktailServiceError extends ApplicationError {
  readonly code = 'COCKTAIL_SERVICE_ERROR';

  constructor(
    public readonly operation: string,
    reason: string,
    public readonly status?: number,
  ) {
    super(`Recipe API ${operation} failed: ${reason}`);
  }
}

// ============ Command Errors ============

export class UsageError extends ApplicationError {
  readonly code = 'USAGE_ERROR';

  constructor(public readonly command: 'search' | 'ingredient') {
    super(`/${command} needs an argument`);
  }
}

// ============ Generic Errors ============

export class UnexpectedError extends ApplicationError {
  readonly code = 'UNEXPECTED_ERROR';

  constructor(reason: string) {
    super(`An unexpected error occurred: ${reason}`);
  }
}

export type CocktailLookupError = CocktailNotFoundError | CocktailServiceError | UnexpectedError;

export type CommandError = CocktailLookupError | UsageError;
