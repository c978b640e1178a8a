/**
 * Base exception for domain rule violations.
 * Keeps the stack trace pointing at the offending constructor.
 */
export abstract class DomainException extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}
