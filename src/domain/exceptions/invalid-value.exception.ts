import { DomainException } from './domain.exception';

/**
 * Thrown when a value object or entity is built from unusable data,
 * e.g. a blank cocktail id or an ingredient without a name.
 */
export class InvalidValueException extends DomainException {
  constructor(valueName: string, reason: string) {
    super(`Invalid ${valueName}: ${reason}`, 'INVALID_VALUE');
  }
}
