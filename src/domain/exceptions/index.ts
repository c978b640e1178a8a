export { DomainException } from './domain.exception';
export { InvalidValueException } from './invalid-value.exception';
