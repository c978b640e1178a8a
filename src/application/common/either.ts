/**
 * Either type for explicit error handling.
 *
 * Either<L, R> is one of:
 * - Left<L>: the failure case
 * - Right<R>: the success case
 *
 * @example
 * ```typescript
 * const result = await tryCatchAsync(
 *   () => catalog.getRandom(),
 *   (error) => new CocktailServiceError('random', String(error)),
 * );
 *
 * if (result.isLeft()) {
 *   logger.warn(result.value.message);
 * } else {
 *   console.log(result.value?.name ?? 'nothing found');
 * }
 * ```
 */

// Left represents failure
export class Left<L> {
  constructor(public readonly value: L) {}

  isLeft(): this is Left<L> {
    return true;
  }

  isRight(): this is Right<never> {
    return false;
  }
}

// Right represents success
export class Right<R> {
  constructor(public readonly value: R) {}

  isLeft(): this is Left<never> {
    return false;
  }

  isRight(): this is Right<R> {
    return true;
  }
}

export type Either<L, R> = Left<L> | Right<R>;

export const left = <L, R = never>(value: L): Either<L, R> => new Left(value);
export const right = <L = never, R = unknown>(value: R): Either<L, R> => new Right(value);

// Async try/catch that never rejects
export const tryCatchAsync = async <L, R>(
  fn: () => Promise<R>,
  onError: (error: unknown) => L,
): Promise<Either<L, R>> => {
  try {
    return right(await fn());
  } catch (error) {
    return left(onError(error));
  }
};
