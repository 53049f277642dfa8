/**
 * Result<T, E> type for functional error handling
 * Validation steps return a Result; the public builder API unwraps and throws.
 */

export type Result<T, E> = Ok<T> | Err<E>;

/**
 * Success variant of Result<T, E>
 */
export class Ok<T> {
  readonly _tag = 'Ok' as const;

  constructor(public readonly value: T) {}

  isOk(): this is Ok<T> {
    return true;
  }

  isErr(): this is never {
    return false;
  }
}

/**
 * Error variant of Result<T, E>
 */
export class Err<E> {
  readonly _tag = 'Err' as const;

  constructor(public readonly error: E) {}

  isOk(): this is never {
    return false;
  }

  isErr(): this is Err<E> {
    return true;
  }
}

export function ok<T>(value: T): Ok<T> {
  return new Ok(value);
}

export function err<E>(error: E): Err<E> {
  return new Err(error);
}

/**
 * Return the success value or throw the error variant.
 * Use at API boundaries only; inside the validators prefer checking `_tag`.
 */
export function unwrapOrThrow<T, E extends Error>(result: Result<T, E>): T {
  if (result._tag === 'Err') {
    throw result.error;
  }
  return result.value;
}
