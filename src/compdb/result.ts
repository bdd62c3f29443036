/**
 * Value-or-error carrier used by every fallible core operation
 */

import type { CompdbError } from './errors.js';

export type Result<T, E = CompdbError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/**
 * Thrown when a result is read through the wrong accessor
 */
export class BadResultAccessError extends Error {
  readonly kind = 'BadResultAccess' as const;

  constructor(message: string) {
    super(`Bad result access: ${message}`);
    this.name = 'BadResultAccessError';
  }
}

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Get the success value, or throw if the result holds an error
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.ok) {
    throw new BadResultAccessError('Tried to get value on an error result');
  }
  return result.value;
}

/**
 * Get the error, or throw if the result holds a value
 */
export function unwrapErr<T, E>(result: Result<T, E>): E {
  if (result.ok) {
    throw new BadResultAccessError('Tried to get error on a value result');
  }
  return result.error;
}
