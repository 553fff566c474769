/**
 * Result Pattern
 * Discriminated union returned by engine calls and command handlers
 */

import type { DevDropError } from '../../lib/errors';

/**
 * Result type - the failure side carries a typed error, not a string
 */
export type Result<T, E = DevDropError> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Create a success result
 */
export const Success = <T, E = DevDropError>(value: T): Result<T, E> => ({ ok: true, value });

/**
 * Create a failure result
 */
export const Failure = <T, E = DevDropError>(error: E): Result<T, E> => ({ ok: false, error });

export const isOk = <T, E>(result: Result<T, E>): result is { ok: true; value: T } => result.ok;

export const isFail = <T, E>(result: Result<T, E>): result is { ok: false; error: E } =>
  !result.ok;
