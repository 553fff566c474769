/**
 * Helpers shared by the command tools
 */

import { Success, Failure, type Result, type RegistryRecord } from '../domain/types';
import { hasEnvironments, normalizeName, resolveCurrentEnvironment } from '../domain/environments';
import { NoCurrentEnvironmentError, NoEnvironmentsError } from '../lib/errors';

/**
 * An explicit name is normalized and returned as is, whether or not it exists.
 * Without one, the current environment is resolved.
 */
export function resolveTargetEnvironment(
  record: RegistryRecord,
  explicit?: string,
): Result<string> {
  if (explicit) {
    return Success(normalizeName(explicit));
  }
  if (!hasEnvironments(record)) {
    return Failure(new NoEnvironmentsError());
  }
  const current = resolveCurrentEnvironment(record);
  if (current === '') {
    return Failure(new NoCurrentEnvironmentError());
  }
  return Success(current);
}

/** Docker's short container id */
export function shortId(containerId: string): string {
  return containerId.slice(0, 12);
}

/**
 * `YYYY-MM-DD HH:mm UTC`
 */
export function formatTimestamp(date: Date): string {
  if (date.getTime() === 0) {
    return 'unknown';
  }
  return `${date.toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}
