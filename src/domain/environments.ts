/**
 * Environment naming and resolution rules
 *
 * Pure functions over a loaded `RegistryRecord`. Persistence lives in
 * `infrastructure/environment-store.ts`.
 */

import {
  DEFAULT_BASE_IMAGE,
  DEFAULT_ENVIRONMENT_NAME,
  ENVIRONMENT_PREFIX,
} from '../config/defaults';
import type { Environment, RegistryRecord } from './types';

/**
 * Apply the `devdrop-` prefix. Total and idempotent; an empty name maps to
 * `devdrop-default`.
 */
export function normalizeName(raw: string): string {
  if (raw === '') {
    return DEFAULT_ENVIRONMENT_NAME;
  }
  if (raw.startsWith(ENVIRONMENT_PREFIX)) {
    return raw;
  }
  return `${ENVIRONMENT_PREFIX}${raw}`;
}

/**
 * `{username}/{name}:latest`, or '' when nobody is logged in
 */
export function personalImageReference(username: string, name: string): string {
  if (username === '') {
    return '';
  }
  return `${username}/${normalizeName(name)}:latest`;
}

export function createEmptyRegistry(): RegistryRecord {
  return {
    username: '',
    baseImage: DEFAULT_BASE_IMAGE,
    authToken: '',
    currentEnvironment: '',
    environments: {},
  };
}

export function createEnvironment(now: Date, fields: Partial<Environment> = {}): Environment {
  return {
    image: '',
    baseImage: '',
    created: now,
    lastUpdated: now,
    description: '',
    lastContainer: '',
    ...fields,
  };
}

export function hasEnvironments(registry: RegistryRecord): boolean {
  return Object.keys(registry.environments).length > 0;
}

export function hasEnvironment(registry: RegistryRecord, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(registry.environments, name);
}

export function getEnvironment(registry: RegistryRecord, name: string): Environment | undefined {
  return hasEnvironment(registry, name) ? registry.environments[name] : undefined;
}

/**
 * Environment names in ascending order
 */
export function environmentNames(registry: RegistryRecord): string[] {
  return Object.keys(registry.environments).sort((a, b) => a.localeCompare(b));
}

/**
 * The environment commands use when none is named.
 *
 * `currentEnvironment` wins when it names an existing environment. Otherwise
 * the most recently updated environment is chosen; on equal timestamps the
 * first name in ascending order wins. Returns '' when there are none.
 */
export function resolveCurrentEnvironment(registry: RegistryRecord): string {
  const current = registry.currentEnvironment;
  if (current !== '' && hasEnvironment(registry, current)) {
    return current;
  }

  let latestName = '';
  let latestTime = Number.NEGATIVE_INFINITY;
  for (const name of environmentNames(registry)) {
    const environment = registry.environments[name];
    if (!environment) continue;
    const updated = environment.lastUpdated.getTime();
    if (latestName === '' || updated > latestTime) {
      latestName = name;
      latestTime = updated;
    }
  }
  return latestName;
}
