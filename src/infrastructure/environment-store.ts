/**
 * Environment Store
 *
 * Persists the environment registry as YAML at a fixed per-user path
 * (`~/.devdrop/config.yaml` unless configured otherwise). Each mutating call
 * performs a full load-mutate-save cycle; nothing is cached between calls.
 */

import { chmod, mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import type { Logger } from 'pino';
import type { Environment, RegistryRecord } from '../domain/types';
import {
  createEmptyRegistry,
  createEnvironment,
  environmentNames,
  getEnvironment,
  normalizeName,
} from '../domain/environments';
import { DEFAULT_BASE_IMAGE } from '../config/defaults';
import { ConfigParseError, ConfigWriteError, errorMessage } from '../lib/errors';

/** YAML scalars that should have been strings (e.g. a numeric username) are kept as text */
const textSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? '' : String(value)));

const timestampSchema = z.coerce.date().nullish();

const environmentFileSchema = z.object({
  image: textSchema,
  base_image: textSchema,
  created: timestampSchema,
  last_updated: timestampSchema,
  description: textSchema,
  last_container: textSchema,
});

const registryFileSchema = z.object({
  username: textSchema,
  base_image: textSchema,
  auth_token: textSchema,
  current_environment: textSchema,
  environments: z.record(environmentFileSchema.nullable()).nullish(),
});

type RegistryFile = z.infer<typeof registryFileSchema>;

const EPOCH = new Date(0);

function fromFile(file: RegistryFile): RegistryRecord {
  const environments: Record<string, Environment> = {};
  for (const [name, entry] of Object.entries(file.environments ?? {})) {
    environments[name] = {
      image: entry?.image ?? '',
      baseImage: entry?.base_image ?? '',
      created: entry?.created ?? EPOCH,
      lastUpdated: entry?.last_updated ?? EPOCH,
      description: entry?.description ?? '',
      lastContainer: entry?.last_container ?? '',
    };
  }

  return {
    username: file.username,
    baseImage: file.base_image || DEFAULT_BASE_IMAGE,
    authToken: file.auth_token,
    currentEnvironment: file.current_environment,
    environments,
  };
}

/**
 * Build the YAML document with a fixed key order. Optional fields are
 * omitted when empty.
 */
function toFile(record: RegistryRecord): Record<string, unknown> {
  const environments: Record<string, Record<string, unknown>> = {};
  for (const name of environmentNames(record)) {
    const environment = record.environments[name];
    if (!environment) continue;

    const entry: Record<string, unknown> = {
      image: environment.image,
      base_image: environment.baseImage,
      created: environment.created,
      last_updated: environment.lastUpdated,
    };
    if (environment.description) entry.description = environment.description;
    if (environment.lastContainer) entry.last_container = environment.lastContainer;
    environments[name] = entry;
  }

  const document: Record<string, unknown> = {
    username: record.username,
    base_image: record.baseImage,
  };
  if (record.authToken) document.auth_token = record.authToken;
  if (record.currentEnvironment) document.current_environment = record.currentEnvironment;
  document.environments = environments;
  return document;
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT'
  );
}

export interface EnvironmentStoreOptions {
  path: string;
  logger: Logger;
  now?: () => Date;
}

export class EnvironmentStore {
  readonly path: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: EnvironmentStoreOptions) {
    this.path = options.path;
    this.logger = options.logger.child({ component: 'EnvironmentStore' });
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Read the registry. A missing file yields defaults; a malformed one
   * raises ConfigParseError.
   */
  async load(): Promise<RegistryRecord> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.debug({ path: this.path }, 'No config file yet, using defaults');
        return createEmptyRegistry();
      }
      throw new ConfigParseError(this.path, error instanceof Error ? error : undefined);
    }

    let raw: unknown;
    try {
      raw = yaml.load(text);
    } catch (error) {
      throw new ConfigParseError(this.path, error instanceof Error ? error : undefined);
    }

    if (raw === undefined || raw === null) {
      return createEmptyRegistry();
    }

    const parsed = registryFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new ConfigParseError(
        this.path,
        new Error(`${issue?.message ?? 'invalid structure'}${where}`),
      );
    }

    const record = fromFile(parsed.data);
    this.logger.debug(
      { path: this.path, environments: Object.keys(record.environments).length },
      'Loaded config',
    );
    return record;
  }

  /**
   * Overwrite the file with the full record, creating the directory if needed
   */
  async save(record: RegistryRecord): Promise<void> {
    const text = yaml.dump(toFile(record), { lineWidth: -1, noRefs: true });
    try {
      await mkdir(dirname(this.path), { recursive: true, mode: 0o700 });
      await writeFile(this.path, text, { encoding: 'utf-8', mode: 0o600 });
      await chmod(this.path, 0o600);
    } catch (error) {
      this.logger.error({ path: this.path, error: errorMessage(error) }, 'Failed to write config');
      throw new ConfigWriteError(this.path, error instanceof Error ? error : undefined);
    }
    this.logger.debug({ path: this.path }, 'Saved config');
  }

  async setUsername(username: string): Promise<RegistryRecord> {
    return this.mutate((record) => {
      record.username = username;
    });
  }

  async setAuthToken(authToken: string): Promise<RegistryRecord> {
    return this.mutate((record) => {
      record.authToken = authToken;
    });
  }

  /**
   * Point `current_environment` at a name. Existence is not checked here.
   */
  async setCurrentEnvironment(raw: string): Promise<RegistryRecord> {
    return this.mutate((record) => {
      record.currentEnvironment = normalizeName(raw);
    });
  }

  async addOrUpdateEnvironment(name: string, environment: Environment): Promise<RegistryRecord> {
    return this.mutate((record) => {
      record.environments[normalizeName(name)] = { ...environment };
    });
  }

  /**
   * Record the container produced by `init`/`run` so `commit` can find it
   */
  async setEnvironmentContainer(name: string, containerId: string): Promise<RegistryRecord> {
    return this.mutate((record) => {
      const key = normalizeName(name);
      const now = this.now();
      const existing = getEnvironment(record, key) ?? createEnvironment(now);
      record.environments[key] = { ...existing, lastContainer: containerId, lastUpdated: now };
    });
  }

  private async mutate(apply: (record: RegistryRecord) => void): Promise<RegistryRecord> {
    const record = await this.load();
    apply(record);
    await this.save(record);
    return record;
  }
}
