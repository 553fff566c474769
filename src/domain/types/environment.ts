/**
 * Environment registry types.
 *
 * `RegistryRecord` is the in-memory shape of `~/.devdrop/config.yaml`. Field
 * names are camelCase here; the store maps them to the snake_case keys of the
 * file.
 */

export interface Environment {
  /** Fully-qualified registry reference; empty until first commit or pull */
  image: string;
  /** Image the environment was derived from, used when `image` is unavailable */
  baseImage: string;
  /** Set once when the environment is first recorded */
  created: Date;
  /** Bumped on every commit, pull, or container save */
  lastUpdated: Date;
  description: string;
  /** Container from the latest `init` or `run`, pending commit */
  lastContainer: string;
}

export interface RegistryRecord {
  /** Empty means "not logged in" */
  username: string;
  baseImage: string;
  /** Base64 auth config for pushes; empty means commit must fail fast */
  authToken: string;
  currentEnvironment: string;
  environments: Record<string, Environment>;
}

export type EnvironmentPatch = Partial<Environment>;
