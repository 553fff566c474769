/**
 * Shared types for command tools
 */

import type { Logger } from 'pino';
import type { ApplicationConfig } from '../config/types';
import type { Result } from '../domain/types';
import type { EnvironmentStore } from '../infrastructure/environment-store';
import type { ContainerEngine } from '../infrastructure/docker/client';
import type { RegistryCatalog } from '../infrastructure/docker/registry';
import type { Prompter } from '../infrastructure/prompts';
import type { Output } from '../infrastructure/output';

/**
 * Everything a tool may touch. The CLI builds one per invocation; tests
 * build one out of fakes.
 */
export interface ToolContext {
  config: ApplicationConfig;
  logger: Logger;
  store: EnvironmentStore;
  /** Connects lazily so commands that fail validation never reach the daemon */
  connectEngine: () => Promise<Result<ContainerEngine>>;
  catalog: RegistryCatalog;
  prompter: Prompter;
  output: Output;
  now: () => Date;
  cwd: () => string;
}
