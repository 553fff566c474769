/**
 * Dependency Container
 *
 * Builds the tool context for one CLI invocation. Tests pass overrides for
 * the collaborators they fake.
 */

import { createLogger } from '../lib/logger';
import type { LogLevel } from '../lib/logger';
import { createConfiguration } from '../config/config';
import type { ApplicationConfig } from '../config/types';
import type { Result } from '../domain/types';
import { EnvironmentStore } from '../infrastructure/environment-store';
import { connectDockerEngine, type ContainerEngine } from '../infrastructure/docker/client';
import { createRegistryCatalog } from '../infrastructure/docker/registry';
import { createInquirerPrompter } from '../infrastructure/prompts';
import { createConsoleOutput } from '../infrastructure/output';
import type { ToolContext } from '../tools/types';

export type Deps = ToolContext;

/**
 * Configuration overrides for dependency creation
 */
export interface ContainerConfigOverrides {
  config?: ApplicationConfig;
  logLevel?: LogLevel;
}

export type DepsOverrides = Partial<Deps>;

/**
 * Create the dependencies for one invocation
 */
export function createContainer(
  configOverrides: ContainerConfigOverrides = {},
  depsOverrides: DepsOverrides = {},
): Deps {
  const config = configOverrides.config ?? createConfiguration();
  const logLevel = configOverrides.logLevel ?? config.logLevel;

  const logger = depsOverrides.logger ?? createLogger({ level: logLevel });
  const now = depsOverrides.now ?? (() => new Date());

  const store =
    depsOverrides.store ?? new EnvironmentStore({ path: config.configPath, logger, now });

  let connection: Promise<Result<ContainerEngine>> | undefined;
  const connectEngine =
    depsOverrides.connectEngine ??
    (() => {
      connection ??= connectDockerEngine(config, logger);
      return connection;
    });

  const deps: Deps = {
    config,
    logger,
    store,
    connectEngine,
    catalog: depsOverrides.catalog ?? createRegistryCatalog(config, logger),
    prompter: depsOverrides.prompter ?? createInquirerPrompter(),
    output: depsOverrides.output ?? createConsoleOutput(),
    now,
    cwd: depsOverrides.cwd ?? (() => process.cwd()),
  };

  logger.debug(
    {
      configPath: config.configPath,
      dockerSocket: config.docker.socketPath || '(default)',
      hubUrl: config.registry.hubUrl,
      logLevel,
    },
    'Dependency container created',
  );

  return deps;
}
