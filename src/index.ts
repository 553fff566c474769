/**
 * devdrop library entry point
 *
 * The CLI is the primary surface; these exports let the commands and their
 * collaborators be driven programmatically.
 */

export { createProgram, runCli, resolveLogLevel } from './cli/program';
export type { GlobalOptions, DepsFactory, ProgramOptions } from './cli/program';

export { createContainer } from './app';
export type { Deps, ContainerConfigOverrides, DepsOverrides } from './app';

export * from './tools';

export {
  normalizeName,
  personalImageReference,
  resolveCurrentEnvironment,
  environmentNames,
  hasEnvironments,
} from './domain/environments';
export { Success, Failure, isOk, isFail } from './domain/types';
export type { Result, Environment, RegistryRecord } from './domain/types';

export {
  EnvironmentStore,
  connectDockerEngine,
  createRegistryCatalog,
  type ContainerEngine,
  type RegistryCatalog,
  type Prompter,
  type Output,
} from './infrastructure';

export { createConfiguration, validateConfig, type ApplicationConfig } from './config';
export * from './lib/errors';
export { createLogger, type Logger } from './lib/logger';
