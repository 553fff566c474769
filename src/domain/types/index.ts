/**
 * Domain types
 */

export { Success, Failure, isOk, isFail, type Result } from './result';
export type { Environment, EnvironmentPatch, RegistryRecord } from './environment';
