/**
 * Composition root
 */

export { createContainer } from './container';
export type { Deps, ContainerConfigOverrides, DepsOverrides } from './container';
