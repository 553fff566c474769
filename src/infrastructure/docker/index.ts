/**
 * Docker infrastructure - engine and registry clients
 */

export {
  type ContainerEngine,
  type ContainerStatus,
  type RegistryLoginResult,
  type ImageReference,
  connectDockerEngine,
  createDocker,
  createDockerEngine,
  parseImageReference,
} from './client';
export { type RegistryCatalog, createRegistryCatalog } from './registry';
