/**
 * Centralized Configuration Defaults
 */

/** Every environment name carries this prefix */
export const ENVIRONMENT_PREFIX = 'devdrop-';

export const DEFAULT_ENVIRONMENT_NAME = `${ENVIRONMENT_PREFIX}default`;

export const DEFAULT_BASE_IMAGE = 'ubuntu:24.04';

export const CONFIG_DIR_NAME = '.devdrop';
export const CONFIG_FILE_NAME = 'config.yaml';

/**
 * Starter images offered by `devdrop init`
 */
export const STARTER_IMAGES = {
  ubuntu: 'ubuntu:24.04',
  go: 'golang:latest',
  node: 'node:latest',
  python: 'python:latest',
} as const;

export type StarterImageName = keyof typeof STARTER_IMAGES;

export const CUSTOM_STARTER = 'custom';

export const DEFAULT_REGISTRY = {
  hubUrl: 'https://hub.docker.com',
  serverAddress: 'https://index.docker.io/v1/',
  timeout: 30000, // 30 seconds
  pageSize: 100,
} as const;

export const DEFAULT_CONTAINER = {
  shell: '/bin/bash',
  workspaceDir: '/workspace',
  /** bash exits with 1 or 2 after an ordinary interactive session */
  normalExitCodes: [0, 1, 2],
  commitComment: 'devdrop environment commit',
  commitAuthor: 'devdrop',
} as const;

export const DEFAULT_DOCKER_BINARY = 'docker';

export function isStarterImageName(name: string): name is StarterImageName {
  return Object.prototype.hasOwnProperty.call(STARTER_IMAGES, name);
}
