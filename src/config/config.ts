/**
 * Application configuration with environment overrides
 */

import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import type { ApplicationConfig } from './types';
import {
  CONFIG_DIR_NAME,
  CONFIG_FILE_NAME,
  DEFAULT_DOCKER_BINARY,
  DEFAULT_REGISTRY,
} from './defaults';
import { isLogLevel } from '../lib/logger';

/**
 * Create default configuration
 * @param home - Directory holding `.devdrop/`; the user's home by default
 */
function createDefaultConfig(home: string = homedir()): ApplicationConfig {
  return {
    logLevel: 'warn',
    configPath: join(home, CONFIG_DIR_NAME, CONFIG_FILE_NAME),
    docker: {
      socketPath: '',
      binary: DEFAULT_DOCKER_BINARY,
    },
    registry: {
      hubUrl: DEFAULT_REGISTRY.hubUrl,
      serverAddress: DEFAULT_REGISTRY.serverAddress,
      timeout: DEFAULT_REGISTRY.timeout,
      pageSize: DEFAULT_REGISTRY.pageSize,
    },
  };
}

/**
 * Parse integer with fallback
 */
function parseIntWithFallback(
  value: string | undefined,
  fallback: number,
  varName?: string,
): number {
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    if (varName) {
      console.warn(`Invalid ${varName}: ${value}. Using default: ${fallback}`);
    }
    return fallback;
  }
  return parsed;
}

function resolveConfigPath(env: NodeJS.ProcessEnv, fallback: string): string {
  if (env.DEVDROP_CONFIG) {
    return resolve(env.DEVDROP_CONFIG);
  }
  if (env.DEVDROP_HOME) {
    return join(resolve(env.DEVDROP_HOME), CONFIG_FILE_NAME);
  }
  return fallback;
}

/**
 * Create configuration with environment variable overrides applied
 */
function createConfiguration(env: NodeJS.ProcessEnv = process.env): ApplicationConfig {
  const defaultConfig = createDefaultConfig();
  const logLevel = env.LOG_LEVEL;

  return {
    ...defaultConfig,
    logLevel: logLevel && isLogLevel(logLevel) ? logLevel : defaultConfig.logLevel,
    configPath: resolveConfigPath(env, defaultConfig.configPath),
    docker: {
      socketPath: env.DOCKER_SOCKET || defaultConfig.docker.socketPath,
      binary: env.DEVDROP_DOCKER_BIN || defaultConfig.docker.binary,
    },
    registry: {
      ...defaultConfig.registry,
      hubUrl: (env.DEVDROP_HUB_URL || defaultConfig.registry.hubUrl).replace(/\/+$/, ''),
      serverAddress: env.DEVDROP_REGISTRY_SERVER || defaultConfig.registry.serverAddress,
      timeout: parseIntWithFallback(
        env.DEVDROP_HUB_TIMEOUT,
        defaultConfig.registry.timeout,
        'DEVDROP_HUB_TIMEOUT',
      ),
    },
  };
}

export { createDefaultConfig, createConfiguration };
