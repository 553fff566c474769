/**
 * Configuration Types
 */

import type { LogLevel } from '../lib/logger';

export interface ApplicationConfig {
  logLevel: LogLevel;
  /** Absolute path of the environment registry file */
  configPath: string;
  docker: {
    /** Empty means dockerode's own defaults (DOCKER_HOST, then the local socket) */
    socketPath: string;
    /** CLI used for the interactive attach */
    binary: string;
  };
  registry: {
    hubUrl: string;
    serverAddress: string;
    timeout: number;
    pageSize: number;
  };
}
