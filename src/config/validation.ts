/**
 * Configuration Validation
 */

import { isAbsolute } from 'node:path';
import type { ApplicationConfig } from './types';

interface ValidationResult {
  isValid: boolean;
  errors: Array<{ path: string; message: string }>;
  warnings: Array<{ path: string; message: string }>;
}

export function validateConfig(config: ApplicationConfig): ValidationResult {
  const errors: Array<{ path: string; message: string }> = [];
  const warnings: Array<{ path: string; message: string }> = [];

  if (!isAbsolute(config.configPath)) {
    errors.push({ path: 'configPath', message: 'Must be an absolute path' });
  }

  if (!config.docker.binary.trim()) {
    errors.push({ path: 'docker.binary', message: 'Must not be empty' });
  }

  if (!/^https?:\/\//.test(config.registry.hubUrl)) {
    errors.push({ path: 'registry.hubUrl', message: 'Must be an http(s) URL' });
  }

  if (config.registry.timeout < 1) {
    errors.push({ path: 'registry.timeout', message: 'Must be at least 1ms' });
  } else if (config.registry.timeout < 1000) {
    warnings.push({
      path: 'registry.timeout',
      message: 'Timeouts under one second usually fail against Docker Hub',
    });
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings,
  };
}
