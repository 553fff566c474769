/**
 * Configuration
 */

export { createConfiguration, createDefaultConfig } from './config';
export { validateConfig } from './validation';
export type { ApplicationConfig } from './types';
export * from './defaults';
