/**
 * Run tool exports.
 */

export { run } from './tool';
export { runSchema, type RunParams } from './schema';
export type { RunResult } from './tool';
