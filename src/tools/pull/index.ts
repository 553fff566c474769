/**
 * Pull tool exports.
 */

export { pull } from './tool';
export { pullSchema, type PullParams } from './schema';
export type { PullResult } from './tool';
