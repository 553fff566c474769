/**
 * List tool exports.
 */

export { listEnvironments } from './tool';
export { listSchema, type ListParams } from './schema';
export type { ListResult } from './tool';
