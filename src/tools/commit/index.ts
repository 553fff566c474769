/**
 * Commit tool exports.
 */

export { commit } from './tool';
export { commitSchema, type CommitParams } from './schema';
export type { CommitResult } from './tool';
