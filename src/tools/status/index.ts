/**
 * Status tool exports.
 */

export { status } from './tool';
export { statusSchema, type StatusParams } from './schema';
export type { StatusResult, StatusState } from './tool';
