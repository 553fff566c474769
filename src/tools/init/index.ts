/**
 * Init tool exports.
 */

export { init, resolveStarterImage, smartDefaultName } from './tool';
export { initSchema, type InitParams } from './schema';
export type { InitResult } from './tool';
