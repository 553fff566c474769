/**
 * Switch tool exports.
 */

export { switchEnvironment } from './tool';
export { switchSchema, type SwitchParams } from './schema';
