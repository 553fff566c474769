/**
 * Login tool exports.
 */

export { login } from './tool';
export { loginSchema, type LoginParams } from './schema';
export type { LoginResult } from './tool';
