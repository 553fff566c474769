/**
 * Registry auth token codec.
 *
 * The token stored in the config is the engine's X-Registry-Auth form: base64
 * of a JSON auth config. Push decodes it back into the object dockerode wants.
 */

import { z } from 'zod';
import { ValidationError } from './errors';

export const registryAuthSchema = z.object({
  username: z.string(),
  password: z.string(),
  serveraddress: z.string(),
});

export type RegistryAuth = z.infer<typeof registryAuthSchema>;

export function createAuthToken(auth: RegistryAuth): string {
  const json = JSON.stringify({
    username: auth.username,
    password: auth.password,
    serveraddress: auth.serveraddress,
  });
  return Buffer.from(json, 'utf-8').toString('base64');
}

export function decodeAuthToken(token: string): RegistryAuth {
  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(token, 'base64').toString('utf-8'));
  } catch {
    throw new ValidationError("stored auth token is corrupt. Run 'devdrop login' again");
  }

  const parsed = registryAuthSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError("stored auth token is incomplete. Run 'devdrop login' again");
  }
  return parsed.data;
}
