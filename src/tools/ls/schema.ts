/**
 * List tool parameter validation schemas.
 */

import { z } from 'zod';

export const listSchema = z
  .object({
    remoteOnly: z.boolean().default(false).describe('Show only registry repositories'),
    localOnly: z.boolean().default(false).describe('Show only locally configured environments'),
  })
  .refine((params) => !(params.remoteOnly && params.localOnly), {
    message: '--remote-only and --local-only cannot be used together',
  });

export type ListParams = z.infer<typeof listSchema>;
