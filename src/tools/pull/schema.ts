/**
 * Pull tool parameter validation schemas.
 */

import { z } from 'zod';

export const pullSchema = z.object({
  environment: z
    .string()
    .trim()
    .optional()
    .describe('Environment to pull; chosen interactively when absent'),
});

export type PullParams = z.infer<typeof pullSchema>;
