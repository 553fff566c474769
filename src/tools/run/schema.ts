/**
 * Run tool parameter validation schemas.
 */

import { z } from 'zod';

export const runSchema = z.object({
  environment: z
    .string()
    .trim()
    .optional()
    .describe('Environment to run; the current environment when absent'),
});

export type RunParams = z.infer<typeof runSchema>;
