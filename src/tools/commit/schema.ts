/**
 * Commit tool parameter validation schemas.
 */

import { z } from 'zod';

export const commitSchema = z.object({
  environment: z
    .string()
    .trim()
    .optional()
    .describe('Environment to commit; the current environment when absent'),
});

export type CommitParams = z.infer<typeof commitSchema>;
