/**
 * Switch tool parameter validation schemas.
 */

import { z } from 'zod';

export const switchSchema = z.object({
  environment: z
    .string()
    .trim()
    .optional()
    .describe('Environment to make current; chosen interactively when absent'),
});

export type SwitchParams = z.infer<typeof switchSchema>;
