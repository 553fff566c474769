/**
 * Login tool parameters
 */

import { z } from 'zod';

export const loginSchema = z.object({
  username: z.string().trim().optional().describe('Registry username; prompted for when absent'),
});

export type LoginParams = z.infer<typeof loginSchema>;
