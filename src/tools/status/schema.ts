/**
 * Status tool parameter validation schemas.
 */

import { z } from 'zod';

export const statusSchema = z.object({});

export type StatusParams = z.infer<typeof statusSchema>;
