/**
 * Init tool parameter validation schemas.
 */

import { z } from 'zod';

export const initSchema = z.object({
  name: z.string().trim().optional().describe("Environment name (prefixed with 'devdrop-')"),
  image: z
    .string()
    .trim()
    .optional()
    .describe("Starter image: ubuntu, go, node, python, or 'custom' with baseImage"),
  baseImage: z.string().trim().optional().describe('Image reference used with image=custom'),
});

export type InitParams = z.infer<typeof initSchema>;
