import { z } from 'zod';

export const CheckSchema = z.object({
  paths: z.array(z.string().min(1)).default([]),
  staged: z.boolean().default(false),
  failOnWarning: z.boolean().default(false),
  config: z.string().optional(),
  text: z.boolean().default(false),
});

export type CheckInput = z.infer<typeof CheckSchema>;
