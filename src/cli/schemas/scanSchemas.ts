import { z } from 'zod';

const threshold = z.coerce.number().int().positive().optional();

const ScanBase = z.object({
  paths: z.array(z.string().min(1)).min(1),
  config: z.string().optional(),
  text: z.boolean().default(false),
});

export const SmellsSchema = ScanBase.extend({
  longFunctionLines: threshold,
  maxParams: threshold,
  maxNesting: threshold,
  maxMethods: threshold,
});

export const SecuritySchema = ScanBase;

export const MetricsSchema = ScanBase.omit({ config: true });

export type SmellsInput = z.infer<typeof SmellsSchema>;
export type SecurityInput = z.infer<typeof SecuritySchema>;
export type MetricsInput = z.infer<typeof MetricsSchema>;
