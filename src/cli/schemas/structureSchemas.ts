import { z } from 'zod';

export const SummarySchema = z.object({
  file: z.string().min(1),
  text: z.boolean().default(false),
});

export const DiffSchema = z
  .object({
    old: z.string().min(1),
    new: z.string().min(1).optional(),
    rev: z.string().min(1).optional(),
    text: z.boolean().default(false),
  })
  .refine((v) => v.new !== undefined || v.rev !== undefined, {
    message: 'Provide a <new> file or --rev <rev>',
    path: ['new'],
  });

export type SummaryInput = z.infer<typeof SummarySchema>;
export type DiffInput = z.infer<typeof DiffSchema>;
