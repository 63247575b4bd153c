import { z } from 'zod';
import { SelectorGroupsMapSchema } from './selector.schema.js';

export const CliOptionsSchema = z.object({
  headless: z.boolean().default(true),
  timeoutMs: z.number().int().positive().default(120_000),
  defaultSelectorTimeoutMs: z.number().int().nonnegative().default(5000),
});

export const CliInputSchema = z.object({
  url: z.string().url(),
  groups: SelectorGroupsMapSchema,
  options: CliOptionsSchema.default({}),
});

export type CliInput = z.infer<typeof CliInputSchema>;
