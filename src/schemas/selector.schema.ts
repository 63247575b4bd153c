import { z } from 'zod';
import { SelectorKind } from '../types/selector.js';

/** Kind tokens are matched case-insensitively: "XPath" parses to "xpath". */
export const SelectorKindSchema = z
  .string()
  .transform((token) => token.toLowerCase())
  .pipe(z.enum([SelectorKind.CSS, SelectorKind.XPATH, SelectorKind.TEXT]));

export const TimeoutMsSchema = z.number().finite().nonnegative();

export const SelectorSpecSchema = z.object({
  kind: z.string(),
  value: z.string(),
  timeoutMs: z.number().optional(),
});

/** Shape of a tuple or object descriptor; kind, value and timeout are checked afterwards. */
export const StructuredDescriptorSchema = z.union([
  z.tuple([z.string(), z.string()]).transform(([value, kind]) => ({ value, kind, timeoutMs: undefined })),
  z
    .tuple([z.string(), z.string(), z.number()])
    .transform(([value, kind, timeoutMs]) => ({ value, kind, timeoutMs })),
  SelectorSpecSchema,
]);

export const SelectorDescriptorSchema = z.union([z.string(), StructuredDescriptorSchema]);

export const SelectorGroupSpecSchema = z.object({
  selectors: z.array(SelectorDescriptorSchema),
});

export const SelectorGroupsMapSchema = z.record(SelectorGroupSpecSchema);
