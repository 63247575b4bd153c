import { readFile } from 'node:fs/promises';
import { SelectorGroupsMapSchema } from '../schemas/selector.schema.js';
import { SelectorGroup } from './selector-group.js';

export type SelectorGroupCatalogue = Record<string, SelectorGroup>;

/**
 * Build one group per key of `{ "<name>": { "selectors": [...] } }`.
 * Shape errors surface as a ZodError; bad descriptors as the construction
 * error of the first offending group.
 */
export function parseSelectorGroups(raw: unknown): SelectorGroupCatalogue {
  const specs = SelectorGroupsMapSchema.parse(raw);

  const catalogue: SelectorGroupCatalogue = {};
  for (const [name, spec] of Object.entries(specs)) {
    const group = SelectorGroup.parse(name, ...spec.selectors);
    if (!group.ok) throw group.error;
    catalogue[name] = group.value;
  }
  return catalogue;
}

export async function loadSelectorGroups(filePath: string): Promise<SelectorGroupCatalogue> {
  const raw = await readFile(filePath, 'utf-8');
  return parseSelectorGroups(JSON.parse(raw));
}
