import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { TaxonId } from '../schemas/taxon.js';

/**
 * Line-oriented id lists used for include, exclude, filter and validate
 * inputs. `#` starts a comment line, blank lines are skipped, and each
 * remaining line yields one id: the whole trimmed line, or one field of it
 * when a separator is given.
 */

export const idListOptionsSchema = z.object({
  separator: z.string().min(1).optional(),
  field: z.number().int().min(0).default(0),
});

export type IdListOptions = z.input<typeof idListOptionsSchema>;

export interface IdListFile extends IdListOptions {
  path: string;
}

/**
 * Where a set of ids comes from: literal ids in memory, or a list file
 */
export type TaxonIdSource = ReadonlySet<TaxonId> | readonly TaxonId[] | IdListFile;

export function parseTaxonIdList(text: string, options: IdListOptions = {}): TaxonId[] {
  const { separator, field } = idListOptionsSchema.parse(options);
  const ids: TaxonId[] = [];

  for (const rawLine of text.split('\n')) {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    if (line.startsWith('#') || line.trim() === '') continue;

    const id = separator === undefined ? line.trim() : line.split(separator)[field]?.trim();
    if (id) {
      ids.push(id);
    }
  }

  return ids;
}

export function readTaxonIdList(path: string, options: IdListOptions = {}): TaxonId[] {
  return parseTaxonIdList(readFileSync(path, 'utf8'), options);
}

export function isIdListFile(source: TaxonIdSource): source is IdListFile {
  return !(source instanceof Set) && !Array.isArray(source) && 'path' in source;
}

/**
 * Materialise a source into an id array, keeping input order
 */
export function resolveTaxonIds(source: TaxonIdSource): TaxonId[] {
  if (isIdListFile(source)) {
    const { path, ...options } = source;
    return readTaxonIdList(path, options);
  }
  return [...source];
}
