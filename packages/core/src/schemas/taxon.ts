import { z } from 'zod';

// Taxon ids are opaque tokens: "0042" and "42" are different ids
export const taxonId = z.string().min(1, 'Taxon id cannot be empty');

// Rank labels are kept verbatim, recognised or not
export const rank = z.string();

export const taxonNodeSchema = z.object({
  id: taxonId,
  parentId: taxonId,
  rank: rank,
});

export type TaxonId = z.infer<typeof taxonId>;
export type Rank = z.infer<typeof rank>;
export type TaxonNode = z.infer<typeof taxonNodeSchema>;

export const indexVariant = z.enum(['adjacency', 'interval']);
export type IndexVariant = z.infer<typeof indexVariant>;

export const duplicatePolicy = z.enum(['reject', 'override']);
export type DuplicatePolicy = z.infer<typeof duplicatePolicy>;

export const snapshotFormat = z.enum(['msgpack', 'json']);
export type SnapshotFormat = z.infer<typeof snapshotFormat>;
