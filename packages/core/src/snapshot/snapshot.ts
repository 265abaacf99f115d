import { readFile, writeFile } from 'node:fs/promises';
import { decode, encode } from '@msgpack/msgpack';
import { z } from 'zod';
import { SnapshotError } from '../errors/taxonomy.js';
import { indexVariant, type SnapshotFormat, type TaxonId, type TaxonNode, taxonId } from '../schemas/taxon.js';
import { AdjacencyIndex } from '../taxonomy/AdjacencyIndex.js';
import { restoredReport } from '../taxonomy/hierarchy-builder.js';
import { IntervalIndex } from '../taxonomy/IntervalIndex.js';
import { RankTable } from '../taxonomy/ranks.js';
import type { TaxonomyIndex } from '../taxonomy/TaxonomyIndex.js';
import { cfg } from '../utils/config.js';
import { createModuleLogger, startTimer } from '../utils/logger.js';

/**
 * On-disk snapshot of an index.
 *
 * The document is column oriented: node ids, parent ids and a rank reference
 * per node, with ranks interned in a separate table. Interval snapshots also
 * carry the depth/lft/rgt columns so that loading does not renumber.
 * Encoded as MessagePack (default) or JSON.
 */

const log = createModuleLogger('snapshot');

export const SNAPSHOT_MAGIC = 'taxindex';
export const SNAPSHOT_VERSION = 1;

const column = z.array(z.number().int().min(0));

export const snapshotSchema = z
  .object({
    magic: z.literal(SNAPSHOT_MAGIC),
    version: z.literal(SNAPSHOT_VERSION),
    kind: indexVariant,
    rootId: taxonId,
    ranks: z.array(z.string()),
    ids: z.array(taxonId).min(1),
    parentIds: z.array(taxonId),
    rankRefs: column,
    intervals: z
      .object({
        depth: column,
        lft: column,
        rgt: column,
      })
      .optional(),
  })
  .superRefine((doc, ctx) => {
    const count = doc.ids.length;
    if (doc.parentIds.length !== count || doc.rankRefs.length !== count) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Node columns differ in length' });
    }
    if (doc.rankRefs.some((ref) => ref >= doc.ranks.length)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Rank reference outside the rank table' });
    }
    if ((doc.kind === 'interval') !== (doc.intervals !== undefined)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Interval columns must be present exactly for interval snapshots' });
    }
    if (
      doc.intervals &&
      (doc.intervals.depth.length !== count || doc.intervals.lft.length !== count || doc.intervals.rgt.length !== count)
    ) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Interval columns differ in length from the node columns' });
    }
  });

export type SnapshotDocument = z.infer<typeof snapshotSchema>;

export function toSnapshotDocument(index: TaxonomyIndex): SnapshotDocument {
  const ranks = new RankTable();
  const ids: TaxonId[] = [];
  const parentIds: TaxonId[] = [];
  const rankRefs: number[] = [];

  for (const node of index.nodes()) {
    ids.push(node.id);
    parentIds.push(node.parentId);
    rankRefs.push(ranks.refOf(node.rank));
  }

  const doc: SnapshotDocument = {
    magic: SNAPSHOT_MAGIC,
    version: SNAPSHOT_VERSION,
    kind: index.kind,
    rootId: index.rootId,
    ranks: ranks.toArray(),
    ids,
    parentIds,
    rankRefs,
  };

  if (index instanceof IntervalIndex) {
    const columns = index.toColumns();
    doc.intervals = {
      depth: Array.from(columns.depth),
      lft: Array.from(columns.lft),
      rgt: Array.from(columns.rgt),
    };
  }

  return doc;
}

export function fromSnapshotDocument(doc: SnapshotDocument): TaxonomyIndex {
  const ranks = new RankTable(doc.ranks);
  const nodes: TaxonNode[] = doc.ids.map((id, row) => ({
    id,
    parentId: doc.parentIds[row] ?? id,
    rank: ranks.labelOf(doc.rankRefs[row] ?? 0) ?? '',
  }));

  if (doc.intervals === undefined) {
    // re-linking re-checks the hierarchy: a missing root fails here
    return AdjacencyIndex.fromRecords(nodes, { rootId: doc.rootId, duplicatePolicy: 'reject' });
  }

  const depth = Uint32Array.from(doc.intervals.depth);
  const lft = Uint32Array.from(doc.intervals.lft);
  const rgt = Uint32Array.from(doc.intervals.rgt);
  verifyIntervals(doc.rootId, nodes, depth, lft, rgt);

  return new IntervalIndex({
    nodes,
    depth,
    lft,
    rgt,
    report: restoredReport(doc.rootId, nodes.length, ranks),
  });
}

/**
 * Check that the stored numbering is a valid nested set rooted at `rootId`.
 *
 * Rows are walked in lft order with a stack of the intervals still open: once
 * the intervals closed before a row are popped, the top of the stack must be
 * the row's declared parent.
 */
function verifyIntervals(
  rootId: TaxonId,
  nodes: readonly TaxonNode[],
  depth: Uint32Array,
  lft: Uint32Array,
  rgt: Uint32Array
): void {
  const fail = (message: string, id?: TaxonId): never => {
    throw new SnapshotError(message, 'verify', id === undefined ? undefined : { id });
  };

  const root = nodes[0];
  if (root === undefined || root.id !== rootId || root.parentId !== root.id) {
    fail(`First interval row must be the self-parented root "${rootId}"`);
  }
  if (depth[0] !== 0 || lft[0] !== 1 || rgt[0] !== nodes.length * 2) {
    fail(`Root interval must span 1..${nodes.length * 2} at depth 0`, rootId);
  }

  const seen = new Set<TaxonId>();
  const open: number[] = [];

  nodes.forEach((node, row) => {
    if (seen.has(node.id)) {
      fail(`Taxon id "${node.id}" appears twice`, node.id);
    }
    seen.add(node.id);

    const nodeLft = lft[row] ?? 0;
    const nodeRgt = rgt[row] ?? 0;
    if (nodeLft >= nodeRgt) {
      fail(`Interval of "${node.id}" is empty or reversed`, node.id);
    }
    if (row === 0) {
      open.push(row);
      return;
    }

    if (nodeLft <= (lft[row - 1] ?? 0)) {
      fail(`Rows are not in lft order at "${node.id}"`, node.id);
    }
    while (open.length > 0 && (rgt[open[open.length - 1] ?? 0] ?? 0) < nodeLft) {
      open.pop();
    }

    const parentRow = open[open.length - 1];
    const parent = parentRow === undefined ? undefined : nodes[parentRow];
    if (parentRow === undefined || parent === undefined || parent.id !== node.parentId) {
      fail(`Interval of "${node.id}" is not nested in its parent's`, node.id);
      return;
    }
    if (nodeRgt >= (rgt[parentRow] ?? 0)) {
      fail(`Interval of "${node.id}" is not nested in its parent's`, node.id);
    }
    if (depth[row] !== (depth[parentRow] ?? 0) + 1) {
      fail(`Depth of "${node.id}" does not follow its parent's`, node.id);
    }
    open.push(row);
  });
}

export function encodeSnapshot(
  index: TaxonomyIndex,
  format: SnapshotFormat = cfg.TAXONOMY_SNAPSHOT_FORMAT
): Uint8Array {
  const doc = toSnapshotDocument(index);
  return format === 'json' ? new TextEncoder().encode(JSON.stringify(doc)) : encode(doc);
}

/**
 * JSON snapshots start with `{`; MessagePack maps never do
 */
export function detectSnapshotFormat(bytes: Uint8Array): SnapshotFormat {
  return bytes[0] === 0x7b ? 'json' : 'msgpack';
}

export function decodeSnapshot(bytes: Uint8Array, format: SnapshotFormat = detectSnapshotFormat(bytes)): TaxonomyIndex {
  let raw: unknown;
  try {
    raw = format === 'json' ? JSON.parse(new TextDecoder().decode(bytes)) : decode(bytes);
  } catch (error) {
    throw new SnapshotError(`Snapshot is not valid ${format}`, 'decode', {
      format,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const parsed = snapshotSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SnapshotError('Snapshot document is malformed', 'decode', {
      format,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    });
  }
  return fromSnapshotDocument(parsed.data);
}

export async function writeSnapshot(
  path: string,
  index: TaxonomyIndex,
  format: SnapshotFormat = cfg.TAXONOMY_SNAPSHOT_FORMAT
): Promise<void> {
  const done = startTimer(log, 'writeSnapshot');
  await writeFile(path, encodeSnapshot(index, format));
  done({ path, format, nodes: index.size });
}

export async function loadSnapshot(path: string, format?: SnapshotFormat): Promise<TaxonomyIndex> {
  const done = startTimer(log, 'loadSnapshot');
  const bytes = await readFile(path);
  const index = decodeSnapshot(bytes, format ?? detectSnapshotFormat(bytes));
  done({ path, kind: index.kind, nodes: index.size });
  return index;
}
