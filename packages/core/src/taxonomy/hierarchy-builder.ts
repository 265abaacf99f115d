import type { Logger } from 'pino';
import { DuplicateIdError, OrphanNodeError, RootNotFoundError, type MalformedLine } from '../errors/taxonomy.js';
import type { DuplicatePolicy, Rank, TaxonId, TaxonNode } from '../schemas/taxon.js';
import { cfg } from '../utils/config.js';
import { createModuleLogger } from '../utils/logger.js';
import { RankTable } from './ranks.js';

/**
 * Links raw `(id, parentId, rank)` records into a parent → children
 * adjacency structure.
 *
 * Two passes: the first materialises every node, the second appends each
 * node to its parent's child list. Anomalies (orphans, duplicate ids,
 * unrecognised ranks, malformed lines handed over by the parser) are
 * collected into one BuildReport instead of failing per record.
 */

export interface DuplicateConflict {
  id: TaxonId;
  kept: TaxonNode;
  discarded: TaxonNode;
}

export interface BuildReport {
  rootId: TaxonId;
  nodeCount: number;
  /** Nodes whose declared parent is not part of the build */
  orphans: TaxonId[];
  /** Nodes not reachable from the root: orphans, their descendants, detached cycles */
  unreachable: number;
  /** Conflicting redeclarations resolved by the `override` policy */
  duplicates: DuplicateConflict[];
  /** Identical redeclarations, ignored */
  repeated: number;
  malformed: MalformedLine[];
  unrecognizedRanks: Rank[];
}

export interface Hierarchy {
  readonly rootId: TaxonId;
  readonly nodes: ReadonlyMap<TaxonId, TaxonNode>;
  /** Child ids per parent, in record order; leaves have no entry */
  readonly children: ReadonlyMap<TaxonId, readonly TaxonId[]>;
  readonly reachable: ReadonlySet<TaxonId>;
  readonly ranks: RankTable;
  readonly report: BuildReport;
}

export interface BuildOptions {
  rootId?: TaxonId;
  duplicatePolicy?: DuplicatePolicy;
  /** Parser anomalies to carry into the report */
  malformed?: MalformedLine[];
  logger?: Logger;
}

const EMPTY: readonly TaxonId[] = [];

function sameNode(a: TaxonNode, b: TaxonNode): boolean {
  return a.parentId === b.parentId && a.rank === b.rank;
}

export function buildHierarchy(records: Iterable<TaxonNode>, options: BuildOptions = {}): Hierarchy {
  const rootId = options.rootId ?? cfg.TAXONOMY_ROOT_ID;
  const policy = options.duplicatePolicy ?? cfg.TAXONOMY_DUPLICATE_POLICY;
  const log = options.logger ?? createModuleLogger('builder');
  const malformed = options.malformed ?? [];

  const ranks = new RankTable();
  const nodes = new Map<TaxonId, TaxonNode>();
  const duplicates: DuplicateConflict[] = [];
  const conflictingIds = new Set<TaxonId>();
  let repeated = 0;

  // Pass 1: materialise nodes
  for (const record of records) {
    const node: TaxonNode = {
      id: record.id,
      parentId: record.parentId,
      rank: ranks.intern(record.rank),
    };
    const previous = nodes.get(node.id);

    if (previous === undefined) {
      nodes.set(node.id, node);
      continue;
    }
    if (sameNode(previous, node)) {
      repeated++;
      continue;
    }

    conflictingIds.add(node.id);
    duplicates.push({ id: node.id, kept: node, discarded: previous });
    if (policy === 'override') {
      nodes.set(node.id, node);
    }
  }

  if (policy === 'reject' && conflictingIds.size > 0) {
    throw new DuplicateIdError([...conflictingIds], { policy });
  }
  if (duplicates.length > 0) {
    log.warn(
      { count: duplicates.length, ids: [...conflictingIds].slice(0, 10) },
      `Overrode ${duplicates.length} conflicting redeclaration(s); the last record of each id was kept`
    );
  }

  const root = resolveRoot(nodes, rootId);

  // Pass 2: link children
  const children = new Map<TaxonId, TaxonId[]>();
  const orphans: TaxonId[] = [];
  for (const node of nodes.values()) {
    if (node.id === root) continue;

    if (node.parentId === node.id || !nodes.has(node.parentId)) {
      orphans.push(node.id);
      continue;
    }

    const siblings = children.get(node.parentId);
    if (siblings) {
      siblings.push(node.id);
    } else {
      children.set(node.parentId, [node.id]);
    }
  }

  const reachable = collectReachable(root, children);
  const unreachable = nodes.size - reachable.size;
  if (orphans.length > 0) {
    log.warn(
      { count: orphans.length, unreachable, ids: orphans.slice(0, 10) },
      `${orphans.length} orphan node(s) reference a missing parent and were left out of the tree`
    );
  }

  const unrecognizedRanks = ranks.unrecognizedRanks();
  if (unrecognizedRanks.length > 0) {
    log.warn({ ranks: unrecognizedRanks }, `Unrecognized rank(s) kept verbatim: ${unrecognizedRanks.join(', ')}`);
  }
  if (malformed.length > 0) {
    log.warn(
      { count: malformed.length, lines: malformed.slice(0, 10).map((entry) => entry.lineNumber) },
      `Skipped ${malformed.length} malformed dump record(s)`
    );
  }

  return {
    rootId: root,
    nodes,
    children,
    reachable,
    ranks,
    report: {
      rootId: root,
      nodeCount: nodes.size,
      orphans,
      unreachable,
      duplicates,
      repeated,
      malformed,
      unrecognizedRanks,
    },
  };
}

/**
 * The root is the self-parented node; `rootId` breaks ties between several
 */
function resolveRoot(nodes: ReadonlyMap<TaxonId, TaxonNode>, rootId: TaxonId): TaxonId {
  const candidates: TaxonId[] = [];
  for (const node of nodes.values()) {
    if (node.parentId === node.id) {
      candidates.push(node.id);
    }
  }

  const [only] = candidates;
  if (candidates.length === 1 && only !== undefined) {
    return only;
  }
  if (candidates.includes(rootId)) {
    return rootId;
  }
  throw new RootNotFoundError(rootId, candidates);
}

function collectReachable(
  rootId: TaxonId,
  children: ReadonlyMap<TaxonId, readonly TaxonId[]>
): Set<TaxonId> {
  const reachable = new Set<TaxonId>([rootId]);
  const stack: TaxonId[] = [rootId];

  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined) break;
    for (const child of children.get(current) ?? EMPTY) {
      reachable.add(child);
      stack.push(child);
    }
  }

  return reachable;
}

/**
 * Report for a hierarchy that was restored rather than built from a dump
 */
export function restoredReport(rootId: TaxonId, nodeCount: number, ranks: RankTable): BuildReport {
  return {
    rootId,
    nodeCount,
    orphans: [],
    unreachable: 0,
    duplicates: [],
    repeated: 0,
    malformed: [],
    unrecognizedRanks: ranks.unrecognizedRanks(),
  };
}

export function childIdsOf(hierarchy: Hierarchy, id: TaxonId): readonly TaxonId[] {
  return hierarchy.children.get(id) ?? EMPTY;
}

/**
 * For callers that require every node to hang off the root
 */
export function assertNoOrphans(report: BuildReport): void {
  if (report.orphans.length > 0) {
    throw new OrphanNodeError(report.orphans, { unreachable: report.unreachable });
  }
}
