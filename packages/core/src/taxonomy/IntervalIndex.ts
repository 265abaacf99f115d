import { UnknownTaxonIdError } from '../errors/taxonomy.js';
import type { TaxonId, TaxonNode } from '../schemas/taxon.js';
import { selectFilteredNodes } from './filter.js';
import {
  type BuildOptions,
  type BuildReport,
  type Hierarchy,
  buildHierarchy,
  childIdsOf,
} from './hierarchy-builder.js';
import type { FilterOptions, TaxonomyIndex } from './TaxonomyIndex.js';

/**
 * Nested-set bounds of one node. For an ancestor A of B:
 * `A.lft < B.lft < B.rgt < A.rgt`.
 */
export interface Interval {
  depth: number;
  lft: number;
  rgt: number;
}

/**
 * Column storage of an interval index; row i is the i-th node in pre-order
 */
export interface IntervalColumns {
  nodes: readonly TaxonNode[];
  depth: Uint32Array;
  lft: Uint32Array;
  rgt: Uint32Array;
  report: BuildReport;
}

function cell(column: Uint32Array, row: number): number {
  const value = column[row];
  if (value === undefined) {
    throw new RangeError(`Row ${row} is outside the interval table (${column.length} rows)`);
  }
  return value;
}

/**
 * Nested-set index.
 *
 * One pre-order traversal from the root numbers every node with a shared
 * counter: `lft` on entry, `rgt` once all children are closed. Rows are
 * stored in `lft` order, so a subtree is the contiguous block of rows
 * starting at its root and ending before the first row whose `lft` exceeds
 * the root's `rgt`, found by binary search.
 *
 * Nodes unreachable from the root are never numbered and are not part of
 * this index; the build report still lists them.
 */
export class IntervalIndex implements TaxonomyIndex {
  readonly kind = 'interval' as const;
  readonly report: BuildReport;
  private readonly rows: readonly TaxonNode[];
  private readonly depthColumn: Uint32Array;
  private readonly lftColumn: Uint32Array;
  private readonly rgtColumn: Uint32Array;
  private readonly rowOf = new Map<TaxonId, number>();

  constructor(columns: IntervalColumns) {
    const count = columns.nodes.length;
    if (
      count === 0 ||
      columns.depth.length !== count ||
      columns.lft.length !== count ||
      columns.rgt.length !== count
    ) {
      throw new RangeError(`Interval columns must hold the same, non-zero number of rows (nodes: ${count})`);
    }

    this.rows = columns.nodes;
    this.depthColumn = columns.depth;
    this.lftColumn = columns.lft;
    this.rgtColumn = columns.rgt;
    this.report = columns.report;
    columns.nodes.forEach((node, row) => {
      this.rowOf.set(node.id, row);
    });
  }

  /**
   * Number a linked hierarchy with an explicit stack (no recursion)
   */
  static fromHierarchy(hierarchy: Hierarchy): IntervalIndex {
    const count = hierarchy.reachable.size;
    const nodes: TaxonNode[] = [];
    const depth = new Uint32Array(count);
    const lft = new Uint32Array(count);
    const rgt = new Uint32Array(count);

    // traversal frames: row of the open node and the next child to visit
    const frameRows: number[] = [];
    const frameNext: number[] = [];
    let counter = 0;

    const open = (id: TaxonId, level: number): void => {
      const node = hierarchy.nodes.get(id);
      if (node === undefined) {
        throw new UnknownTaxonIdError([id]);
      }
      const row = nodes.length;
      nodes.push(node);
      depth[row] = level;
      lft[row] = ++counter;
      frameRows.push(row);
      frameNext.push(0);
    };

    open(hierarchy.rootId, 0);
    while (frameRows.length > 0) {
      const top = frameRows.length - 1;
      const row = frameRows[top] ?? 0;
      const next = frameNext[top] ?? 0;
      const node = nodes[row];
      const children = node === undefined ? [] : childIdsOf(hierarchy, node.id);

      const child = children[next];
      if (child !== undefined) {
        frameNext[top] = next + 1;
        open(child, cell(depth, row) + 1);
      } else {
        rgt[row] = ++counter;
        frameRows.pop();
        frameNext.pop();
      }
    }

    return new IntervalIndex({ nodes, depth, lft, rgt, report: hierarchy.report });
  }

  static fromRecords(records: Iterable<TaxonNode>, options: BuildOptions = {}): IntervalIndex {
    return IntervalIndex.fromHierarchy(buildHierarchy(records, options));
  }

  get rootId(): TaxonId {
    const root = this.rows[0];
    if (root === undefined) {
      throw new RangeError('Interval index has no rows');
    }
    return root.id;
  }

  get size(): number {
    return this.rows.length;
  }

  get(id: TaxonId): TaxonNode | undefined {
    const row = this.rowOf.get(id);
    return row === undefined ? undefined : this.rows[row];
  }

  contains(id: TaxonId): boolean {
    return this.rowOf.has(id);
  }

  ids(): IterableIterator<TaxonId> {
    return this.rowOf.keys();
  }

  nodes(): IterableIterator<TaxonNode> {
    return this.rows.values();
  }

  intervalOf(id: TaxonId): Interval | undefined {
    const row = this.rowOf.get(id);
    if (row === undefined) return undefined;
    return {
      depth: cell(this.depthColumn, row),
      lft: cell(this.lftColumn, row),
      rgt: cell(this.rgtColumn, row),
    };
  }

  childrenOf(id: TaxonId): Set<TaxonId> {
    const row = this.require(id);
    const end = this.blockEnd(row);
    const children = new Set<TaxonId>();

    // each child's block ends where its next sibling starts
    for (let child = row + 1; child < end; child = this.blockEnd(child)) {
      children.add(this.idAt(child));
    }
    return children;
  }

  subtreeOf(id: TaxonId): Set<TaxonId> {
    const row = this.require(id);
    const subtree = new Set<TaxonId>();
    this.collectBlock(row, subtree);
    return subtree;
  }

  subtreesOf(ids: Iterable<TaxonId>): Set<TaxonId> {
    const result = new Set<TaxonId>();
    for (const row of this.outermostRows(ids)) {
      this.collectBlock(row, result);
    }
    return result;
  }

  /**
   * The requested ids minus those nested in another requested id's subtree,
   * in `lft` order. Scanning only these gives the same union as scanning all.
   */
  outermostOf(ids: Iterable<TaxonId>): TaxonId[] {
    return this.outermostRows(ids).map((row) => this.idAt(row));
  }

  ancestorsOf(id: TaxonId): TaxonId[] {
    let row = this.require(id);
    const lineage: TaxonId[] = [];

    for (;;) {
      const node = this.rows[row];
      if (node === undefined) break;
      lineage.push(node.id);
      const parentRow = this.rowOf.get(node.parentId);
      if (parentRow === undefined || parentRow === row) break;
      row = parentRow;
    }

    return lineage.reverse();
  }

  filter(keep: Iterable<TaxonId>, options: FilterOptions = {}): IntervalIndex {
    // every numbered node is connected to the root
    const selected = selectFilteredNodes(this, keep, options, () => true);
    return IntervalIndex.fromRecords(selected, { rootId: this.rootId });
  }

  toColumns(): IntervalColumns {
    return {
      nodes: this.rows,
      depth: this.depthColumn,
      lft: this.lftColumn,
      rgt: this.rgtColumn,
      report: this.report,
    };
  }

  private outermostRows(ids: Iterable<TaxonId>): number[] {
    const rows: number[] = [];
    const unknown: TaxonId[] = [];
    for (const id of new Set(ids)) {
      const row = this.rowOf.get(id);
      if (row === undefined) {
        unknown.push(id);
      } else {
        rows.push(row);
      }
    }
    if (unknown.length > 0) {
      throw new UnknownTaxonIdError(unknown);
    }

    // rows are stored in lft order, so sorting rows sorts intervals
    rows.sort((a, b) => a - b);
    const outermost: number[] = [];
    let boundary = 0;
    for (const row of rows) {
      if (cell(this.lftColumn, row) < boundary) continue;
      outermost.push(row);
      boundary = cell(this.rgtColumn, row);
    }
    return outermost;
  }

  /**
   * First row after the subtree rooted at `row`: binary search for the
   * first `lft` greater than the root's `rgt`
   */
  private blockEnd(row: number): number {
    const rgt = cell(this.rgtColumn, row);
    let low = row + 1;
    let high = this.rows.length;

    while (low < high) {
      const mid = (low + high) >>> 1;
      if (cell(this.lftColumn, mid) < rgt) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low;
  }

  private collectBlock(row: number, into: Set<TaxonId>): void {
    const end = this.blockEnd(row);
    for (let current = row; current < end; current++) {
      into.add(this.idAt(current));
    }
  }

  private idAt(row: number): TaxonId {
    const node = this.rows[row];
    if (node === undefined) {
      throw new RangeError(`Row ${row} is outside the interval table (${this.rows.length} rows)`);
    }
    return node.id;
  }

  private require(id: TaxonId): number {
    const row = this.rowOf.get(id);
    if (row === undefined) {
      throw new UnknownTaxonIdError([id]);
    }
    return row;
  }
}
