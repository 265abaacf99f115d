import { UnknownTaxonIdError } from '../errors/taxonomy.js';
import type { TaxonId, TaxonNode } from '../schemas/taxon.js';
import { selectFilteredNodes } from './filter.js';
import { type BuildOptions, type BuildReport, type Hierarchy, buildHierarchy } from './hierarchy-builder.js';
import type { FilterOptions, TaxonomyIndex } from './TaxonomyIndex.js';

const NO_CHILDREN: readonly TaxonId[] = [];

/**
 * Reference index: an id → node map plus a parent → children map.
 *
 * Subtree queries walk the children map with an explicit stack, so their
 * cost is proportional to the subtree size and deep trees cannot exhaust
 * the call stack. Orphans stay in the node map (`get`, `contains` and their
 * own `subtreeOf` work) but are never reachable from the root.
 */
export class AdjacencyIndex implements TaxonomyIndex {
  readonly kind = 'adjacency' as const;
  private readonly hierarchy: Hierarchy;

  constructor(hierarchy: Hierarchy) {
    this.hierarchy = hierarchy;
  }

  static fromRecords(records: Iterable<TaxonNode>, options: BuildOptions = {}): AdjacencyIndex {
    return new AdjacencyIndex(buildHierarchy(records, options));
  }

  get rootId(): TaxonId {
    return this.hierarchy.rootId;
  }

  get size(): number {
    return this.hierarchy.nodes.size;
  }

  get report(): BuildReport {
    return this.hierarchy.report;
  }

  get(id: TaxonId): TaxonNode | undefined {
    return this.hierarchy.nodes.get(id);
  }

  contains(id: TaxonId): boolean {
    return this.hierarchy.nodes.has(id);
  }

  ids(): IterableIterator<TaxonId> {
    return this.hierarchy.nodes.keys();
  }

  nodes(): IterableIterator<TaxonNode> {
    return this.hierarchy.nodes.values();
  }

  /**
   * Whether `id` hangs off the root through present parents
   */
  isReachable(id: TaxonId): boolean {
    return this.hierarchy.reachable.has(id);
  }

  childrenOf(id: TaxonId): Set<TaxonId> {
    this.require(id);
    return new Set(this.hierarchy.children.get(id) ?? NO_CHILDREN);
  }

  subtreeOf(id: TaxonId): Set<TaxonId> {
    this.require(id);
    const subtree = new Set<TaxonId>();
    this.collectSubtree(id, subtree);
    return subtree;
  }

  subtreesOf(ids: Iterable<TaxonId>): Set<TaxonId> {
    const roots = [...ids];
    const unknown = roots.filter((id) => !this.contains(id));
    if (unknown.length > 0) {
      throw new UnknownTaxonIdError(unknown);
    }

    const result = new Set<TaxonId>();
    for (const id of roots) {
      // already collected as part of an earlier subtree
      if (result.has(id)) continue;
      this.collectSubtree(id, result);
    }
    return result;
  }

  ancestorsOf(id: TaxonId): TaxonId[] {
    let node = this.require(id);
    const lineage: TaxonId[] = [node.id];
    const seen = new Set<TaxonId>(lineage);

    while (node.parentId !== node.id) {
      const parent = this.hierarchy.nodes.get(node.parentId);
      // missing parent, or a detached cycle
      if (parent === undefined || seen.has(parent.id)) break;
      lineage.push(parent.id);
      seen.add(parent.id);
      node = parent;
    }

    return lineage.reverse();
  }

  filter(keep: Iterable<TaxonId>, options: FilterOptions = {}): AdjacencyIndex {
    const selected = selectFilteredNodes(this, keep, options, (id) => this.isReachable(id));
    return AdjacencyIndex.fromRecords(selected, { rootId: this.rootId });
  }

  /**
   * Raw hierarchy, shared with the interval numbering and the snapshot writer
   */
  toHierarchy(): Hierarchy {
    return this.hierarchy;
  }

  private collectSubtree(id: TaxonId, into: Set<TaxonId>): void {
    into.add(id);
    const stack: TaxonId[] = [id];

    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      for (const child of this.hierarchy.children.get(current) ?? NO_CHILDREN) {
        if (into.has(child)) continue;
        into.add(child);
        stack.push(child);
      }
    }
  }

  private require(id: TaxonId): TaxonNode {
    const node = this.hierarchy.nodes.get(id);
    if (node === undefined) {
      throw new UnknownTaxonIdError([id]);
    }
    return node;
  }
}
