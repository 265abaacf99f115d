import type { IndexVariant, TaxonId, TaxonNode } from '../schemas/taxon.js';
import type { BuildReport } from './hierarchy-builder.js';

/**
 * Common contract of the subtree indexes.
 *
 * `AdjacencyIndex` is the reference implementation (parent → children maps,
 * subtree queries walk the tree). `IntervalIndex` answers the same queries
 * from a nested-set numbering (subtree = contiguous range of rows).
 * Both are immutable: `filter` returns a new index and leaves the source
 * untouched.
 */
export interface TaxonomyIndex {
  readonly kind: IndexVariant;
  readonly rootId: TaxonId;
  /** Number of nodes held */
  readonly size: number;
  /** Anomalies seen while the index was built or re-linked */
  readonly report: BuildReport;

  get(id: TaxonId): TaxonNode | undefined;
  contains(id: TaxonId): boolean;
  ids(): IterableIterator<TaxonId>;
  nodes(): IterableIterator<TaxonNode>;

  /**
   * Direct children of `id`
   * @throws UnknownTaxonIdError when `id` is not in the index
   */
  childrenOf(id: TaxonId): Set<TaxonId>;

  /**
   * `id` and all of its transitive descendants
   * @throws UnknownTaxonIdError when `id` is not in the index
   */
  subtreeOf(id: TaxonId): Set<TaxonId>;

  /**
   * Union of `subtreeOf` over `ids`; every id must be present
   * @throws UnknownTaxonIdError naming the ids that are not
   */
  subtreesOf(ids: Iterable<TaxonId>): Set<TaxonId>;

  /**
   * Lineage of `id`, root first and `id` last. For a node cut off from the
   * root the path stops at the topmost ancestor still present.
   * @throws UnknownTaxonIdError when `id` is not in the index
   */
  ancestorsOf(id: TaxonId): TaxonId[];

  /**
   * Reduce the index to the ancestor paths and subtrees of `keep`
   */
  filter(keep: Iterable<TaxonId>, options?: FilterOptions): TaxonomyIndex;
}

export interface FilterOptions {
  /** Skip unknown keep-ids instead of failing (default true) */
  ignoreInvalid?: boolean;
}
