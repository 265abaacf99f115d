import type { IndexVariant, TaxonNode } from '../schemas/taxon.js';
import { cfg } from '../utils/config.js';
import { createModuleLogger, startTimer } from '../utils/logger.js';
import { AdjacencyIndex } from './AdjacencyIndex.js';
import { type BuildOptions, type Hierarchy, buildHierarchy } from './hierarchy-builder.js';
import { IntervalIndex } from './IntervalIndex.js';
import type { TaxonomyIndex } from './TaxonomyIndex.js';

const log = createModuleLogger('index');

export interface IndexBuildOptions extends BuildOptions {
  variant?: IndexVariant;
}

/**
 * Wrap a linked hierarchy in the requested index variant
 */
export function createIndex(hierarchy: Hierarchy, variant: IndexVariant = cfg.TAXONOMY_INDEX_VARIANT): TaxonomyIndex {
  switch (variant) {
    case 'adjacency':
      return new AdjacencyIndex(hierarchy);
    case 'interval':
      return IntervalIndex.fromHierarchy(hierarchy);
  }
}

/**
 * Parse-to-index build path: link the records, then pick the variant
 */
export function buildIndex(records: Iterable<TaxonNode>, options: IndexBuildOptions = {}): TaxonomyIndex {
  const { variant = cfg.TAXONOMY_INDEX_VARIANT, ...buildOptions } = options;
  const done = startTimer(log, 'buildIndex');

  const index = createIndex(buildHierarchy(records, buildOptions), variant);

  done({ variant, nodes: index.size, orphans: index.report.orphans.length });
  return index;
}

/**
 * Same nodes, other variant. The source index is left as it is.
 */
export function convertIndex(index: TaxonomyIndex, variant: IndexVariant): TaxonomyIndex {
  if (index.kind === variant) return index;
  if (index instanceof AdjacencyIndex) {
    return createIndex(index.toHierarchy(), variant);
  }
  return buildIndex(index.nodes(), { variant, rootId: index.rootId });
}
