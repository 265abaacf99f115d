import { UnknownTaxonIdError } from '../errors/taxonomy.js';
import type { TaxonId, TaxonNode } from '../schemas/taxon.js';
import { createModuleLogger } from '../utils/logger.js';
import type { FilterOptions, TaxonomyIndex } from './TaxonomyIndex.js';

const log = createModuleLogger('filter');

/**
 * Select the nodes a filtered index keeps: the root, the lineage of every
 * keep-id and every keep-id's subtree. Nodes come back in the source
 * index's storage order so that rebuilding preserves sibling order.
 *
 * Keep-ids that exist but hang off no path to the root are dropped: keeping
 * them would leave a node whose parent is missing from the result.
 */
export function selectFilteredNodes(
  index: TaxonomyIndex,
  keep: Iterable<TaxonId>,
  options: FilterOptions,
  isReachable: (id: TaxonId) => boolean
): TaxonNode[] {
  const ignoreInvalid = options.ignoreInvalid ?? true;
  const requested = new Set(keep);

  const unknown: TaxonId[] = [];
  const detached: TaxonId[] = [];
  const valid: TaxonId[] = [];
  for (const id of requested) {
    if (!index.contains(id)) {
      unknown.push(id);
    } else if (!isReachable(id)) {
      detached.push(id);
    } else {
      valid.push(id);
    }
  }

  if (unknown.length > 0) {
    if (!ignoreInvalid) {
      throw new UnknownTaxonIdError(unknown, 'keep');
    }
    log.warn({ count: unknown.length, ids: unknown.slice(0, 10) }, `Skipped ${unknown.length} unknown keep id(s)`);
  }
  if (detached.length > 0) {
    log.warn(
      { count: detached.length, ids: detached.slice(0, 10) },
      `Skipped ${detached.length} keep id(s) not connected to the root`
    );
  }

  const kept = index.subtreesOf(valid);
  kept.add(index.rootId);
  for (const id of valid) {
    for (const ancestor of index.ancestorsOf(id)) {
      kept.add(ancestor);
    }
  }

  const selected: TaxonNode[] = [];
  for (const node of index.nodes()) {
    if (kept.has(node.id)) {
      selected.push(node);
    }
  }
  return selected;
}
