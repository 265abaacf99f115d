import type { Logger } from 'pino';
import { type QueryStage, UnknownTaxonIdError } from '../errors/taxonomy.js';
import { type TaxonIdSource, resolveTaxonIds } from '../parser/id-list.js';
import type { TaxonId } from '../schemas/taxon.js';
import type { TaxonomyIndex } from '../taxonomy/TaxonomyIndex.js';
import { createModuleLogger } from '../utils/logger.js';

export interface SearchRequest {
  /** Ids whose subtrees make up the result */
  include: TaxonIdSource;
  /** Ids whose subtrees are removed from the result */
  exclude?: TaxonIdSource | undefined;
  /** Literal ids the result is intersected with (no subtree expansion) */
  filter?: TaxonIdSource | undefined;
  /** Drop unknown ids from each stage instead of failing the call */
  ignoreInvalid?: boolean | undefined;
}

export interface ValidateOptions {
  /** Ids that count as valid even when the index does not hold them */
  accept?: TaxonIdSource | undefined;
}

/**
 * Include / exclude / filter set algebra over a TaxonomyIndex.
 *
 * Stages run strictly in order:
 * 1. include: union of each id and its subtree
 * 2. exclude: minus the union of each id and its subtree
 * 3. filter: intersected with the literal ids
 *
 * A search always contains each include id itself, whatever its rank.
 */
export class QueryEngine {
  private readonly log: Logger;

  constructor(
    private readonly index: TaxonomyIndex,
    logger?: Logger
  ) {
    this.log = logger ?? createModuleLogger('query');
  }

  search(request: SearchRequest): Set<TaxonId> {
    const ignoreInvalid = request.ignoreInvalid ?? false;

    const include = this.stageInput(request.include, 'include', ignoreInvalid);
    const result = this.index.subtreesOf(include);

    if (request.exclude !== undefined) {
      const exclude = this.stageInput(request.exclude, 'exclude', ignoreInvalid);
      for (const id of this.index.subtreesOf(exclude)) {
        result.delete(id);
      }
    }

    if (request.filter !== undefined) {
      const filter = new Set(this.stageInput(request.filter, 'filter', ignoreInvalid));
      for (const id of result) {
        if (!filter.has(id)) {
          result.delete(id);
        }
      }
    }

    this.log.debug({ include: include.length, found: result.size }, 'Search completed');
    return result;
  }

  /**
   * True iff every id is present in the index or listed in `accept`
   */
  validate(ids: TaxonIdSource, options: ValidateOptions = {}): boolean {
    return this.findUnknown(ids, options).length === 0;
  }

  /**
   * Ids absent from both the index and `accept`, de-duplicated, in input order
   */
  findUnknown(ids: TaxonIdSource, options: ValidateOptions = {}): TaxonId[] {
    const accepted = new Set(options.accept === undefined ? [] : resolveTaxonIds(options.accept));
    const unknown = new Set<TaxonId>();
    for (const id of resolveTaxonIds(ids)) {
      if (!this.index.contains(id) && !accepted.has(id)) {
        unknown.add(id);
      }
    }
    return [...unknown];
  }

  private stageInput(source: TaxonIdSource, stage: QueryStage, ignoreInvalid: boolean): TaxonId[] {
    const ids = [...new Set(resolveTaxonIds(source))];
    const unknown = ids.filter((id) => !this.index.contains(id));
    if (unknown.length === 0) {
      return ids;
    }

    if (!ignoreInvalid) {
      throw new UnknownTaxonIdError(unknown, stage);
    }
    this.log.warn({ stage, count: unknown.length, ids: unknown.slice(0, 10) }, `Ignored ${unknown.length} unknown id(s)`);
    return ids.filter((id) => this.index.contains(id));
  }
}
