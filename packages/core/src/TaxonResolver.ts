import type { Logger } from 'pino';
import { type MalformedLine, UnknownTaxonIdError } from './errors/taxonomy.js';
import { type DumpParseOptions, readDumpFile } from './parser/dump-parser.js';
import { type TaxonIdSource, resolveTaxonIds } from './parser/id-list.js';
import type { DuplicatePolicy, IndexVariant, SnapshotFormat, TaxonId, TaxonNode } from './schemas/taxon.js';
import { QueryEngine, type SearchRequest, type ValidateOptions } from './services/QueryEngine.js';
import { loadSnapshot, writeSnapshot } from './snapshot/snapshot.js';
import { buildIndex, convertIndex } from './taxonomy/create-index.js';
import type { BuildReport } from './taxonomy/hierarchy-builder.js';
import type { FilterOptions, TaxonomyIndex } from './taxonomy/TaxonomyIndex.js';
import { cfg } from './utils/config.js';
import { createModuleLogger, startTimer } from './utils/logger.js';

export interface TaxonResolverOptions {
  variant?: IndexVariant;
  rootId?: TaxonId;
  duplicatePolicy?: DuplicatePolicy;
  delimiter?: string;
  logger?: Logger;
}

/**
 * Entry point tying the pieces together: build or load an index, then
 * filter, search and validate against it.
 *
 * A resolver wraps one immutable index. `filter` returns a new resolver and
 * leaves this one usable; keeping or dropping the full tree is up to the
 * caller.
 */
export class TaxonResolver {
  readonly index: TaxonomyIndex;
  private readonly engine: QueryEngine;
  private readonly log: Logger;

  constructor(index: TaxonomyIndex, logger?: Logger) {
    this.index = index;
    this.log = logger ?? createModuleLogger('resolver');
    this.engine = new QueryEngine(index, this.log);
  }

  /**
   * Build from an NCBI `nodes.dmp` file, or the `taxdmp.zip` archive holding one
   */
  static async build(dumpPath: string, options: TaxonResolverOptions = {}): Promise<TaxonResolver> {
    const log = options.logger ?? createModuleLogger('resolver');
    const done = startTimer(log, 'build');
    const parseOptions: DumpParseOptions = options.delimiter === undefined ? {} : { delimiter: options.delimiter };
    const parsed = await readDumpFile(dumpPath, parseOptions);

    const resolver = TaxonResolver.fromRecords(parsed.records, { ...options, logger: log }, parsed.malformed);
    done({ dumpPath, lines: parsed.lineCount, nodes: resolver.index.size });
    return resolver;
  }

  static fromRecords(
    records: Iterable<TaxonNode>,
    options: TaxonResolverOptions = {},
    malformed: MalformedLine[] = []
  ): TaxonResolver {
    const index = buildIndex(records, {
      variant: options.variant ?? cfg.TAXONOMY_INDEX_VARIANT,
      rootId: options.rootId ?? cfg.TAXONOMY_ROOT_ID,
      duplicatePolicy: options.duplicatePolicy ?? cfg.TAXONOMY_DUPLICATE_POLICY,
      malformed,
      ...(options.logger ? { logger: options.logger } : {}),
    });
    return new TaxonResolver(index, options.logger);
  }

  /**
   * Load a snapshot written by `write`, optionally converting it to another variant
   */
  static async load(path: string, format?: SnapshotFormat, variant?: IndexVariant): Promise<TaxonResolver> {
    const index = await loadSnapshot(path, format);
    return new TaxonResolver(variant === undefined ? index : convertIndex(index, variant));
  }

  get report(): BuildReport {
    return this.index.report;
  }

  async write(path: string, format: SnapshotFormat = cfg.TAXONOMY_SNAPSHOT_FORMAT): Promise<void> {
    await writeSnapshot(path, this.index, format);
  }

  /**
   * New resolver over the ancestor paths and subtrees of `keep`
   */
  filter(keep: TaxonIdSource, options: FilterOptions = {}): TaxonResolver {
    const done = startTimer(this.log, 'filter');
    const filtered = this.index.filter(resolveTaxonIds(keep), options);
    done({ before: this.index.size, after: filtered.size });
    return new TaxonResolver(filtered, this.log);
  }

  search(request: SearchRequest): Set<TaxonId> {
    return this.engine.search(request);
  }

  validate(ids: TaxonIdSource, options: ValidateOptions = {}): boolean {
    return this.engine.validate(ids, options);
  }

  findUnknown(ids: TaxonIdSource, options: ValidateOptions = {}): TaxonId[] {
    return this.engine.findUnknown(ids, options);
  }

  validateByTaxId(id: TaxonId): boolean {
    return this.index.contains(id);
  }

  /**
   * @throws UnknownTaxonIdError when the id is not in the index
   */
  findByTaxId(id: TaxonId): TaxonNode {
    const node = this.index.get(id);
    if (node === undefined) {
      throw new UnknownTaxonIdError([id]);
    }
    return node;
  }
}
