/**
 * taxindex core - hierarchical index and set queries over the NCBI Taxonomy
 *
 * Build path:   nodes.dmp → parser → hierarchy builder → index
 * Query path:   index → query engine (include / exclude / filter / validate)
 * Persistence:  index ⇄ snapshot (MessagePack or JSON)
 */

// Facade
export { TaxonResolver, type TaxonResolverOptions } from './TaxonResolver.js';

// Indexes
export type { TaxonomyIndex, FilterOptions } from './taxonomy/TaxonomyIndex.js';
export { AdjacencyIndex } from './taxonomy/AdjacencyIndex.js';
export { IntervalIndex, type Interval, type IntervalColumns } from './taxonomy/IntervalIndex.js';
export { buildIndex, createIndex, convertIndex, type IndexBuildOptions } from './taxonomy/create-index.js';
export {
  buildHierarchy,
  assertNoOrphans,
  type BuildOptions,
  type BuildReport,
  type DuplicateConflict,
  type Hierarchy,
} from './taxonomy/hierarchy-builder.js';
export { RankTable, NCBI_RANKS, NO_RANK, isKnownRank } from './taxonomy/ranks.js';

// Queries
export { QueryEngine, type SearchRequest, type ValidateOptions } from './services/QueryEngine.js';

// Parsing
export {
  DumpParser,
  splitDumpLine,
  parseDumpLines,
  parseDumpText,
  readDumpFile,
  readDumpStream,
  assertNoMalformed,
  type DumpParseOptions,
  type DumpParseResult,
} from './parser/dump-parser.js';
export { openDumpEntry, isDumpArchive, DUMP_ENTRY } from './parser/dump-archive.js';
export {
  parseTaxonIdList,
  readTaxonIdList,
  resolveTaxonIds,
  isIdListFile,
  type IdListFile,
  type IdListOptions,
  type TaxonIdSource,
} from './parser/id-list.js';

// Snapshots
export {
  encodeSnapshot,
  decodeSnapshot,
  detectSnapshotFormat,
  writeSnapshot,
  loadSnapshot,
  snapshotSchema,
  type SnapshotDocument,
} from './snapshot/snapshot.js';

// Schemas and types
export {
  taxonId,
  taxonNodeSchema,
  indexVariant,
  duplicatePolicy,
  snapshotFormat,
  type TaxonId,
  type Rank,
  type TaxonNode,
  type IndexVariant,
  type DuplicatePolicy,
  type SnapshotFormat,
} from './schemas/taxon.js';

// Errors
export * from './errors/index.js';

// Configuration and logging
export { cfg, configSchema, parseConfig, type AppConfig } from './utils/config.js';
export {
  logger,
  createModuleLogger,
  createLoggerFactory,
  LoggerFactory,
  startTimer,
  type Logger,
} from './utils/logger.js';
