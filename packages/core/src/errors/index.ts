/**
 * Centralized error handling for taxindex
 */

export {
  TaxindexError,
  extractErrorDetails,
} from './base.js';

export {
  TaxonomyError,
  MalformedRecordError,
  DumpArchiveError,
  DuplicateIdError,
  RootNotFoundError,
  OrphanNodeError,
  UnknownTaxonIdError,
  SnapshotError,
  describeIds,
  type MalformedLine,
  type QueryStage,
} from './taxonomy.js';
