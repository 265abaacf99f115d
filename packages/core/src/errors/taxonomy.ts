/**
 * Taxonomy-specific error classes
 *
 * Parse and build anomalies are collected into a BuildReport and only become
 * exceptions where a build cannot go on; query errors abort a single call.
 */

import type { TaxonId } from '../schemas/taxon.js';
import { TaxindexError } from './base.js';

const LISTED_IDS = 10;

/**
 * Render ids for a message: the first ten, then a count of the rest
 */
export function describeIds(
  ids: readonly string[],
  limit: number = LISTED_IDS,
  quote = true
): string {
  const shown = ids
    .slice(0, limit)
    .map((id) => (quote ? `"${id}"` : id))
    .join(', ');
  const rest = ids.length - limit;
  return rest > 0 ? `${shown} … and ${rest} more` : shown;
}

/**
 * Base class for taxonomy errors
 */
export abstract class TaxonomyError extends TaxindexError {
  constructor(
    message: string,
    area: string,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(message, `taxonomy.${area}`, operation, context);
  }
}

/**
 * A dump line that does not carry the id, parent id and rank fields
 */
export interface MalformedLine {
  lineNumber: number;
  line: string;
  reason: string;
}

/**
 * Raised for malformed dump lines when a caller opts into strict parsing
 */
export class MalformedRecordError extends TaxonomyError {
  constructor(
    public readonly lines: readonly MalformedLine[],
    context?: Record<string, unknown>
  ) {
    const lineNumbers = lines.map((entry) => String(entry.lineNumber));
    super(
      `${lines.length} malformed dump record(s) at line(s) ${describeIds(lineNumbers, LISTED_IDS, false)}`,
      'parser',
      'parse',
      { ...context, count: lines.length }
    );
  }
}

/**
 * A `taxdmp.zip` archive that cannot be read or holds no dump entry
 */
export class DumpArchiveError extends TaxonomyError {
  constructor(
    message: string,
    public readonly archivePath: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'parser', 'unzip', { ...context, archivePath });
  }
}

/**
 * The same id declared more than once with a different parent or rank
 */
export class DuplicateIdError extends TaxonomyError {
  constructor(
    public readonly ids: readonly TaxonId[],
    context?: Record<string, unknown>
  ) {
    super(
      `${ids.length} taxon id(s) declared more than once with conflicting data: ${describeIds(ids)}`,
      'builder',
      'build',
      { ...context, ids: [...ids] }
    );
  }
}

/**
 * No usable self-parented root node
 */
export class RootNotFoundError extends TaxonomyError {
  constructor(
    public readonly rootId: TaxonId,
    public readonly candidates: readonly TaxonId[] = [],
    context?: Record<string, unknown>
  ) {
    super(
      candidates.length === 0
        ? `No root node found: no node has itself as parent (expected root "${rootId}")`
        : `Ambiguous root: ${describeIds(candidates)} are self-parented and none is "${rootId}"`,
      'builder',
      'build',
      { ...context, rootId, candidates: [...candidates] }
    );
  }
}

/**
 * Nodes whose parent is absent, for callers that require a connected dump
 */
export class OrphanNodeError extends TaxonomyError {
  constructor(
    public readonly ids: readonly TaxonId[],
    context?: Record<string, unknown>
  ) {
    super(
      `${ids.length} orphan node(s) reference a missing parent: ${describeIds(ids)}`,
      'builder',
      'build',
      { ...context, ids: [...ids] }
    );
  }
}

export type QueryStage = 'include' | 'exclude' | 'filter' | 'keep' | 'lookup';

/**
 * Ids that are not present in the index
 */
export class UnknownTaxonIdError extends TaxonomyError {
  constructor(
    public readonly ids: readonly TaxonId[],
    public readonly stage: QueryStage = 'lookup',
    context?: Record<string, unknown>
  ) {
    super(
      `${ids.length} taxon id(s) not found in the index (${stage}): ${describeIds(ids)}`,
      'query',
      stage,
      { ...context, ids: [...ids] }
    );
  }
}

/**
 * A snapshot that cannot be decoded or describes an invalid hierarchy
 */
export class SnapshotError extends TaxindexError {
  constructor(message: string, operation: string, context?: Record<string, unknown>) {
    super(message, 'snapshot', operation, context);
  }
}
