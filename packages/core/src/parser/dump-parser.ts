import { createReadStream } from 'node:fs';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { MalformedRecordError, type MalformedLine } from '../errors/taxonomy.js';
import type { TaxonNode } from '../schemas/taxon.js';
import { isDumpArchive, openDumpEntry } from './dump-archive.js';
import { cfg } from '../utils/config.js';

/**
 * Reader for NCBI `nodes.dmp` records.
 *
 * Each line holds `tax_id \t|\t parent_tax_id \t|\t rank \t|\t ...`; only the
 * first three fields are used. Malformed lines never abort a parse: they are
 * collected and reported once with the rest of the build anomalies.
 */

export const DUMP_FIELD_COUNT = 3;

export interface DumpParseOptions {
  /** Field separator, `"\t|"` unless configured otherwise */
  delimiter?: string;
}

export interface DumpParseResult {
  records: TaxonNode[];
  malformed: MalformedLine[];
  lineCount: number;
}

/**
 * Split one dump line into trimmed fields, dropping the empty field left
 * behind by the trailing record terminator.
 */
export function splitDumpLine(line: string, delimiter: string = cfg.TAXONOMY_DUMP_DELIMITER): string[] {
  const fields = line.split(delimiter).map((field) => field.trim());
  if (fields.length > 1 && fields[fields.length - 1] === '') {
    fields.pop();
  }
  return fields;
}

/**
 * Incremental parser, fed one line at a time
 */
export class DumpParser {
  private readonly delimiter: string;
  private readonly records: TaxonNode[] = [];
  private readonly malformed: MalformedLine[] = [];
  private lineNumber = 0;

  constructor(options: DumpParseOptions = {}) {
    this.delimiter = options.delimiter ?? cfg.TAXONOMY_DUMP_DELIMITER;
  }

  accept(rawLine: string): void {
    this.lineNumber++;
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    if (line.trim() === '') return;

    const fields = splitDumpLine(line, this.delimiter);
    const [id, parentId, rank] = fields;
    if (id === undefined || parentId === undefined || rank === undefined) {
      this.reject(line, `expected at least ${DUMP_FIELD_COUNT} fields, found ${fields.length}`);
      return;
    }
    if (id === '') {
      this.reject(line, 'empty tax_id field');
      return;
    }
    if (parentId === '') {
      this.reject(line, 'empty parent_tax_id field');
      return;
    }

    this.records.push({ id, parentId, rank });
  }

  result(): DumpParseResult {
    return {
      records: this.records,
      malformed: this.malformed,
      lineCount: this.lineNumber,
    };
  }

  private reject(line: string, reason: string): void {
    this.malformed.push({ lineNumber: this.lineNumber, line, reason });
  }
}

export function parseDumpLines(lines: Iterable<string>, options: DumpParseOptions = {}): DumpParseResult {
  const parser = new DumpParser(options);
  for (const line of lines) {
    parser.accept(line);
  }
  return parser.result();
}

export function parseDumpText(text: string, options: DumpParseOptions = {}): DumpParseResult {
  const lines = text.split('\n');
  // a final newline terminates the last record, it does not open another
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return parseDumpLines(lines, options);
}

/**
 * Stream a `nodes.dmp` file from disk, or its entry inside a `taxdmp.zip`
 */
export async function readDumpFile(path: string, options: DumpParseOptions = {}): Promise<DumpParseResult> {
  const input = isDumpArchive(path) ? await openDumpEntry(path) : createReadStream(path);
  return readDumpStream(input, options);
}

export async function readDumpStream(input: Readable, options: DumpParseOptions = {}): Promise<DumpParseResult> {
  const parser = new DumpParser(options);
  input.setEncoding('utf8');
  const lines = createInterface({ input, crlfDelay: Number.POSITIVE_INFINITY });

  for await (const line of lines) {
    parser.accept(line);
  }
  return parser.result();
}

/**
 * Strict mode for callers that cannot tolerate skipped lines
 */
export function assertNoMalformed(result: DumpParseResult): void {
  if (result.malformed.length > 0) {
    throw new MalformedRecordError(result.malformed);
  }
}
