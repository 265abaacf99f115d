import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parseDumpText } from '../src/parser/dump-parser.js';
import type { TaxonNode } from '../src/schemas/taxon.js';

/**
 * Shared mock taxonomy (test/fixtures/nodes.dmp), 18 nodes:
 *
 *   1 (root)
 *   ├── 2 ── 3 ── 6
 *   └── 4
 *       ├── 10
 *       │   ├── 20
 *       │   │   ├── 24 ── 25 ── 26 ── 27
 *       │   │   └── 28 ── 29
 *       │   └── 21 ── 30
 *       └── 11
 *           ├── 31
 *           └── 32
 *
 * Subtree of "4": 14 nodes. Subtree of "24": 4 nodes. "29" is a leaf.
 */
export const NODES_DMP = fileURLToPath(new URL('./fixtures/nodes.dmp', import.meta.url));

/** The same dump inside a zip archive, next to a names.dmp entry */
export const TAXDMP_ZIP = fileURLToPath(new URL('./fixtures/taxdmp.zip', import.meta.url));

/** An archive without a nodes.dmp entry */
export const NAMES_ONLY_ZIP = fileURLToPath(new URL('./fixtures/names-only.zip', import.meta.url));

export const NODE_COUNT = 18;

export const SUBTREE_OF_4 = ['4', '10', '20', '24', '25', '26', '27', '28', '29', '21', '30', '11', '31', '32'];

export const SUBTREE_OF_24 = ['24', '25', '26', '27'];

export function fixtureRecords(): TaxonNode[] {
  return parseDumpText(readFileSync(NODES_DMP, 'utf8')).records;
}

/**
 * One `nodes.dmp` line in the NCBI layout
 */
export function dumpLine(id: string, parentId: string, rank: string): string {
  return `${id}\t|\t${parentId}\t|\t${rank}\t|\t\t|\t0\t|`;
}

export function node(id: string, parentId: string, rank = 'no rank'): TaxonNode {
  return { id, parentId, rank };
}

export interface TempDir {
  path: string;
  file(name: string, content?: string): string;
  cleanup(): void;
}

export function createTempDir(): TempDir {
  const path = mkdtempSync(join(tmpdir(), 'taxindex-test-'));
  return {
    path,
    file(name: string, content?: string): string {
      const target = join(path, name);
      if (content !== undefined) {
        writeFileSync(target, content);
      }
      return target;
    },
    cleanup(): void {
      rmSync(path, { recursive: true, force: true });
    },
  };
}

export function sorted(ids: Iterable<string>): string[] {
  return [...ids].sort((a, b) => Number(a) - Number(b));
}
