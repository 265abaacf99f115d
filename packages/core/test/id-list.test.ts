import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { isIdListFile, parseTaxonIdList, readTaxonIdList, resolveTaxonIds } from '../src/parser/id-list.js';
import { type TempDir, createTempDir } from './fixtures.js';

describe('parseTaxonIdList', () => {
  it('reads one id per line, skipping comments and blank lines', () => {
    const text = '# bacteria of interest\n562\n\n  1280  \n#9606\n2\n';

    expect(parseTaxonIdList(text)).toEqual(['562', '1280', '2']);
  });

  it('handles CRLF line endings', () => {
    expect(parseTaxonIdList('10\r\n20\r\n')).toEqual(['10', '20']);
  });

  it('takes a single field when a separator is given', () => {
    const text = 'sample_a\t562\nsample_b\t1280\nsample_c\n';

    expect(parseTaxonIdList(text, { separator: '\t', field: 1 })).toEqual(['562', '1280']);
  });

  it('defaults to the first field', () => {
    expect(parseTaxonIdList('562,E. coli\n1280,S. aureus', { separator: ',' })).toEqual(['562', '1280']);
  });

  it('rejects a negative field index', () => {
    expect(() => parseTaxonIdList('1', { separator: ',', field: -1 })).toThrow();
  });

  it('keeps duplicates and order for the caller to decide', () => {
    expect(parseTaxonIdList('3\n1\n3')).toEqual(['3', '1', '3']);
  });
});

describe('id sources', () => {
  let dir: TempDir;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    dir.cleanup();
  });

  it('reads a list file from disk', () => {
    const path = dir.file('ids.txt', '4\n# comment\n24\n');

    expect(readTaxonIdList(path)).toEqual(['4', '24']);
  });

  it('tells list files from literal ids', () => {
    expect(isIdListFile({ path: 'ids.txt' })).toBe(true);
    expect(isIdListFile(['1'])).toBe(false);
    expect(isIdListFile(new Set(['1']))).toBe(false);
  });

  it('resolves arrays, sets and files to id arrays', () => {
    const path = dir.file('ids.tsv', 'x\t29\ny\t30\n');

    expect(resolveTaxonIds(['2', '1'])).toEqual(['2', '1']);
    expect(resolveTaxonIds(new Set(['5', '6']))).toEqual(['5', '6']);
    expect(resolveTaxonIds({ path, separator: '\t', field: 1 })).toEqual(['29', '30']);
  });
});
