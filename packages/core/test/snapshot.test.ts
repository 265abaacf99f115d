import { readFileSync } from 'node:fs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SnapshotError } from '../src/errors/taxonomy.js';
import type { IndexVariant, SnapshotFormat } from '../src/schemas/taxon.js';
import {
  SNAPSHOT_MAGIC,
  SNAPSHOT_VERSION,
  type SnapshotDocument,
  decodeSnapshot,
  detectSnapshotFormat,
  encodeSnapshot,
  fromSnapshotDocument,
  loadSnapshot,
  toSnapshotDocument,
  writeSnapshot,
} from '../src/snapshot/snapshot.js';
import { buildIndex } from '../src/taxonomy/create-index.js';
import { IntervalIndex } from '../src/taxonomy/IntervalIndex.js';
import { NODE_COUNT, type TempDir, createTempDir, fixtureRecords, node, sorted } from './fixtures.js';

const cases: [IndexVariant, SnapshotFormat][] = [
  ['adjacency', 'msgpack'],
  ['adjacency', 'json'],
  ['interval', 'msgpack'],
  ['interval', 'json'],
];

function jsonBytes(value: unknown): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(value));
}

describe('Snapshot round trip', () => {
  it.each(cases)('restores a %s index from %s', (variant, format) => {
    const index = buildIndex(fixtureRecords(), { variant });
    const restored = decodeSnapshot(encodeSnapshot(index, format));

    expect(restored.kind).toBe(variant);
    expect(restored.rootId).toBe('1');
    expect(restored.size).toBe(NODE_COUNT);
    expect(sorted(restored.ids())).toEqual(sorted(index.ids()));
    expect(restored.get('27')).toEqual({ id: '27', parentId: '26', rank: 'species' });
    expect(restored.subtreeOf('4').size).toBe(14);
    for (const id of index.ids()) {
      expect(restored.ancestorsOf(id)).toEqual(index.ancestorsOf(id));
      expect(sorted(restored.subtreeOf(id))).toEqual(sorted(index.subtreeOf(id)));
    }
  });

  it('keeps the stored interval numbering', () => {
    const index = IntervalIndex.fromRecords(fixtureRecords());
    const restored = decodeSnapshot(encodeSnapshot(index, 'msgpack'));

    expect(restored).toBeInstanceOf(IntervalIndex);
    if (restored instanceof IntervalIndex) {
      expect(restored.intervalOf('24')).toEqual({ depth: 4, lft: 11, rgt: 18 });
      expect([...restored.ids()]).toEqual([...index.ids()]);
    }
  });

  it('keeps orphans of an adjacency index', () => {
    const index = buildIndex([node('1', '1'), node('2', '1'), node('3', '99')], { variant: 'adjacency' });
    const restored = decodeSnapshot(encodeSnapshot(index, 'json'));

    expect(restored.contains('3')).toBe(true);
    expect(restored.report.orphans).toEqual(['3']);
  });

  it.each(cases)('keeps ids that only differ by leading zeros apart (%s, %s)', (variant, format) => {
    const index = buildIndex([node('1', '1'), node('42', '1'), node('0042', '1')], { variant });
    const restored = decodeSnapshot(encodeSnapshot(index, format));

    expect(restored.get('0042')).toEqual({ id: '0042', parentId: '1', rank: 'no rank' });
    expect(sorted(restored.childrenOf('1'))).toEqual(['42', '0042']);
  });

  it('interns ranks into a table', () => {
    const doc = toSnapshotDocument(buildIndex(fixtureRecords()));

    expect(doc.magic).toBe(SNAPSHOT_MAGIC);
    expect(doc.ranks).toEqual(['no rank', 'superkingdom', 'phylum', 'species', 'class', 'order', 'family', 'genus']);
    expect(doc.rankRefs.slice(0, 5)).toEqual([0, 1, 2, 1, 3]);
    expect(doc.intervals).toBeUndefined();
  });
});

describe('Snapshot format detection', () => {
  it('recognises JSON by its opening brace', () => {
    const index = buildIndex(fixtureRecords());

    expect(detectSnapshotFormat(encodeSnapshot(index, 'json'))).toBe('json');
    expect(detectSnapshotFormat(encodeSnapshot(index, 'msgpack'))).toBe('msgpack');
  });
});

describe('Corrupted snapshots', () => {
  it('rejects bytes that are not MessagePack', () => {
    expect(() => decodeSnapshot(new Uint8Array([0xc1]), 'msgpack')).toThrow('Snapshot is not valid msgpack');
  });

  it('rejects truncated JSON', () => {
    expect(() => decodeSnapshot(new TextEncoder().encode('{"magic": "tax'))).toThrow('Snapshot is not valid json');
  });

  it('rejects documents of another kind', () => {
    const doc = { ...toSnapshotDocument(buildIndex(fixtureRecords())), magic: 'something-else' };

    expect(() => decodeSnapshot(jsonBytes(doc))).toThrow(SnapshotError);
    expect(() => decodeSnapshot(jsonBytes(doc))).toThrow('Snapshot document is malformed');
  });

  it('rejects columns of different lengths', () => {
    const doc = toSnapshotDocument(buildIndex(fixtureRecords()));
    doc.parentIds.pop();

    expect(() => decodeSnapshot(jsonBytes(doc))).toThrow('Snapshot document is malformed');
  });

  it('rejects an interval snapshot without interval columns', () => {
    const doc = { ...toSnapshotDocument(IntervalIndex.fromRecords(fixtureRecords())), intervals: undefined };

    expect(() => decodeSnapshot(jsonBytes(doc))).toThrow('Snapshot document is malformed');
  });

  it('rejects an interval numbering that is not a nested set', () => {
    const doc = toSnapshotDocument(IntervalIndex.fromRecords(fixtureRecords()));
    if (doc.intervals) {
      doc.intervals.rgt[0] = 99;
    }

    expect(() => fromSnapshotDocument(doc)).toThrow('Root interval must span 1..36 at depth 0');
  });

  it('rejects a child stored outside its parent interval', () => {
    const doc = toSnapshotDocument(IntervalIndex.fromRecords(fixtureRecords()));
    if (doc.intervals) {
      // row 3 is "6", nested in "3" (lft 3, rgt 6)
      doc.intervals.lft[3] = 6;
      doc.intervals.rgt[3] = 7;
    }

    expect(() => fromSnapshotDocument(doc)).toThrow('Interval of "6" is not nested in its parent\'s');
  });

  describe('hand-numbered three-node snapshots', () => {
    const threeNodes = (lft: number[], rgt: number[], depth: number[]): SnapshotDocument => ({
      magic: SNAPSHOT_MAGIC,
      version: SNAPSHOT_VERSION,
      kind: 'interval',
      rootId: '1',
      ranks: ['no rank'],
      ids: ['1', '2', '3'],
      parentIds: ['1', '1', '1'],
      rankRefs: [0, 0, 0],
      intervals: { depth, lft, rgt },
    });

    it('loads two sibling intervals', () => {
      const index = fromSnapshotDocument(threeNodes([1, 2, 4], [6, 3, 5], [0, 1, 1]));

      expect([...index.subtreeOf('2')]).toEqual(['2']);
      expect(sorted(index.subtreeOf('1'))).toEqual(['1', '2', '3']);
    });

    it('rejects a child numbered inside a sibling', () => {
      const doc = threeNodes([1, 2, 3], [6, 5, 4], [0, 1, 1]);

      expect(() => fromSnapshotDocument(doc)).toThrow(SnapshotError);
      expect(() => fromSnapshotDocument(doc)).toThrow('Interval of "3" is not nested in its parent\'s');
    });

    it('rejects overlapping siblings', () => {
      const doc = threeNodes([1, 2, 3], [6, 4, 5], [0, 1, 1]);

      expect(() => decodeSnapshot(jsonBytes(doc))).toThrow('Interval of "3" is not nested in its parent\'s');
    });
  });
});

describe('Snapshot files', () => {
  let dir: TempDir;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    dir.cleanup();
  });

  it('writes and loads a snapshot, detecting the format', async () => {
    const path = dir.file('index.json');
    await writeSnapshot(path, buildIndex(fixtureRecords(), { variant: 'interval' }), 'json');

    expect(readFileSync(path, 'utf8').startsWith('{')).toBe(true);

    const loaded = await loadSnapshot(path);
    expect(loaded.kind).toBe('interval');
    expect(loaded.size).toBe(NODE_COUNT);
  });

  it('fails on a snapshot file with the wrong format forced', async () => {
    const path = dir.file('index.msgpack');
    await writeSnapshot(path, buildIndex(fixtureRecords()), 'msgpack');

    await expect(loadSnapshot(path, 'json')).rejects.toThrow(SnapshotError);
  });
});
