import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { UnknownTaxonIdError } from '../src/errors/taxonomy.js';
import type { IndexVariant } from '../src/schemas/taxon.js';
import { QueryEngine } from '../src/services/QueryEngine.js';
import { buildIndex } from '../src/taxonomy/create-index.js';
import { SUBTREE_OF_4, type TempDir, createTempDir, fixtureRecords, sorted } from './fixtures.js';

const variants: IndexVariant[] = ['adjacency', 'interval'];

describe.each(variants)('QueryEngine over the %s index', (variant) => {
  const engine = new QueryEngine(buildIndex(fixtureRecords(), { variant }));

  describe('search', () => {
    it('includes a whole subtree', () => {
      const result = engine.search({ include: ['4'] });

      expect(result.size).toBe(14);
      expect(sorted(result)).toEqual(sorted(SUBTREE_OF_4));
    });

    it('removes excluded subtrees', () => {
      const result = engine.search({ include: ['4'], exclude: ['24'] });

      expect(result.size).toBe(10);
      expect(sorted(result)).toEqual(['4', '10', '11', '20', '21', '28', '29', '30', '31', '32']);
    });

    it('returns a leaf on its own', () => {
      expect([...engine.search({ include: ['29'] })]).toEqual(['29']);
    });

    it('always contains the include id itself, whatever its rank', () => {
      expect(engine.search({ include: ['1'] }).has('1')).toBe(true);
      expect(engine.search({ include: ['24'] }).has('24')).toBe(true);
    });

    it('intersects with the literal filter ids only', () => {
      const result = engine.search({ include: ['4'], filter: ['20', '29', '6'] });

      // "6" is outside the include subtree and the filter does not expand "20"
      expect(sorted(result)).toEqual(['20', '29']);
    });

    it('applies the stages in order', () => {
      const result = engine.search({ include: ['4'], exclude: ['20'], filter: ['24', '30', '31'] });

      expect(sorted(result)).toEqual(['30', '31']);
    });

    it('returns nothing when an include id is also excluded', () => {
      expect(engine.search({ include: ['24'], exclude: ['24'] }).size).toBe(0);
    });

    it('can exclude an ancestor of the include id', () => {
      expect(engine.search({ include: ['24'], exclude: ['4'] }).size).toBe(0);
    });

    it('dedupes repeated and nested include ids', () => {
      const result = engine.search({ include: ['24', '24', '27', '25'] });

      expect(sorted(result)).toEqual(['24', '25', '26', '27']);
    });

    it('returns an empty set for an empty include', () => {
      expect(engine.search({ include: [] }).size).toBe(0);
    });

    it('fails on unknown ids and names the stage', () => {
      expect(() => engine.search({ include: ['4', '999'] })).toThrow(UnknownTaxonIdError);
      expect(() => engine.search({ include: ['4'], exclude: ['998'] })).toThrow(
        '1 taxon id(s) not found in the index (exclude): "998"'
      );
      expect(() => engine.search({ include: ['4'], filter: ['997'] })).toThrow(
        '1 taxon id(s) not found in the index (filter): "997"'
      );
    });

    it('drops unknown ids when asked to ignore them', () => {
      const result = engine.search({ include: ['29', '999'], exclude: ['998'], ignoreInvalid: true });

      expect([...result]).toEqual(['29']);
    });

    it('reports the unknown ids on the error', () => {
      try {
        engine.search({ include: ['998', '4', '999', '998'] });
        expect.unreachable('search should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(UnknownTaxonIdError);
        if (error instanceof UnknownTaxonIdError) {
          expect(error.ids).toEqual(['998', '999']);
          expect(error.stage).toBe('include');
          expect(error.module).toBe('taxonomy.query');
        }
      }
    });
  });

  describe('validate', () => {
    it('is true when every id is present', () => {
      expect(engine.validate(['1', '4', '29'])).toBe(true);
      expect(engine.validate([])).toBe(true);
    });

    it('is false when any id is missing', () => {
      expect(engine.validate(['1', '999'])).toBe(false);
    });

    it('lists the missing ids once, in input order', () => {
      expect(engine.findUnknown(['999', '4', '997', '999'])).toEqual(['999', '997']);
    });

    it('treats ids on the accept list as valid', () => {
      expect(engine.validate(['1', '999'], { accept: ['999'] })).toBe(true);
      expect(engine.findUnknown(['999', '4', '997'], { accept: ['997', '5000'] })).toEqual(['999']);
    });
  });
});

describe('QueryEngine with list files', () => {
  let dir: TempDir;
  const engine = new QueryEngine(buildIndex(fixtureRecords()));

  beforeAll(() => {
    dir = createTempDir();
  });

  afterAll(() => {
    dir.cleanup();
  });

  it('reads include and exclude ids from files', () => {
    const include = dir.file('include.txt', '# subtree roots\n4\n');
    const exclude = dir.file('exclude.tsv', 'skip\t24\n');

    const result = engine.search({
      include: { path: include },
      exclude: { path: exclude, separator: '\t', field: 1 },
    });

    expect(result.size).toBe(10);
  });

  it('validates a list file', () => {
    const ids = dir.file('validate.txt', '1\n2\n3\n');

    expect(engine.validate({ path: ids })).toBe(true);
  });

  it('reads the accept list from a file', () => {
    const ids = dir.file('candidates.txt', '4\n8001\n8002\n');
    const accept = dir.file('accept.tsv', 'local\t8001\n');

    expect(engine.findUnknown({ path: ids }, { accept: { path: accept, separator: '\t', field: 1 } })).toEqual([
      '8002',
    ]);
  });
});
