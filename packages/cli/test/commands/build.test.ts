import { describe, expect, it } from 'vitest';
import * as buildCommand from '../../source/commands/build.js';

describe('Build Command', () => {
  describe('Command Exports', () => {
    it('should export description', () => {
      expect(buildCommand.description).toBe(
        'Build an index from an NCBI nodes.dmp file (or re-encode a snapshot) and write it as a snapshot'
      );
    });

    it('should export default component', () => {
      expect(typeof buildCommand.default).toBe('function');
      expect(buildCommand.default.name).toBe('Build');
    });
  });

  describe('options schema', () => {
    it('should fill defaults for the optional flags', () => {
      const result = buildCommand.options.parse({ infile: 'nodes.dmp', outfile: 'tree.msgpack' });

      expect(result).toEqual({
        infile: 'nodes.dmp',
        outfile: 'tree.msgpack',
        outformat: 'msgpack',
        duplicates: 'reject',
        indx: 0,
        quiet: false,
      });
    });

    it('should leave the variant unset unless given', () => {
      const result = buildCommand.options.parse({ infile: 'tree.json', outfile: 'tree.msgpack', informat: 'json' });

      expect(result.variant).toBeUndefined();
    });

    it('should take list and logging flags', () => {
      const result = buildCommand.options.parse({
        infile: 'nodes.dmp',
        outfile: 'tree.msgpack',
        taxidfilter: 'keep.tsv',
        sep: '\t',
        indx: 1,
        loglevel: 'debug',
        logoutput: 'build.log',
      });

      expect(result.sep).toBe('\t');
      expect(result.indx).toBe(1);
      expect(result.loglevel).toBe('debug');
      expect(result.logoutput).toBe('build.log');
    });

    it('should accept a snapshot input format', () => {
      const result = buildCommand.options.parse({
        infile: 'tree.json',
        outfile: 'tree.msgpack',
        informat: 'json',
        variant: 'interval',
      });

      expect(result.informat).toBe('json');
      expect(result.variant).toBe('interval');
    });

    it('should require input and output files', () => {
      expect(() => buildCommand.options.parse({ infile: 'nodes.dmp' })).toThrow();
      expect(() => buildCommand.options.parse({ outfile: 'tree.msgpack' })).toThrow();
    });

    it('should reject unknown variants and formats', () => {
      expect(() => buildCommand.options.parse({ infile: 'a', outfile: 'b', variant: 'btree' })).toThrow();
      expect(() => buildCommand.options.parse({ infile: 'a', outfile: 'b', outformat: 'xml' })).toThrow();
      expect(() => buildCommand.options.parse({ infile: 'a', outfile: 'b', duplicates: 'merge' })).toThrow();
    });
  });
});
