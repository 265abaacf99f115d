import type { Readable } from 'node:stream';
import yauzl from 'yauzl';
import type { Entry, ZipFile } from 'yauzl';
import { DumpArchiveError } from '../errors/taxonomy.js';

/**
 * NCBI ships the taxonomy as `taxdmp.zip`; the hierarchy lives in its
 * `nodes.dmp` entry, which is streamed out without unpacking the archive.
 */

export const DUMP_ENTRY = 'nodes.dmp';

export function isDumpArchive(path: string): boolean {
  return path.toLowerCase().endsWith('.zip');
}

function causeOf(error: Error | null | undefined): Record<string, unknown> {
  return error ? { cause: error.message } : {};
}

function openArchive(path: string): Promise<ZipFile> {
  return new Promise((resolve, reject) => {
    yauzl.open(path, { lazyEntries: true, autoClose: false }, (error, zipfile) => {
      if (error || !zipfile) {
        reject(new DumpArchiveError(`Cannot open dump archive ${path}`, path, causeOf(error)));
        return;
      }
      resolve(zipfile);
    });
  });
}

function matchesEntry(entry: Entry, name: string): boolean {
  return entry.fileName === name || entry.fileName.endsWith(`/${name}`);
}

/**
 * Open a read stream over one entry of a zip archive. The archive's file is
 * released once that stream has ended.
 */
export async function openDumpEntry(path: string, name: string = DUMP_ENTRY): Promise<Readable> {
  const zipfile = await openArchive(path);

  return new Promise((resolve, reject) => {
    const fail = (message: string, error?: Error | null): void => {
      zipfile.close();
      reject(new DumpArchiveError(message, path, { ...causeOf(error), entry: name }));
    };

    zipfile.on('entry', (entry: Entry) => {
      if (!matchesEntry(entry, name)) {
        zipfile.readEntry();
        return;
      }
      zipfile.openReadStream(entry, (error, stream) => {
        if (error || !stream) {
          fail(`Cannot read ${name} from ${path}`, error);
          return;
        }
        zipfile.close();
        resolve(stream);
      });
    });
    zipfile.once('end', () => fail(`No ${name} entry in dump archive ${path}`));
    zipfile.once('error', (error: Error) => fail(`Dump archive ${path} is corrupt`, error));
    zipfile.readEntry();
  });
}
