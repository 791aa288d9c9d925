import { ZipError, type ZipWarning } from '../errors.js';
import type { ResolvedZipLimits } from '../limits.js';
import type { ZipEntry } from '../types.js';
import { iterCentralDirectory } from './centralDirectory.js';
import { findEocd } from './eocd.js';
import { readLocalHeader } from './localHeader.js';
import type { RandomAccess } from './RandomAccess.js';

export interface DirectoryIndexOptions {
  strict: boolean;
  limits: ResolvedZipLimits;
  signal?: AbortSignal | undefined;
  onWarning?: ((warning: ZipWarning) => void) | undefined;
}

/**
 * Turns an open archive channel into the ordered entry list. Invoked exactly
 * once per archive reader; format problems must be thrown, not returned.
 */
export interface DirectoryIndexer {
  index(channel: RandomAccess, options: DirectoryIndexOptions): Promise<ZipEntry[]>;
}

/**
 * Default indexer: locates the (ZIP64) end of central directory, walks the
 * central directory, then reads each local header once so entries carry an
 * absolute `dataOffset`.
 */
export const centralDirectoryIndexer: DirectoryIndexer = {
  async index(channel, options) {
    const eocd = await findEocd(channel, options);
    const entries: ZipEntry[] = [];
    const records = iterCentralDirectory(channel, eocd.cdOffset, eocd.cdSize, eocd.totalEntries, {
      strict: options.strict,
      maxEntries: options.limits.maxEntries,
      signal: options.signal,
      onWarning: options.onWarning
    });
    for await (const record of records) {
      const local = await readLocalHeader(channel, record, options.signal);
      if (local.method !== record.method) {
        throw new ZipError('ZIP_BAD_CENTRAL_DIRECTORY', 'Local header method does not match central directory', {
          entryName: record.name,
          method: local.method,
          offset: record.offset
        });
      }
      if (local.dataOffset + record.compressedSize > eocd.cdOffset) {
        throw new ZipError('ZIP_BAD_CENTRAL_DIRECTORY', 'Entry data overlaps central directory', {
          entryName: record.name,
          offset: local.dataOffset,
          context: {
            compressedSize: record.compressedSize.toString(),
            cdOffset: eocd.cdOffset.toString()
          }
        });
      }
      entries.push({ ...record, dataOffset: local.dataOffset });
    }
    return entries;
  }
};
