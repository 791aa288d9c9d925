import { ZipReader as CoreZipReader } from '../../reader/ZipReader.js';
import { BufferArchiveSource, type ArchiveSource } from '../../reader/RandomAccess.js';
import type { ZipExtractOptions, ZipReaderOptions } from '../../types.js';
import { extractAll } from './extract.js';
import { FileArchiveSource } from './RandomAccess.js';

/**
 * File-backed {@link CoreZipReader}. The path is kept as a value and
 * reopened for every entry reader; no file descriptor is held between calls.
 */
export class ZipReader extends CoreZipReader {
  static async fromFile(pathLike: string | URL, options?: ZipReaderOptions): Promise<ZipReader> {
    return ZipReader.fromSource(new FileArchiveSource(pathLike), options);
  }

  static override async fromSource(source: ArchiveSource, options?: ZipReaderOptions): Promise<ZipReader> {
    return new ZipReader(source, await CoreZipReader.index(source, options));
  }

  static override async fromUint8Array(data: Uint8Array, options?: ZipReaderOptions): Promise<ZipReader> {
    return ZipReader.fromSource(new BufferArchiveSource(data), options);
  }

  /** Extracts all entries below `destDir`, decoding up to `concurrency` entries at once. */
  async extractAll(destDir: string | URL, options?: ZipExtractOptions): Promise<void> {
    await extractAll(this, destDir, options);
  }
}
