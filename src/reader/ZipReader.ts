import { throwIfAborted } from '../abort.js';
import { ZipError, type ZipWarning } from '../errors.js';
import { resolveLimits, type ResolvedZipLimits } from '../limits.js';
import type { ZipEntry, ZipEntryMatch, ZipEntryReaderOptions, ZipReaderOptions } from '../types.js';
import { acquireEntryStream, releaseAfter } from './entryStream.js';
import { centralDirectoryIndexer } from './indexer.js';
import { openChannel } from './ioErrors.js';
import { BufferArchiveSource, type ArchiveSource } from './RandomAccess.js';
import { ZipEntryReader } from './ZipEntryReader.js';

/** Immutable state produced by the single indexing pass. */
export interface IndexedArchive {
  entries: readonly ZipEntry[];
  warnings: readonly ZipWarning[];
  limits: ResolvedZipLimits;
  onWarning?: ((warning: ZipWarning) => void) | undefined;
}

/**
 * Random-access ZIP reader that never shares a channel between reads.
 *
 * Construction opens the archive once to index it and closes it again. Each
 * {@link ZipReader.entryReader} call opens its own channel, so any number of
 * entries may be read at the same time. Every open reader holds one file
 * descriptor (or equivalent); callers reading many entries at once should
 * bound how many readers are in flight.
 */
export class ZipReader {
  private readonly entryList: readonly ZipEntry[];
  private readonly warningList: readonly ZipWarning[];
  private readonly limits: ResolvedZipLimits;
  private readonly onWarning: ((warning: ZipWarning) => void) | undefined;

  protected constructor(
    readonly source: ArchiveSource,
    indexed: IndexedArchive
  ) {
    this.entryList = indexed.entries;
    this.warningList = indexed.warnings;
    this.limits = indexed.limits;
    this.onWarning = indexed.onWarning;
  }

  static async fromSource(source: ArchiveSource, options?: ZipReaderOptions): Promise<ZipReader> {
    return new ZipReader(source, await ZipReader.index(source, options));
  }

  static async fromUint8Array(data: Uint8Array, options?: ZipReaderOptions): Promise<ZipReader> {
    return ZipReader.fromSource(new BufferArchiveSource(data), options);
  }

  /** Opens `source` once, indexes it, and closes the channel again. */
  protected static async index(source: ArchiveSource, options?: ZipReaderOptions): Promise<IndexedArchive> {
    const signal = options?.signal;
    throwIfAborted(signal);
    const limits = resolveLimits(options?.limits);
    const warnings: ZipWarning[] = [];
    const onWarning = (warning: ZipWarning): void => {
      warnings.push(warning);
      options?.onWarning?.(warning);
    };
    const indexer = options?.indexer ?? centralDirectoryIndexer;

    const channel = await openChannel(source, signal);
    let entries: ZipEntry[];
    try {
      entries = await indexer.index(channel, {
        strict: options?.isStrict ?? true,
        limits,
        signal,
        onWarning
      });
    } catch (err) {
      return releaseAfter(err, () => channel.close(), onWarning);
    }
    await channel.close();

    return {
      entries: Object.freeze(entries.map((entry) => Object.freeze({ ...entry }))),
      warnings,
      limits,
      onWarning: options?.onWarning
    };
  }

  get locator(): string {
    return this.source.locator;
  }

  /** Entries in central-directory order. The list and its entries are frozen. */
  entries(): readonly ZipEntry[] {
    return this.entryList;
  }

  /** Warnings collected while indexing in non-strict mode. */
  warnings(): ZipWarning[] {
    return [...this.warningList];
  }

  /** First entry whose name equals `name` exactly, with its index. */
  entry(name: string): ZipEntryMatch | undefined {
    for (const [index, entry] of this.entryList.entries()) {
      if (entry.name === name) {
        return { index, entry };
      }
    }
    return undefined;
  }

  /** Opens an independent reader over the entry at `index`. */
  async entryReader(index: number, options?: ZipEntryReaderOptions): Promise<ZipEntryReader> {
    const entry = Number.isSafeInteger(index) && index >= 0 ? this.entryList[index] : undefined;
    if (!entry) {
      throw new ZipError('ZIP_ENTRY_INDEX_OUT_OF_BOUNDS', `Entry index ${index} is out of bounds`, {
        context: { index: String(index), entries: String(this.entryList.length) }
      });
    }
    const acquired = await acquireEntryStream(this.source, entry, {
      maxUncompressedEntryBytes: this.limits.maxUncompressedEntryBytes,
      signal: options?.signal,
      onWarning: this.onWarning
    });
    return new ZipEntryReader(index, entry, acquired);
  }
}
