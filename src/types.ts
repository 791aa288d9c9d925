import type { ZipWarning } from './errors.js';
import type { ZipLimits } from './limits.js';
import type { DirectoryIndexer } from './reader/indexer.js';

export type { ZipLimits } from './limits.js';
export type { ZipWarning } from './errors.js';

/** ZIP compression method identifiers. */
export type CompressionMethod = 0 | 8 | (number & {});

/**
 * Immutable descriptor for one archive entry, produced once by a
 * {@link DirectoryIndexer}.
 *
 * `compressedSize` and `uncompressedSize` are optional because an indexer may
 * not know them; the built-in indexer always fills both.
 */
export type ZipEntry = {
  readonly name: string;
  readonly nameSource: 'utf8-flag' | 'cp437';
  readonly rawNameBytes: Uint8Array;
  readonly comment?: string | undefined;
  readonly method: CompressionMethod;
  readonly flags: number;
  readonly crc32: number;
  readonly compressedSize?: bigint | undefined;
  readonly uncompressedSize?: bigint | undefined;
  /** Offset of the local file header. */
  readonly offset: bigint;
  /** Absolute offset of the first payload byte. */
  readonly dataOffset: bigint;
  readonly mtime: Date;
  readonly isDirectory: boolean;
  readonly isSymlink: boolean;
  readonly encrypted: boolean;
  readonly zip64: boolean;
};

/** Result of a name lookup. */
export type ZipEntryMatch = {
  index: number;
  entry: ZipEntry;
};

/** Options for building an archive reader. */
export type ZipReaderOptions = {
  /** Reject recoverable structural problems instead of warning. Defaults to true. */
  isStrict?: boolean;
  limits?: ZipLimits;
  /** Replaces the central-directory indexer. */
  indexer?: DirectoryIndexer;
  onWarning?: (warning: ZipWarning) => void;
  signal?: AbortSignal;
};

/** Options for a single entry acquisition. */
export type ZipEntryReaderOptions = {
  signal?: AbortSignal;
};

/** Options for {@link extractAll}. */
export type ZipExtractOptions = {
  /** Maximum number of entry readers in flight. Defaults to 4. */
  concurrency?: number;
  signal?: AbortSignal;
};
