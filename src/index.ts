export { ZipReader } from './reader/ZipReader.js';
export { ZipEntryReader } from './reader/ZipEntryReader.js';
export type { EntryReaderState } from './reader/ZipEntryReader.js';
export { BufferArchiveSource, BufferRandomAccess } from './reader/RandomAccess.js';
export type { ArchiveSource, RandomAccess } from './reader/RandomAccess.js';
export { centralDirectoryIndexer } from './reader/indexer.js';
export type { DirectoryIndexer, DirectoryIndexOptions } from './reader/indexer.js';
export { ZipError } from './errors.js';
export type { ZipErrorCode, ZipWarning, ZipWarningCode } from './errors.js';
export { DEFAULT_LIMITS } from './limits.js';
export type {
  CompressionMethod,
  ZipEntry,
  ZipEntryMatch,
  ZipEntryReaderOptions,
  ZipExtractOptions,
  ZipLimits,
  ZipReaderOptions
} from './types.js';

export { createDecoder, getCompressionCodec, listCompressionCodecs, registerCompressionCodec } from './compression/registry.js';
export type { ZipCompressionCodec, ZipCompressionStream, ZipDecompressionOptions } from './compression/types.js';
