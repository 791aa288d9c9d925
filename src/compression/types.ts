/** Readable/writable pair used by ZIP decompression codecs. */
export type ZipCompressionStream = ReadableWritablePair<Uint8Array, Uint8Array>;

/** Options for ZIP decompression streams. */
export type ZipDecompressionOptions = {
  signal?: AbortSignal;
};

/** Codec interface for ZIP compression methods. */
export type ZipCompressionCodec = {
  methodId: number;
  name: string;
  createDecompressStream(options?: ZipDecompressionOptions): ZipCompressionStream;
};
