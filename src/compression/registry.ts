import { ZipError } from '../errors.js';
import type { ZipCompressionCodec, ZipDecompressionOptions } from './types.js';
import { DEFLATE_CODEC, STORE_CODEC } from './codecs.js';

const codecs = new Map<number, ZipCompressionCodec>();

/** Register a custom ZIP compression codec by method id. */
export function registerCompressionCodec(codec: ZipCompressionCodec): void {
  codecs.set(codec.methodId, codec);
}

/** Look up a registered ZIP compression codec by method id. */
export function getCompressionCodec(methodId: number): ZipCompressionCodec | undefined {
  return codecs.get(methodId);
}

/** List all registered ZIP compression codecs. */
export function listCompressionCodecs(): ZipCompressionCodec[] {
  return [...codecs.values()];
}

/**
 * Layers the decoder for `method` over `source`. Throws
 * `ZIP_UNSUPPORTED_METHOD` before consuming anything when no codec is
 * registered for the method.
 */
export function createDecoder(
  method: number,
  source: ReadableStream<Uint8Array>,
  options?: ZipDecompressionOptions & { entryName?: string }
): ReadableStream<Uint8Array> {
  const codec = codecs.get(method);
  if (!codec) {
    throw new ZipError('ZIP_UNSUPPORTED_METHOD', `Unsupported compression method ${method}`, {
      entryName: options?.entryName,
      method
    });
  }
  const decompressOptions = options?.signal ? { signal: options.signal } : undefined;
  return source.pipeThrough(codec.createDecompressStream(decompressOptions));
}

registerCompressionCodec(STORE_CODEC);
registerCompressionCodec(DEFLATE_CODEC);
