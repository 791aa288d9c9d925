import { ZipError } from '../errors.js';

export interface SizeTransformOptions {
  entryName: string;
  /** Declared uncompressed size; validation is skipped when unknown. */
  expectedSize?: bigint | undefined;
  maxBytes: bigint;
}

/**
 * Counts decoded bytes. Fails as soon as output runs past the declared size
 * or the entry limit, and at end of stream when output falls short.
 */
export function createSizeTransform(options: SizeTransformOptions): TransformStream<Uint8Array, Uint8Array> {
  const { entryName, expectedSize, maxBytes } = options;
  let bytes = 0n;
  return new TransformStream({
    transform(chunk, controller) {
      bytes += BigInt(chunk.length);
      if (expectedSize !== undefined && bytes > expectedSize) {
        throw sizeMismatch(entryName, expectedSize, bytes);
      }
      if (bytes > maxBytes) {
        throw new ZipError('ZIP_LIMIT_EXCEEDED', 'Entry exceeds max uncompressed size', {
          entryName,
          context: { limitUncompressedBytes: maxBytes.toString() }
        });
      }
      controller.enqueue(chunk);
    },
    flush() {
      if (expectedSize !== undefined && bytes !== expectedSize) {
        throw sizeMismatch(entryName, expectedSize, bytes);
      }
    }
  });
}

function sizeMismatch(entryName: string, expected: bigint, actual: bigint): ZipError {
  return new ZipError('ZIP_SIZE_MISMATCH', `Uncompressed size mismatch for ${entryName}`, {
    entryName,
    context: {
      expectedBytes: expected.toString(),
      actualBytes: actual > expected ? `>${expected}` : actual.toString()
    }
  });
}
