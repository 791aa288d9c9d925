import { throwIfAborted } from '../abort.js';
import { createDecoder } from '../compression/registry.js';
import { ZipError, type ZipWarning } from '../errors.js';
import { createSizeTransform } from '../streams/sizeTransform.js';
import type { ZipEntry } from '../types.js';
import { openChannel } from './ioErrors.js';
import type { ArchiveSource, RandomAccess } from './RandomAccess.js';

const CHUNK_SIZE = 64 * 1024;

export interface AcquireEntryOptions {
  maxUncompressedEntryBytes: bigint;
  signal?: AbortSignal | undefined;
  onWarning?: ((warning: ZipWarning) => void) | undefined;
}

export interface AcquiredEntry {
  stream: ReadableStream<Uint8Array>;
  /** Lets the range stream start reading. Nothing is read from the channel before this. */
  start: () => void;
  /** Closes the entry's channel. Idempotent; resolves once the channel is closed. */
  release: () => Promise<void>;
  /** Closes the channel and rethrows `err` unchanged. */
  fail: (err: unknown) => Promise<never>;
}

/**
 * Opens a private channel to `source`, positions it at the entry's payload,
 * bounds it to the compressed extent and layers the decoder on top.
 * Nothing here is shared with other acquisitions.
 */
export async function acquireEntryStream(
  source: ArchiveSource,
  entry: ZipEntry,
  options: AcquireEntryOptions
): Promise<AcquiredEntry> {
  const { signal } = options;
  const channel = await openChannel(source, signal);
  const release = once(() => channel.close());
  const fail = (err: unknown): Promise<never> => releaseAfter(err, release, options.onWarning);
  let start: () => void = () => undefined;
  const started = new Promise<void>((resolve) => {
    start = resolve;
  });

  try {
    const archiveSize = await channel.size(signal);
    if (entry.dataOffset > archiveSize) {
      throw new ZipError('ZIP_IO_ERROR', 'Seek target is beyond the end of the archive', {
        entryName: entry.name,
        offset: entry.dataOffset,
        context: { operation: 'seek', locator: source.locator, archiveBytes: archiveSize.toString() }
      });
    }
    if (entry.compressedSize === undefined) {
      throw new ZipError('ZIP_MISSING_SIZE', 'Entry has no compressed size to bound its payload', {
        entryName: entry.name
      });
    }
    if (entry.encrypted) {
      throw new ZipError('ZIP_UNSUPPORTED_ENCRYPTION', 'Encrypted entries are not supported', {
        entryName: entry.name,
        method: entry.method
      });
    }
    const bounded = createRangeStream(channel, entry, entry.compressedSize, { started, release, fail, signal });
    const decoded = createDecoder(entry.method, bounded, {
      entryName: entry.name,
      ...(signal ? { signal } : {})
    });
    if (entry.uncompressedSize === undefined) {
      options.onWarning?.({
        code: 'ZIP_MISSING_SIZE',
        message: 'Entry has no uncompressed size; decoded length is not validated',
        entryName: entry.name
      });
    }
    const stream = decoded.pipeThrough(
      createSizeTransform({
        entryName: entry.name,
        expectedSize: entry.uncompressedSize,
        maxBytes: options.maxUncompressedEntryBytes
      })
    );
    return { stream, start, release, fail };
  } catch (err) {
    return fail(err);
  }
}

/**
 * Closes the channel, then rethrows `err` unchanged. A close that fails as
 * well is reported through `onWarning`.
 */
export async function releaseAfter(
  err: unknown,
  release: () => Promise<void>,
  onWarning?: (warning: ZipWarning) => void
): Promise<never> {
  try {
    await release();
  } catch (closeErr) {
    onWarning?.({
      code: 'ZIP_IO_ERROR',
      message: `Channel close failed after an earlier error: ${closeErr instanceof Error ? closeErr.message : String(closeErr)}`
    });
  }
  throw err;
}

interface RangeStreamControl {
  started: Promise<void>;
  release: () => Promise<void>;
  fail: (err: unknown) => Promise<never>;
  signal?: AbortSignal | undefined;
}

function createRangeStream(
  channel: RandomAccess,
  entry: ZipEntry,
  length: bigint,
  control: RangeStreamControl
): ReadableStream<Uint8Array> {
  const { release, signal } = control;
  let position = entry.dataOffset;
  let remaining = length;

  return new ReadableStream<Uint8Array>(
    {
      async pull(controller) {
        await control.started;
        try {
          throwIfAborted(signal);
          if (remaining <= 0n) {
            await release();
            controller.close();
            return;
          }
          const size = remaining > BigInt(CHUNK_SIZE) ? CHUNK_SIZE : Number(remaining);
          const chunk = await channel.read(position, size, signal);
          if (chunk.length === 0) {
            throw new ZipError('ZIP_TRUNCATED', 'Entry data ends before its declared size', {
              entryName: entry.name,
              offset: position,
              context: { missingBytes: remaining.toString() }
            });
          }
          position += BigInt(chunk.length);
          remaining -= BigInt(chunk.length);
          controller.enqueue(chunk);
          if (remaining <= 0n) {
            await release();
            controller.close();
          }
        } catch (err) {
          await control.fail(err);
        }
      },
      async cancel() {
        await release();
      }
    },
    { highWaterMark: 0 }
  );
}

function once(fn: () => Promise<void>): () => Promise<void> {
  let pending: Promise<void> | undefined;
  return () => {
    pending ??= fn();
    return pending;
  };
}
