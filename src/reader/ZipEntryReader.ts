import { concatBytes, decodeUtf8 } from '../binary.js';
import { ZipError } from '../errors.js';
import type { ZipEntry } from '../types.js';
import type { AcquiredEntry } from './entryStream.js';

/**
 * Lifecycle of an entry reader. Transitions only move forward:
 * `positioned → streaming → exhausted | dropped`.
 */
export type EntryReaderState = 'positioned' | 'streaming' | 'exhausted' | 'dropped';

/**
 * Forward-only reader over one entry's decoded bytes. Owns its archive
 * channel exclusively. Nothing is read from the channel before the first
 * `read`; the channel is closed once the data is exhausted, a read fails, or
 * {@link ZipEntryReader.close} is called.
 */
export class ZipEntryReader implements AsyncIterable<Uint8Array> {
  private readonly reader: ReadableStreamDefaultReader<Uint8Array>;
  private readonly acquired: AcquiredEntry;
  private current: EntryReaderState = 'positioned';

  constructor(
    readonly index: number,
    readonly entry: ZipEntry,
    acquired: AcquiredEntry
  ) {
    this.reader = acquired.stream.getReader();
    this.acquired = acquired;
  }

  get state(): EntryReaderState {
    return this.current;
  }

  /** Next decoded chunk, or `undefined` once the entry is exhausted. */
  async read(): Promise<Uint8Array | undefined> {
    if (this.current === 'dropped') {
      throw new ZipError('ZIP_READER_CLOSED', 'Entry reader has been closed', { entryName: this.entry.name });
    }
    if (this.current === 'exhausted') return undefined;
    this.current = 'streaming';
    this.acquired.start();

    let result: ReadableStreamReadResult<Uint8Array>;
    try {
      result = await this.reader.read();
    } catch (err) {
      this.current = 'dropped';
      return this.acquired.fail(err);
    }
    if (result.done) {
      this.current = 'exhausted';
      await this.acquired.release();
      return undefined;
    }
    return result.value;
  }

  /** Reads the remainder of the entry into one buffer. */
  async bytes(): Promise<Uint8Array> {
    const chunks: Uint8Array[] = [];
    for (let chunk = await this.read(); chunk !== undefined; chunk = await this.read()) {
      chunks.push(chunk);
    }
    return concatBytes(chunks);
  }

  /** Reads the remainder of the entry as UTF-8 text. */
  async text(): Promise<string> {
    return decodeUtf8(await this.bytes());
  }

  /** Web stream view of the remaining data; cancelling it closes the reader. */
  stream(): ReadableStream<Uint8Array> {
    return new ReadableStream<Uint8Array>(
      {
        pull: async (controller) => {
          const chunk = await this.read();
          if (chunk === undefined) {
            controller.close();
            return;
          }
          controller.enqueue(chunk);
        },
        cancel: () => this.close()
      },
      { highWaterMark: 0 }
    );
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Uint8Array, void, undefined> {
    try {
      for (let chunk = await this.read(); chunk !== undefined; chunk = await this.read()) {
        yield chunk;
      }
    } finally {
      await this.close();
    }
  }

  /** Drops the reader and closes its channel. Safe to call more than once. */
  async close(): Promise<void> {
    if (this.current === 'exhausted' || this.current === 'dropped') {
      await this.acquired.release();
      return;
    }
    this.current = 'dropped';
    try {
      await this.reader.cancel();
    } finally {
      await this.acquired.release();
    }
  }

  async [Symbol.asyncDispose](): Promise<void> {
    await this.close();
  }
}
