import { throwIfAborted } from '../abort.js';

/** Positional reader over one open channel to an archive. */
export interface RandomAccess {
  size(signal?: AbortSignal): Promise<bigint>;
  read(offset: bigint, length: number, signal?: AbortSignal): Promise<Uint8Array>;
  close(): Promise<void>;
}

/**
 * Reopenable identity of an archive. Holds no channel itself; every call to
 * `open` returns a fresh, exclusively owned {@link RandomAccess}.
 */
export interface ArchiveSource {
  readonly locator: string;
  open(signal?: AbortSignal): Promise<RandomAccess>;
}

export class BufferRandomAccess implements RandomAccess {
  private closed = false;

  constructor(private readonly data: Uint8Array) {}

  async size(signal?: AbortSignal): Promise<bigint> {
    throwIfAborted(signal);
    this.assertOpen();
    return BigInt(this.data.length);
  }

  async read(offset: bigint, length: number, signal?: AbortSignal): Promise<Uint8Array> {
    throwIfAborted(signal);
    this.assertOpen();
    if (length <= 0 || offset >= BigInt(this.data.length)) return new Uint8Array(0);
    const start = Number(offset);
    const end = Math.min(this.data.length, start + length);
    return this.data.slice(start, end);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error('Channel is closed');
    }
  }
}

/** In-memory archive source; each `open` yields an independent channel. */
export class BufferArchiveSource implements ArchiveSource {
  constructor(
    private readonly data: Uint8Array,
    readonly locator: string = 'memory'
  ) {}

  async open(signal?: AbortSignal): Promise<RandomAccess> {
    throwIfAborted(signal);
    return new BufferRandomAccess(this.data);
  }
}
