import { open, type FileHandle } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { throwIfAborted } from '../../abort.js';
import { ZipError } from '../../errors.js';
import type { ArchiveSource, RandomAccess } from '../../reader/RandomAccess.js';

export { BufferArchiveSource, BufferRandomAccess, type ArchiveSource, type RandomAccess } from '../../reader/RandomAccess.js';

/** Positional reads over one exclusively owned file descriptor. */
export class FileRandomAccess implements RandomAccess {
  private closed = false;

  private constructor(private readonly handle: FileHandle) {}

  static async open(filePath: string, signal?: AbortSignal): Promise<FileRandomAccess> {
    throwIfAborted(signal);
    const handle = await open(filePath, 'r');
    if (signal?.aborted) {
      await handle.close();
      throwIfAborted(signal);
    }
    return new FileRandomAccess(handle);
  }

  async size(signal?: AbortSignal): Promise<bigint> {
    throwIfAborted(signal);
    const stat = await this.handle.stat({ bigint: true });
    throwIfAborted(signal);
    return stat.size;
  }

  async read(offset: bigint, length: number, signal?: AbortSignal): Promise<Uint8Array> {
    throwIfAborted(signal);
    if (length <= 0) return new Uint8Array(0);
    if (offset > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new ZipError('ZIP_IO_ERROR', 'Read offset exceeds the addressable file range', {
        offset,
        context: { operation: 'read' }
      });
    }
    const buffer = new Uint8Array(length);
    const { bytesRead } = await this.handle.read(buffer, 0, length, Number(offset));
    throwIfAborted(signal);
    if (bytesRead === length) return buffer;
    return buffer.subarray(0, bytesRead);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
  }
}

/** File-system archive source; the path is re-resolved on every `open`. */
export class FileArchiveSource implements ArchiveSource {
  readonly locator: string;

  constructor(pathLike: string | URL) {
    this.locator = typeof pathLike === 'string' ? pathLike : fileURLToPath(pathLike);
  }

  open(signal?: AbortSignal): Promise<RandomAccess> {
    return FileRandomAccess.open(this.locator, signal);
  }
}
