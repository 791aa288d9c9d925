import { isAbortError } from '../abort.js';
import { ZipError } from '../errors.js';
import type { ArchiveSource, RandomAccess } from './RandomAccess.js';

type IoOperation = 'open' | 'size' | 'read' | 'write' | 'close';

/** Wraps a storage failure as ZIP_IO_ERROR, keeping the original as `cause`. */
export function mapIoError(err: unknown, operation: IoOperation, locator: string): unknown {
  if (err instanceof ZipError || isAbortError(err)) return err;
  const context: Record<string, string> = { operation, locator };
  const errno = errnoCode(err);
  if (errno) context.errno = errno;
  const detail = err instanceof Error ? err.message : String(err);
  return new ZipError('ZIP_IO_ERROR', `Archive ${operation} failed: ${detail}`, { context, cause: err });
}

class IoMappedRandomAccess implements RandomAccess {
  constructor(
    private readonly upstream: RandomAccess,
    private readonly locator: string
  ) {}

  async size(signal?: AbortSignal): Promise<bigint> {
    try {
      return await this.upstream.size(signal);
    } catch (err) {
      throw mapIoError(err, 'size', this.locator);
    }
  }

  async read(offset: bigint, length: number, signal?: AbortSignal): Promise<Uint8Array> {
    try {
      return await this.upstream.read(offset, length, signal);
    } catch (err) {
      throw mapIoError(err, 'read', this.locator);
    }
  }

  async close(): Promise<void> {
    try {
      await this.upstream.close();
    } catch (err) {
      throw mapIoError(err, 'close', this.locator);
    }
  }
}

/** Opens a channel from `source` with storage failures mapped to ZIP_IO_ERROR. */
export async function openChannel(source: ArchiveSource, signal?: AbortSignal): Promise<RandomAccess> {
  let channel: RandomAccess;
  try {
    channel = await source.open(signal);
  } catch (err) {
    throw mapIoError(err, 'open', source.locator);
  }
  return new IoMappedRandomAccess(channel, source.locator);
}

function errnoCode(err: unknown): string | undefined {
  if (!err || typeof err !== 'object' || !('code' in err)) return undefined;
  const code: unknown = err.code;
  return typeof code === 'string' ? code : undefined;
}
