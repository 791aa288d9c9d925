import { Duplex } from 'node:stream';
import { createInflateRaw } from 'node:zlib';
import type { ZipCompressionCodec, ZipCompressionStream, ZipDecompressionOptions } from './types.js';

function nodeDuplexToWeb(duplex: Duplex, options?: ZipDecompressionOptions): ZipCompressionStream {
  const signal = options?.signal;
  if (signal) {
    const destroy = () => {
      duplex.destroy(signal.reason instanceof Error ? signal.reason : new Error('Aborted'));
    };
    if (signal.aborted) {
      destroy();
    } else {
      signal.addEventListener('abort', destroy, { once: true });
      duplex.once('close', () => signal.removeEventListener('abort', destroy));
    }
  }
  const { readable, writable } = Duplex.toWeb(duplex);
  return {
    readable: readable as ReadableStream<Uint8Array>,
    writable: writable as WritableStream<Uint8Array>
  };
}

function passthroughStream(): ZipCompressionStream {
  return new TransformStream<Uint8Array, Uint8Array>({
    transform(chunk, controller) {
      controller.enqueue(chunk);
    }
  });
}

export const STORE_CODEC: ZipCompressionCodec = {
  methodId: 0,
  name: 'store',
  createDecompressStream() {
    return passthroughStream();
  }
};

export const DEFLATE_CODEC: ZipCompressionCodec = {
  methodId: 8,
  name: 'deflate',
  createDecompressStream(options) {
    return nodeDuplexToWeb(createInflateRaw(), options);
  }
};
