import { decodeUtf8, readUint16LE, readUint32LE } from '../binary.js';
import { dosToDate } from '../dosTime.js';
import { ZIP64_EXTRA_ID, parseExtraFields, parseZip64Extra } from '../extraFields.js';
import { ZipError, type ZipWarning } from '../errors.js';
import { decodeCp437 } from '../text/cp437.js';
import type { RandomAccess } from './RandomAccess.js';

const CDFH_SIGNATURE = 0x02014b50;
const CDFH_MIN_SIZE = 46;
const READ_CHUNK_SIZE = 64 * 1024;

/** Central directory record, before the local header has been resolved. */
export interface CentralDirectoryRecord {
  name: string;
  nameSource: 'utf8-flag' | 'cp437';
  rawNameBytes: Uint8Array;
  comment?: string | undefined;
  flags: number;
  method: number;
  crc32: number;
  compressedSize: bigint;
  uncompressedSize: bigint;
  offset: bigint;
  mtime: Date;
  isDirectory: boolean;
  isSymlink: boolean;
  encrypted: boolean;
  zip64: boolean;
}

export interface CentralDirectoryOptions {
  strict: boolean;
  maxEntries: number;
  signal?: AbortSignal | undefined;
  onWarning?: ((warning: ZipWarning) => void) | undefined;
}

export async function* iterCentralDirectory(
  reader: RandomAccess,
  cdOffset: bigint,
  cdSize: bigint,
  totalEntries: bigint,
  options: CentralDirectoryOptions
): AsyncGenerator<CentralDirectoryRecord> {
  let buffer = new Uint8Array(0);
  let ptr = 0;
  let remainingToRead = cdSize;
  let remainingCd = cdSize;
  let position = cdOffset;
  let count = 0n;

  const ensure = async (minBytes: number): Promise<void> => {
    while (buffer.length - ptr < minBytes && remainingToRead > 0n) {
      options.signal?.throwIfAborted();
      const toRead = Number(remainingToRead > BigInt(READ_CHUNK_SIZE) ? READ_CHUNK_SIZE : remainingToRead);
      const chunk = await reader.read(position, toRead, options.signal);
      if (chunk.length === 0) break;
      position += BigInt(chunk.length);
      remainingToRead -= BigInt(chunk.length);
      const leftover = buffer.subarray(ptr);
      const merged = new Uint8Array(leftover.length + chunk.length);
      merged.set(leftover, 0);
      merged.set(chunk, leftover.length);
      buffer = merged;
      ptr = 0;
    }
  };

  while (remainingCd >= BigInt(CDFH_MIN_SIZE)) {
    await ensure(CDFH_MIN_SIZE);
    if (buffer.length - ptr < CDFH_MIN_SIZE) {
      throw new ZipError('ZIP_TRUNCATED', 'Central directory truncated', { offset: position });
    }
    if (readUint32LE(buffer, ptr) !== CDFH_SIGNATURE) {
      throw new ZipError('ZIP_BAD_CENTRAL_DIRECTORY', 'Invalid central directory signature', {
        offset: cdOffset + (cdSize - remainingCd)
      });
    }

    const nameLen = readUint16LE(buffer, ptr + 28);
    const extraLen = readUint16LE(buffer, ptr + 30);
    const commentLen = readUint16LE(buffer, ptr + 32);
    const entrySize = CDFH_MIN_SIZE + nameLen + extraLen + commentLen;
    if (BigInt(entrySize) > remainingCd) {
      throw new ZipError('ZIP_TRUNCATED', 'Central directory truncated');
    }
    await ensure(entrySize);
    if (buffer.length - ptr < entrySize) {
      throw new ZipError('ZIP_TRUNCATED', 'Central directory truncated');
    }

    count += 1n;
    if (count > BigInt(options.maxEntries)) {
      throw new ZipError('ZIP_LIMIT_EXCEEDED', 'Too many entries in ZIP', {
        context: { limitEntries: String(options.maxEntries) }
      });
    }
    yield parseRecord(buffer.subarray(ptr, ptr + entrySize), options);

    ptr += entrySize;
    remainingCd -= BigInt(entrySize);
  }

  if (remainingCd !== 0n) {
    if (options.strict) {
      throw new ZipError('ZIP_BAD_CENTRAL_DIRECTORY', 'Central directory has trailing data');
    }
    options.onWarning?.({
      code: 'ZIP_BAD_CENTRAL_DIRECTORY',
      message: 'Central directory has trailing data; ignoring'
    });
  }

  if (totalEntries !== count) {
    if (options.strict) {
      throw new ZipError('ZIP_BAD_CENTRAL_DIRECTORY', 'Central directory entry count mismatch', {
        context: { declaredEntries: totalEntries.toString(), parsedEntries: count.toString() }
      });
    }
    options.onWarning?.({
      code: 'ZIP_BAD_CENTRAL_DIRECTORY',
      message: 'Central directory entry count mismatch; using parsed entries'
    });
  }
}

function parseRecord(record: Uint8Array, options: CentralDirectoryOptions): CentralDirectoryRecord {
  const madeBy = readUint16LE(record, 4);
  const flags = readUint16LE(record, 8);
  const method = readUint16LE(record, 10);
  const modTime = readUint16LE(record, 12);
  const modDate = readUint16LE(record, 14);
  const crc32 = readUint32LE(record, 16);
  const compressedSize32 = readUint32LE(record, 20);
  const uncompressedSize32 = readUint32LE(record, 24);
  const nameLen = readUint16LE(record, 28);
  const extraLen = readUint16LE(record, 30);
  const diskStart = readUint16LE(record, 34);
  const externalAttributes = readUint32LE(record, 38);
  const offset32 = readUint32LE(record, 42);

  const nameEnd = CDFH_MIN_SIZE + nameLen;
  const extraEnd = nameEnd + extraLen;
  const nameBytes = record.subarray(CDFH_MIN_SIZE, nameEnd);
  const extraBytes = record.subarray(nameEnd, extraEnd);
  const commentBytes = record.subarray(extraEnd);

  const isUtf8 = (flags & 0x800) !== 0;
  const name = isUtf8 ? decodeUtf8Name(nameBytes, options) : decodeCp437(nameBytes);
  let comment: string | undefined;
  if (commentBytes.length > 0) {
    comment = isUtf8 ? decodeUtf8(commentBytes, false) : decodeCp437(commentBytes);
  }

  let compressedSize = BigInt(compressedSize32);
  let uncompressedSize = BigInt(uncompressedSize32);
  let offset = BigInt(offset32);
  const zip64 =
    compressedSize32 === 0xffffffff || uncompressedSize32 === 0xffffffff || offset32 === 0xffffffff || diskStart === 0xffff;

  if (zip64) {
    const zip64Extra = parseExtraFields(extraBytes).get(ZIP64_EXTRA_ID);
    if (!zip64Extra) {
      throw new ZipError('ZIP_BAD_ZIP64', 'ZIP64 extra field missing', { entryName: name });
    }
    const values = parseZip64Extra(zip64Extra, {
      uncompressed: uncompressedSize32 === 0xffffffff,
      compressed: compressedSize32 === 0xffffffff,
      offset: offset32 === 0xffffffff,
      diskStart: diskStart === 0xffff
    });
    if (values.uncompressedSize !== undefined) uncompressedSize = values.uncompressedSize;
    if (values.compressedSize !== undefined) compressedSize = values.compressedSize;
    if (values.offset !== undefined) offset = values.offset;
    if (values.diskStart !== undefined && values.diskStart !== 0) {
      throw new ZipError('ZIP_UNSUPPORTED_FEATURE', 'Multi-disk ZIP is not supported', { entryName: name });
    }
  } else if (diskStart !== 0) {
    throw new ZipError('ZIP_UNSUPPORTED_FEATURE', 'Multi-disk ZIP is not supported', { entryName: name });
  }

  const host = madeBy >>> 8;
  const unixMode = host === 3 ? (externalAttributes >>> 16) & 0xffff : 0;

  return {
    name,
    nameSource: isUtf8 ? 'utf8-flag' : 'cp437',
    rawNameBytes: nameBytes,
    comment,
    flags,
    method,
    crc32,
    compressedSize,
    uncompressedSize,
    offset,
    mtime: dosToDate(modTime, modDate),
    isDirectory: name.endsWith('/'),
    isSymlink: host === 3 && (unixMode & 0xf000) === 0xa000,
    encrypted: (flags & 0x1) !== 0,
    zip64
  };
}

function decodeUtf8Name(bytes: Uint8Array, options: CentralDirectoryOptions): string {
  try {
    return decodeUtf8(bytes, true);
  } catch (err) {
    if (options.strict) {
      throw new ZipError('ZIP_INVALID_ENCODING', 'Invalid UTF-8 filename', { cause: err });
    }
    const name = decodeUtf8(bytes, false);
    options.onWarning?.({
      code: 'ZIP_INVALID_ENCODING',
      message: 'Invalid UTF-8 filename; using replacement characters',
      entryName: name
    });
    return name;
  }
}
