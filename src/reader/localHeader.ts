import { readUint16LE, readUint32LE } from '../binary.js';
import { ZipError } from '../errors.js';
import type { RandomAccess } from './RandomAccess.js';
import type { CentralDirectoryRecord } from './centralDirectory.js';

const LFH_SIGNATURE = 0x04034b50;
const LFH_SIZE = 30;

export interface LocalHeaderInfo {
  method: number;
  dataOffset: bigint;
}

/** Reads the fixed local header to find where the entry's payload starts. */
export async function readLocalHeader(
  reader: RandomAccess,
  record: CentralDirectoryRecord,
  signal?: AbortSignal
): Promise<LocalHeaderInfo> {
  const header = await reader.read(record.offset, LFH_SIZE, signal);
  if (header.length < LFH_SIZE) {
    throw new ZipError('ZIP_TRUNCATED', 'Local header truncated', {
      entryName: record.name,
      offset: record.offset
    });
  }
  if (readUint32LE(header, 0) !== LFH_SIGNATURE) {
    throw new ZipError('ZIP_INVALID_SIGNATURE', 'Invalid local file header signature', {
      entryName: record.name,
      offset: record.offset
    });
  }
  const nameLen = readUint16LE(header, 26);
  const extraLen = readUint16LE(header, 28);
  return {
    method: readUint16LE(header, 8),
    dataOffset: record.offset + BigInt(LFH_SIZE + nameLen + extraLen)
  };
}
