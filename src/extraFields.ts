import { readUint16LE, readUint32LE, readUint64LE } from './binary.js';
import { ZipError } from './errors.js';

export const ZIP64_EXTRA_ID = 0x0001;

export interface Zip64ExtraValues {
  uncompressedSize?: bigint;
  compressedSize?: bigint;
  offset?: bigint;
  diskStart?: number;
}

export function parseExtraFields(extra: Uint8Array): Map<number, Uint8Array> {
  const map = new Map<number, Uint8Array>();
  let offset = 0;
  while (offset + 4 <= extra.length) {
    const headerId = readUint16LE(extra, offset);
    const size = readUint16LE(extra, offset + 2);
    const dataStart = offset + 4;
    const dataEnd = dataStart + size;
    if (dataEnd > extra.length) {
      break;
    }
    map.set(headerId, extra.subarray(dataStart, dataEnd));
    offset = dataEnd;
  }
  return map;
}

export function parseZip64Extra(
  data: Uint8Array,
  present: {
    uncompressed: boolean;
    compressed: boolean;
    offset: boolean;
    diskStart: boolean;
  }
): Zip64ExtraValues {
  // APPNOTE 4.5.3: only the saturated fields are present, in this order.
  const required =
    (present.uncompressed ? 8 : 0) + (present.compressed ? 8 : 0) + (present.offset ? 8 : 0) + (present.diskStart ? 4 : 0);
  if (data.length < required) {
    throw new ZipError('ZIP_BAD_ZIP64', 'ZIP64 extra field is too short', {
      context: { requiredBytes: String(required), actualBytes: String(data.length) }
    });
  }
  let offset = 0;
  const values: Zip64ExtraValues = {};
  if (present.uncompressed) {
    values.uncompressedSize = readUint64LE(data, offset);
    offset += 8;
  }
  if (present.compressed) {
    values.compressedSize = readUint64LE(data, offset);
    offset += 8;
  }
  if (present.offset) {
    values.offset = readUint64LE(data, offset);
    offset += 8;
  }
  if (present.diskStart) {
    values.diskStart = readUint32LE(data, offset);
  }
  return values;
}
