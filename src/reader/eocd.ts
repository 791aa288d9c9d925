import { readUint16LE, readUint32LE, readUint64LE } from '../binary.js';
import { ZipError, type ZipWarning } from '../errors.js';
import { throwIfAborted } from '../abort.js';
import type { ResolvedZipLimits } from '../limits.js';
import type { RandomAccess } from './RandomAccess.js';

const EOCD_SIGNATURE = 0x06054b50;
const ZIP64_EOCD_SIGNATURE = 0x06064b50;
const ZIP64_LOCATOR_SIGNATURE = 0x07064b50;
const EOCD_MIN_SIZE = 22;

export interface EocdResult {
  cdOffset: bigint;
  cdSize: bigint;
  totalEntries: bigint;
}

export interface FindEocdOptions {
  strict: boolean;
  limits: ResolvedZipLimits;
  signal?: AbortSignal | undefined;
  onWarning?: ((warning: ZipWarning) => void) | undefined;
}

interface DirectoryTotals {
  cdOffset: bigint;
  cdSize: bigint;
  totalEntries: bigint;
  entriesOnDisk: bigint;
  diskNumber: number;
  cdDisk: number;
}

export async function findEocd(reader: RandomAccess, options: FindEocdOptions): Promise<EocdResult> {
  const { signal, limits } = options;
  const size = await reader.size(signal);
  if (size < BigInt(EOCD_MIN_SIZE)) {
    throw new ZipError('ZIP_EOCD_NOT_FOUND', 'File too small for EOCD', {
      context: { archiveBytes: size.toString() }
    });
  }
  const searchLimit = BigInt(limits.maxEocdSearchBytes);
  const searchSize = size < searchLimit ? size : searchLimit;
  const searchStart = size - searchSize;
  const buffer = await reader.read(searchStart, Number(searchSize), signal);
  if (BigInt(buffer.length) < searchSize) {
    throw new ZipError('ZIP_TRUNCATED', 'Archive tail shorter than reported size');
  }

  const candidates: number[] = [];
  for (let i = buffer.length - EOCD_MIN_SIZE; i >= 0; i -= 1) {
    if (readUint32LE(buffer, i) === EOCD_SIGNATURE) {
      candidates.push(i);
    }
  }
  throwIfAborted(signal);

  const chosenIndex = candidates[0];
  if (chosenIndex === undefined) {
    throw new ZipError('ZIP_EOCD_NOT_FOUND', 'End of central directory not found');
  }
  if (candidates.length > 1) {
    if (options.strict) {
      throw new ZipError('ZIP_MULTIPLE_EOCD', 'Multiple EOCD records found');
    }
    options.onWarning?.({
      code: 'ZIP_MULTIPLE_EOCD',
      message: 'Multiple EOCD records found; using last occurrence'
    });
  }

  const eocdOffset = searchStart + BigInt(chosenIndex);
  const commentLength = readUint16LE(buffer, chosenIndex + 20);
  if (commentLength > limits.maxCommentBytes) {
    throw new ZipError('ZIP_LIMIT_EXCEEDED', 'ZIP comment exceeds limit', {
      context: {
        requiredCommentBytes: String(commentLength),
        limitCommentBytes: String(limits.maxCommentBytes)
      }
    });
  }
  const recordEnd = chosenIndex + EOCD_MIN_SIZE + commentLength;
  if (recordEnd > buffer.length) {
    throw new ZipError('ZIP_BAD_EOCD', 'EOCD comment runs past end of file');
  }
  if (recordEnd !== buffer.length) {
    if (options.strict) {
      throw new ZipError('ZIP_BAD_EOCD', 'EOCD does not end at EOF');
    }
    options.onWarning?.({
      code: 'ZIP_BAD_EOCD',
      message: 'EOCD does not end at EOF; continuing in non-strict mode'
    });
  }

  const diskNumber = readUint16LE(buffer, chosenIndex + 4);
  const cdDisk = readUint16LE(buffer, chosenIndex + 6);
  const entriesOnDisk = readUint16LE(buffer, chosenIndex + 8);
  const totalEntries = readUint16LE(buffer, chosenIndex + 10);
  const cdSize32 = readUint32LE(buffer, chosenIndex + 12);
  const cdOffset32 = readUint32LE(buffer, chosenIndex + 16);

  const needsZip64 =
    cdDisk === 0xffff || totalEntries === 0xffff || cdSize32 === 0xffffffff || cdOffset32 === 0xffffffff;

  const totals = needsZip64
    ? await readZip64Totals(reader, eocdOffset, signal)
    : {
        cdOffset: BigInt(cdOffset32),
        cdSize: BigInt(cdSize32),
        totalEntries: BigInt(totalEntries),
        entriesOnDisk: BigInt(entriesOnDisk),
        diskNumber,
        cdDisk
      };

  enforceDirectoryLimits(totals, limits);
  if (totals.cdOffset + totals.cdSize > eocdOffset) {
    throw new ZipError('ZIP_BAD_CENTRAL_DIRECTORY', 'Central directory overlaps end of central directory record', {
      context: {
        cdOffset: totals.cdOffset.toString(),
        cdSize: totals.cdSize.toString(),
        eocdOffset: eocdOffset.toString()
      }
    });
  }

  return {
    cdOffset: totals.cdOffset,
    cdSize: totals.cdSize,
    totalEntries: totals.totalEntries
  };
}

async function readZip64Totals(reader: RandomAccess, eocdOffset: bigint, signal?: AbortSignal): Promise<DirectoryTotals> {
  const locatorOffset = eocdOffset - 20n;
  if (locatorOffset < 0n) {
    throw new ZipError('ZIP_BAD_ZIP64', 'Missing ZIP64 locator');
  }
  const locator = await reader.read(locatorOffset, 20, signal);
  if (locator.length < 20 || readUint32LE(locator, 0) !== ZIP64_LOCATOR_SIGNATURE) {
    throw new ZipError('ZIP_BAD_ZIP64', 'ZIP64 locator signature missing');
  }
  const zip64EocdOffset = readUint64LE(locator, 8);
  const header = await reader.read(zip64EocdOffset, 56, signal);
  if (header.length < 56 || readUint32LE(header, 0) !== ZIP64_EOCD_SIGNATURE) {
    throw new ZipError('ZIP_BAD_ZIP64', 'ZIP64 EOCD signature missing', { offset: zip64EocdOffset });
  }
  return {
    diskNumber: readUint32LE(header, 16),
    cdDisk: readUint32LE(header, 20),
    entriesOnDisk: readUint64LE(header, 24),
    totalEntries: readUint64LE(header, 32),
    cdSize: readUint64LE(header, 40),
    cdOffset: readUint64LE(header, 48)
  };
}

function enforceDirectoryLimits(info: DirectoryTotals, limits: ResolvedZipLimits): void {
  if (info.cdSize > BigInt(limits.maxCentralDirectoryBytes)) {
    throw new ZipError('ZIP_LIMIT_EXCEEDED', 'Central directory size exceeds limit', {
      context: {
        requiredCentralDirectoryBytes: info.cdSize.toString(),
        limitCentralDirectoryBytes: String(limits.maxCentralDirectoryBytes)
      }
    });
  }
  if (info.totalEntries > BigInt(limits.maxEntries)) {
    throw new ZipError('ZIP_LIMIT_EXCEEDED', 'Entry count exceeds limit', {
      context: {
        requiredEntries: info.totalEntries.toString(),
        limitEntries: String(limits.maxEntries)
      }
    });
  }
  if (info.diskNumber !== 0 || info.cdDisk !== 0 || info.entriesOnDisk !== info.totalEntries) {
    throw new ZipError('ZIP_UNSUPPORTED_FEATURE', 'Multi-disk ZIP archives are not supported', {
      context: {
        diskNumber: String(info.diskNumber),
        cdDisk: String(info.cdDisk),
        entriesOnDisk: info.entriesOnDisk.toString(),
        totalEntries: info.totalEntries.toString()
      }
    });
  }
}
