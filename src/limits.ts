/** Resource ceilings applied while indexing and decoding ZIP archives. */
export type ZipLimits = {
  maxEntries?: number;
  maxCentralDirectoryBytes?: number;
  maxCommentBytes?: number;
  maxEocdSearchBytes?: number;
  maxUncompressedEntryBytes?: bigint | number;
};

export type ResolvedZipLimits = {
  maxEntries: number;
  maxCentralDirectoryBytes: number;
  maxCommentBytes: number;
  maxEocdSearchBytes: number;
  maxUncompressedEntryBytes: bigint;
};

export const DEFAULT_LIMITS: Readonly<ResolvedZipLimits> = Object.freeze({
  maxEntries: 10000,
  maxCentralDirectoryBytes: 64 * 1024 * 1024,
  maxCommentBytes: 0xffff,
  // APPNOTE 4.3.16: EOCD lives in the last 64KiB + its fixed 22 bytes.
  maxEocdSearchBytes: 0x10000 + 22,
  maxUncompressedEntryBytes: 4n * 1024n * 1024n * 1024n
} satisfies ResolvedZipLimits);

export function resolveLimits(limits?: ZipLimits, defaults: Readonly<ResolvedZipLimits> = DEFAULT_LIMITS): ResolvedZipLimits {
  return {
    maxEntries: positiveInteger(limits?.maxEntries) ?? defaults.maxEntries,
    maxCentralDirectoryBytes: positiveInteger(limits?.maxCentralDirectoryBytes) ?? defaults.maxCentralDirectoryBytes,
    maxCommentBytes: positiveInteger(limits?.maxCommentBytes) ?? defaults.maxCommentBytes,
    maxEocdSearchBytes: Math.max(22, positiveInteger(limits?.maxEocdSearchBytes) ?? defaults.maxEocdSearchBytes),
    maxUncompressedEntryBytes: toBigInt(limits?.maxUncompressedEntryBytes) ?? defaults.maxUncompressedEntryBytes
  };
}

function positiveInteger(value: number | undefined): number | undefined {
  if (typeof value !== 'number' || !Number.isFinite(value)) return undefined;
  return Math.max(0, Math.floor(value));
}

function toBigInt(value?: bigint | number): bigint | undefined {
  if (value === undefined) return undefined;
  if (typeof value === 'bigint') return value;
  if (!Number.isFinite(value)) return undefined;
  return BigInt(Math.max(0, Math.floor(value)));
}
