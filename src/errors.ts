import { REPORT_SCHEMA_VERSION } from './reportSchema.js';

/** Stable ZIP error codes. */
export type ZipErrorCode =
  | 'ZIP_IO_ERROR'
  | 'ZIP_EOCD_NOT_FOUND'
  | 'ZIP_MULTIPLE_EOCD'
  | 'ZIP_BAD_EOCD'
  | 'ZIP_BAD_ZIP64'
  | 'ZIP_BAD_CENTRAL_DIRECTORY'
  | 'ZIP_INVALID_SIGNATURE'
  | 'ZIP_INVALID_ENCODING'
  | 'ZIP_TRUNCATED'
  | 'ZIP_LIMIT_EXCEEDED'
  | 'ZIP_UNSUPPORTED_FEATURE'
  | 'ZIP_UNSUPPORTED_METHOD'
  | 'ZIP_UNSUPPORTED_ENCRYPTION'
  | 'ZIP_ENTRY_INDEX_OUT_OF_BOUNDS'
  | 'ZIP_MISSING_SIZE'
  | 'ZIP_SIZE_MISMATCH'
  | 'ZIP_READER_CLOSED'
  | 'ZIP_PATH_TRAVERSAL'
  | 'ZIP_NAME_COLLISION'
  | 'ZIP_SYMLINK_DISALLOWED';

/** Error thrown for ZIP indexing, acquisition and read failures. */
export class ZipError extends Error {
  /** Machine-readable error code. */
  readonly code: ZipErrorCode;
  /** Entry name related to the error, if available. */
  readonly entryName?: string | undefined;
  /** Compression method related to the error, if available. */
  readonly method?: number | undefined;
  /** Offset (in bytes) related to the error, if available. */
  readonly offset?: bigint | undefined;
  /** Underlying cause, if available. */
  override readonly cause?: unknown;
  /** Additional context for serialization. */
  readonly context?: Record<string, string> | undefined;

  constructor(
    code: ZipErrorCode,
    message: string,
    options?: {
      entryName?: string | undefined;
      method?: number | undefined;
      offset?: bigint | undefined;
      context?: Record<string, string> | undefined;
      cause?: unknown;
    }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'ZipError';
    this.code = code;
    this.entryName = options?.entryName;
    this.method = options?.method;
    this.offset = options?.offset;
    this.context = options?.context;
    this.cause = options?.cause;
  }

  /** JSON-safe serialization with schemaVersion "1". */
  toJSON(): {
    schemaVersion: string;
    name: string;
    code: ZipErrorCode;
    message: string;
    hint: string;
    context: Record<string, string>;
    entryName?: string;
    method?: number;
    offset?: string;
  } {
    const topLevelShadowKeys: string[] = [];
    if (this.entryName !== undefined) topLevelShadowKeys.push('entryName');
    if (this.method !== undefined) topLevelShadowKeys.push('method');
    if (this.offset !== undefined) topLevelShadowKeys.push('offset');
    const context = sanitizeErrorContext(this.context, topLevelShadowKeys);
    return {
      schemaVersion: REPORT_SCHEMA_VERSION,
      name: this.name,
      code: this.code,
      message: this.message,
      hint: hintFor(this.code, this.message),
      context,
      ...(this.entryName !== undefined ? { entryName: this.entryName } : {}),
      ...(this.method !== undefined ? { method: this.method } : {}),
      ...(this.offset !== undefined ? { offset: this.offset.toString() } : {})
    };
  }
}

const HINTS: Partial<Record<ZipErrorCode, string>> = {
  ZIP_IO_ERROR: 'Check that the archive exists and is readable, and that the process has file descriptors to spare',
  ZIP_ENTRY_INDEX_OUT_OF_BOUNDS: 'Use an index below entries().length, or look the entry up by name',
  ZIP_MISSING_SIZE: 'The directory indexer did not record the size needed to bound this entry',
  ZIP_READER_CLOSED: 'Acquire a new entry reader to read the entry again'
};

function hintFor(code: ZipErrorCode, message: string): string {
  return HINTS[code] ?? message;
}

/** Non-fatal ZIP warning codes. */
export type ZipWarningCode =
  | 'ZIP_MULTIPLE_EOCD'
  | 'ZIP_BAD_EOCD'
  | 'ZIP_BAD_CENTRAL_DIRECTORY'
  | 'ZIP_INVALID_ENCODING'
  | 'ZIP_MISSING_SIZE'
  | 'ZIP_IO_ERROR';

/** Non-fatal warning produced while indexing or reading ZIP entries. */
export type ZipWarning = {
  code: ZipWarningCode;
  message: string;
  entryName?: string;
};

const RESERVED_CONTEXT_KEYS: readonly string[] = ['schemaVersion', 'name', 'code', 'message', 'hint', 'context'];

function sanitizeErrorContext(
  context: Record<string, string> | undefined,
  topLevelShadowKeys: readonly string[]
): Record<string, string> {
  if (!context) return {};
  const disallowed = new Set<string>([...RESERVED_CONTEXT_KEYS, ...topLevelShadowKeys]);
  const sanitized: Record<string, string> = {};
  for (const [key, value] of Object.entries(context)) {
    if (disallowed.has(key)) continue;
    sanitized[key] = value;
  }
  return sanitized;
}
