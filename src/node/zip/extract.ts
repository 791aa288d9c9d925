import { mkdir, open, rm, type FileHandle } from 'node:fs/promises';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { throwIfAborted } from '../../abort.js';
import { ZipError } from '../../errors.js';
import { mapIoError } from '../../reader/ioErrors.js';
import type { ZipReader } from '../../reader/ZipReader.js';
import type { ZipExtractOptions } from '../../types.js';

const DEFAULT_CONCURRENCY = 4;

interface PlannedFile {
  index: number;
  targetPath: string;
}

interface PathClaim {
  entryName: string;
  isDirectory: boolean;
}

/**
 * Extracts every entry of `reader` below `destDir`. Entry names are vetted
 * before any entry channel is opened; at most `concurrency` entries are
 * decoded at once.
 */
export async function extractAll(reader: ZipReader, destDir: string | URL, options?: ZipExtractOptions): Promise<void> {
  const baseDir = path.resolve(typeof destDir === 'string' ? destDir : fileURLToPath(destDir));
  const signal = options?.signal;
  const concurrency = Math.max(1, Math.floor(options?.concurrency ?? DEFAULT_CONCURRENCY));
  throwIfAborted(signal);

  const directories: string[] = [];
  const files: PlannedFile[] = [];
  const claimed = new Map<string, PathClaim>();
  for (const [index, entry] of reader.entries().entries()) {
    if (entry.isSymlink) {
      throw new ZipError('ZIP_SYMLINK_DISALLOWED', 'Symlink entries cannot be extracted', { entryName: entry.name });
    }
    const targetPath = resolveEntryPath(baseDir, entry.name);
    const existing = claimed.get(targetPath);
    if (existing !== undefined && !(existing.isDirectory && entry.isDirectory)) {
      throw nameCollision(entry.name, existing.entryName);
    }
    if (existing === undefined) {
      claimed.set(targetPath, { entryName: entry.name, isDirectory: entry.isDirectory });
    }
    if (entry.isDirectory) {
      directories.push(targetPath);
    } else {
      files.push({ index, targetPath });
    }
  }
  // A file cannot also be the parent directory of another entry.
  for (const [targetPath, claim] of claimed) {
    for (let parent = path.dirname(targetPath); parent.startsWith(baseDir + path.sep); parent = path.dirname(parent)) {
      const owner = claimed.get(parent);
      if (owner !== undefined && !owner.isDirectory) {
        throw nameCollision(claim.entryName, owner.entryName);
      }
    }
  }

  await mkdir(baseDir, { recursive: true });
  for (const dir of directories) {
    await mkdir(dir, { recursive: true });
  }

  let next = 0;
  let failure: { error: unknown } | undefined;
  const worker = async (): Promise<void> => {
    while (failure === undefined) {
      const file = files[next];
      next += 1;
      if (!file) return;
      try {
        throwIfAborted(signal);
        await extractFile(reader, file, signal);
      } catch (error) {
        failure ??= { error };
      }
    }
  };
  const workerCount = Math.min(concurrency, files.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  if (failure !== undefined) {
    throw failure.error;
  }
}

async function extractFile(reader: ZipReader, file: PlannedFile, signal?: AbortSignal): Promise<void> {
  await mkdir(path.dirname(file.targetPath), { recursive: true });
  const entryReader = await reader.entryReader(file.index, signal ? { signal } : undefined);
  let handle: FileHandle;
  try {
    handle = await open(file.targetPath, 'w');
  } catch (err) {
    await entryReader.close();
    throw mapIoError(err, 'open', file.targetPath);
  }
  try {
    await pipeline(Readable.from(entryReader), handle.createWriteStream(), signal ? { signal } : {});
  } catch (err) {
    await rm(file.targetPath, { force: true });
    throw mapIoError(err, 'write', file.targetPath);
  }
}

function nameCollision(entryName: string, previousEntryName: string): ZipError {
  return new ZipError('ZIP_NAME_COLLISION', 'Two entries extract to the same path', {
    entryName,
    context: { previousEntryName }
  });
}

export function resolveEntryPath(baseDir: string, entryName: string): string {
  if (entryName.includes('\u0000')) {
    throw new ZipError('ZIP_PATH_TRAVERSAL', 'Entry name contains NUL byte', { entryName });
  }
  const normalized = entryName.replace(/\\/g, '/');
  if (normalized.startsWith('/') || /^[a-zA-Z]:/.test(normalized)) {
    throw new ZipError('ZIP_PATH_TRAVERSAL', 'Absolute paths are not allowed in ZIP entries', { entryName });
  }
  const parts = normalized.split('/').filter((part) => part.length > 0 && part !== '.');
  if (parts.some((part) => part === '..')) {
    throw new ZipError('ZIP_PATH_TRAVERSAL', 'Path traversal detected in ZIP entry', { entryName });
  }
  const resolved = path.resolve(baseDir, ...parts);
  if (resolved !== baseDir && !resolved.startsWith(baseDir + path.sep)) {
    throw new ZipError('ZIP_PATH_TRAVERSAL', 'Entry path escapes destination directory', { entryName });
  }
  return resolved;
}
