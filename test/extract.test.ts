import test from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, mkdtemp, readFile, readdir, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { BufferArchiveSource, ZipError, ZipReader, extractAll } from '../src/node/index.js';
import { resolveEntryPath } from '../src/node/zip/extract.js';
import { CountingSource, buildZip } from './helpers/zipFixture.js';

const UNIX_MADE_BY = (3 << 8) | 20;

async function withTempDir(run: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(path.join(tmpdir(), 'ziplane-extract-'));
  try {
    await run(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

test('extractAll writes files and directories below the destination', async () => {
  const blob = new Uint8Array(120_000);
  for (let i = 0; i < blob.length; i += 1) blob[i] = (i * 7) % 256;
  const source = new CountingSource(
    new BufferArchiveSource(
      buildZip([
        { name: 'docs/' },
        { name: 'docs/readme.txt', data: 'read me', method: 8 },
        { name: 'data/nested/blob.bin', data: blob, method: 8 },
        { name: 'top.txt', data: 'top level' },
        { name: 'empty/' }
      ]).bytes
    )
  );
  const reader = await ZipReader.fromSource(source);

  await withTempDir(async (dir) => {
    const out = path.join(dir, 'out');
    await reader.extractAll(out, { concurrency: 2 });

    assert.equal(await readFile(path.join(out, 'docs', 'readme.txt'), 'utf8'), 'read me');
    assert.equal(await readFile(path.join(out, 'top.txt'), 'utf8'), 'top level');
    assert.deepEqual(new Uint8Array(await readFile(path.join(out, 'data', 'nested', 'blob.bin'))), blob);
    assert.ok((await stat(path.join(out, 'empty'))).isDirectory());
    assert.deepEqual((await readdir(out)).sort(), ['data', 'docs', 'empty', 'top.txt']);
  });
  assert.equal(source.opened, 4);
  assert.equal(source.closed, 4);
});

test('path traversal is rejected before any entry channel opens', async () => {
  const source = new CountingSource(
    new BufferArchiveSource(
      buildZip([
        { name: 'ok.txt', data: 'fine' },
        { name: '../evil.txt', data: 'nope' }
      ]).bytes
    )
  );
  const reader = await ZipReader.fromSource(source);
  await withTempDir(async (dir) => {
    await assert.rejects(extractAll(reader, path.join(dir, 'out')), (err: unknown) => {
      return err instanceof ZipError && err.code === 'ZIP_PATH_TRAVERSAL' && err.entryName === '../evil.txt';
    });
    assert.deepEqual(await readdir(dir), []);
  });
  assert.equal(source.opened, 1);
});

test('symlink entries are not extracted', async () => {
  const reader = await ZipReader.fromUint8Array(
    buildZip([
      { name: 'link', data: '/etc/passwd', madeBy: UNIX_MADE_BY, externalAttributes: 0o120777 * 0x10000 }
    ]).bytes
  );
  await withTempDir(async (dir) => {
    await assert.rejects(reader.extractAll(dir), (err: unknown) => {
      return err instanceof ZipError && err.code === 'ZIP_SYMLINK_DISALLOWED' && err.entryName === 'link';
    });
  });
});

test('entries extracting to the same path are rejected', async () => {
  const reader = await ZipReader.fromUint8Array(
    buildZip([
      { name: 'same.txt', data: 'one' },
      { name: './same.txt', data: 'two' }
    ]).bytes
  );
  await withTempDir(async (dir) => {
    await assert.rejects(reader.extractAll(dir), (err: unknown) => {
      return (
        err instanceof ZipError &&
        err.code === 'ZIP_NAME_COLLISION' &&
        err.entryName === './same.txt' &&
        err.context?.previousEntryName === 'same.txt'
      );
    });
  });
});

test('a failing entry stops extraction and is rethrown', async () => {
  const reader = await ZipReader.fromUint8Array(
    buildZip([
      { name: 'good.txt', data: 'good' },
      { name: 'bad.txt', data: 'abc', declaredUncompressedSize: 2 }
    ]).bytes
  );
  await withTempDir(async (dir) => {
    await assert.rejects(reader.extractAll(dir, { concurrency: 1 }), (err: unknown) => {
      return err instanceof ZipError && err.code === 'ZIP_SIZE_MISMATCH' && err.entryName === 'bad.txt';
    });
    assert.equal(await readFile(path.join(dir, 'good.txt'), 'utf8'), 'good');
    await assert.rejects(stat(path.join(dir, 'bad.txt')), (err: unknown) => {
      return err instanceof Error && 'code' in err && err.code === 'ENOENT';
    });
  });
});

test('a file entry and a directory entry with the same path collide', async () => {
  const source = new CountingSource(
    new BufferArchiveSource(
      buildZip([
        { name: 'a', data: 'file' },
        { name: 'a/' }
      ]).bytes
    )
  );
  const reader = await ZipReader.fromSource(source);
  await withTempDir(async (dir) => {
    await assert.rejects(reader.extractAll(dir), (err: unknown) => {
      return (
        err instanceof ZipError &&
        err.code === 'ZIP_NAME_COLLISION' &&
        err.entryName === 'a/' &&
        err.context?.previousEntryName === 'a'
      );
    });
    assert.deepEqual(await readdir(dir), []);
  });
  assert.equal(source.opened, 1);
});

test('a file entry cannot be the parent directory of another entry', async () => {
  const reader = await ZipReader.fromUint8Array(
    buildZip([
      { name: 'a', data: 'file' },
      { name: 'a/b.txt', data: 'nested' }
    ]).bytes
  );
  await withTempDir(async (dir) => {
    await assert.rejects(reader.extractAll(dir), (err: unknown) => {
      return (
        err instanceof ZipError &&
        err.code === 'ZIP_NAME_COLLISION' &&
        err.entryName === 'a/b.txt' &&
        err.context?.previousEntryName === 'a'
      );
    });
  });
});

test('repeated directory entries extract once', async () => {
  const reader = await ZipReader.fromUint8Array(
    buildZip([{ name: 'd/' }, { name: 'd/' }, { name: 'd/f.txt', data: 'inside' }]).bytes
  );
  await withTempDir(async (dir) => {
    await reader.extractAll(dir);
    assert.equal(await readFile(path.join(dir, 'd', 'f.txt'), 'utf8'), 'inside');
  });
});

test('write-side failures surface as ZIP_IO_ERROR and release the entry channel', async () => {
  const source = new CountingSource(new BufferArchiveSource(buildZip([{ name: 'taken.txt', data: 'x' }]).bytes));
  const reader = await ZipReader.fromSource(source);
  await withTempDir(async (dir) => {
    const target = path.join(dir, 'taken.txt');
    await mkdir(target);
    await assert.rejects(reader.extractAll(dir), (err: unknown) => {
      return (
        err instanceof ZipError &&
        err.code === 'ZIP_IO_ERROR' &&
        err.context?.operation === 'open' &&
        err.context?.locator === target &&
        err.context?.errno === 'EISDIR'
      );
    });
  });
  assert.equal(source.opened, 2);
  assert.equal(source.closed, 2);
});

test('resolveEntryPath keeps names inside the base directory', () => {
  const base = path.resolve('/srv/out');
  assert.equal(resolveEntryPath(base, 'a/./b.txt'), path.join(base, 'a', 'b.txt'));
  assert.equal(resolveEntryPath(base, 'dir\\file.txt'), path.join(base, 'dir', 'file.txt'));
  for (const name of ['/abs.txt', 'C:/win.txt', 'a/../../x', 'nul\u0000.txt']) {
    assert.throws(() => resolveEntryPath(base, name), (err: unknown) => {
      return err instanceof ZipError && err.code === 'ZIP_PATH_TRAVERSAL';
    });
  }
});
