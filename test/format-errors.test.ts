import test from 'node:test';
import assert from 'node:assert/strict';
import { BufferArchiveSource, ZipError, ZipReader } from '../src/node/index.js';
import { CountingSource, buildZip } from './helpers/zipFixture.js';

function isZipError(code: string) {
  return (err: unknown) => err instanceof ZipError && err.code === code;
}

test('input too small for an EOCD record is ZIP_EOCD_NOT_FOUND and the channel is closed', async () => {
  const source = new CountingSource(new BufferArchiveSource(new Uint8Array([1, 2, 3, 4, 5])));
  await assert.rejects(ZipReader.fromSource(source), (err: unknown) => {
    return err instanceof ZipError && err.code === 'ZIP_EOCD_NOT_FOUND' && err.context?.archiveBytes === '5';
  });
  assert.equal(source.opened, 1);
  assert.equal(source.closed, 1);
});

test('archive cut inside its EOCD record is ZIP_EOCD_NOT_FOUND', async () => {
  const { bytes } = buildZip([{ name: 'a.txt', data: 'abc' }]);
  await assert.rejects(ZipReader.fromUint8Array(bytes.subarray(0, bytes.length - 4)), isZipError('ZIP_EOCD_NOT_FOUND'));
});

test('corrupt central directory signature is rejected', async () => {
  const built = buildZip([{ name: 'a.txt', data: 'abc' }]);
  const bytes = built.bytes.slice();
  bytes[built.cdOffset] = 0;
  await assert.rejects(ZipReader.fromUint8Array(bytes), (err: unknown) => {
    return err instanceof ZipError && err.code === 'ZIP_BAD_CENTRAL_DIRECTORY' && err.offset === BigInt(built.cdOffset);
  });
});

test('corrupt local header signature is rejected while indexing', async () => {
  const built = buildZip([
    { name: 'a.txt', data: 'abc' },
    { name: 'b.txt', data: 'def' }
  ]);
  const bytes = built.bytes.slice();
  const second = built.layout[1];
  assert.ok(second);
  bytes[second.localHeaderOffset] = 0;
  await assert.rejects(ZipReader.fromUint8Array(bytes), (err: unknown) => {
    return err instanceof ZipError && err.code === 'ZIP_INVALID_SIGNATURE' && err.entryName === 'b.txt';
  });
});

test('local header method disagreeing with the central directory is rejected', async () => {
  const bytes = buildZip([{ name: 'a.txt', data: 'abc', method: 8, localMethod: 0 }]).bytes;
  await assert.rejects(ZipReader.fromUint8Array(bytes), (err: unknown) => {
    return err instanceof ZipError && err.code === 'ZIP_BAD_CENTRAL_DIRECTORY' && err.method === 0;
  });
});

test('trailing bytes after the EOCD fail in strict mode and warn otherwise', async () => {
  const bytes = buildZip([{ name: 'a.txt', data: 'abc' }], {
    trailing: new TextEncoder().encode('trailing')
  }).bytes;
  await assert.rejects(ZipReader.fromUint8Array(bytes), isZipError('ZIP_BAD_EOCD'));

  const seen: string[] = [];
  const reader = await ZipReader.fromUint8Array(bytes, {
    isStrict: false,
    onWarning: (warning) => seen.push(warning.code)
  });
  assert.deepEqual(reader.warnings(), [
    { code: 'ZIP_BAD_EOCD', message: 'EOCD does not end at EOF; continuing in non-strict mode' }
  ]);
  assert.deepEqual(seen, ['ZIP_BAD_EOCD']);
  assert.equal(await (await reader.entryReader(0)).text(), 'abc');
});

test('a second EOCD signature inside the comment is rejected in strict mode', async () => {
  const bytes = buildZip([{ name: 'a.txt', data: 'abc' }], {
    comment: `PK\u0005\u0006${'x'.repeat(24)}`
  }).bytes;
  await assert.rejects(ZipReader.fromUint8Array(bytes), isZipError('ZIP_MULTIPLE_EOCD'));
});

test('directory limits are enforced', async () => {
  const bytes = buildZip(
    [
      { name: 'a.txt', data: 'a' },
      { name: 'b.txt', data: 'b' },
      { name: 'c.txt', data: 'c' }
    ],
    { comment: 'archive comment' }
  ).bytes;

  await assert.rejects(ZipReader.fromUint8Array(bytes, { limits: { maxEntries: 2 } }), (err: unknown) => {
    return err instanceof ZipError && err.code === 'ZIP_LIMIT_EXCEEDED' && err.context?.requiredEntries === '3';
  });
  await assert.rejects(ZipReader.fromUint8Array(bytes, { limits: { maxCommentBytes: 4 } }), (err: unknown) => {
    return err instanceof ZipError && err.code === 'ZIP_LIMIT_EXCEEDED' && err.context?.requiredCommentBytes === '15';
  });
  await assert.rejects(
    ZipReader.fromUint8Array(bytes, { limits: { maxCentralDirectoryBytes: 10 } }),
    isZipError('ZIP_LIMIT_EXCEEDED')
  );

  const reader = await ZipReader.fromUint8Array(bytes, { limits: { maxEntries: 3 } });
  assert.equal(reader.entries().length, 3);
});

test('names without the UTF-8 flag decode as CP437', async () => {
  const reader = await ZipReader.fromUint8Array(
    buildZip([{ name: 'ignored', nameBytes: new Uint8Array([0x63, 0x61, 0x66, 0x82]), data: 'x' }]).bytes
  );
  const entry = reader.entries()[0];
  assert.equal(entry?.name, 'café');
  assert.equal(entry?.nameSource, 'cp437');
  assert.equal(reader.entry('café')?.index, 0);
});

test('invalid UTF-8 names fail in strict mode and are replaced otherwise', async () => {
  const bytes = buildZip([
    { name: 'ignored', nameBytes: new Uint8Array([0x61, 0xff, 0x62]), flags: 0x800, data: 'x' }
  ]).bytes;
  await assert.rejects(ZipReader.fromUint8Array(bytes), isZipError('ZIP_INVALID_ENCODING'));

  const reader = await ZipReader.fromUint8Array(bytes, { isStrict: false });
  assert.equal(reader.entries()[0]?.name, 'a\uFFFDb');
  assert.deepEqual(reader.warnings(), [
    {
      code: 'ZIP_INVALID_ENCODING',
      message: 'Invalid UTF-8 filename; using replacement characters',
      entryName: 'a\uFFFDb'
    }
  ]);
});

test('unix symlink entries are flagged', async () => {
  const reader = await ZipReader.fromUint8Array(
    buildZip([
      { name: 'link', data: 'target.txt', madeBy: (3 << 8) | 20, externalAttributes: 0o120777 * 0x10000 },
      { name: 'plain.txt', data: 'x', madeBy: (3 << 8) | 20, externalAttributes: 0o100644 * 0x10000 }
    ]).bytes
  );
  assert.equal(reader.entries()[0]?.isSymlink, true);
  assert.equal(reader.entries()[1]?.isSymlink, false);
});

test('an aborted signal stops construction before indexing', async () => {
  const source = new CountingSource(new BufferArchiveSource(buildZip([{ name: 'a.txt', data: 'abc' }]).bytes));
  const controller = new AbortController();
  controller.abort();
  await assert.rejects(ZipReader.fromSource(source, { signal: controller.signal }), (err: unknown) => {
    return err instanceof Error && err.name === 'AbortError';
  });
  assert.equal(source.opened, 0);
});
