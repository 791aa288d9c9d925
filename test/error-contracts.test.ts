import test from 'node:test';
import assert from 'node:assert/strict';
import { ZipError } from '../src/index.js';
import { mapIoError } from '../src/reader/ioErrors.js';

test('toJSON emits the versioned report with hint and top-level fields', () => {
  const err = new ZipError('ZIP_READER_CLOSED', 'Entry reader has been closed', {
    entryName: 'a.txt',
    method: 8,
    offset: 42n
  });
  assert.deepEqual(err.toJSON(), {
    schemaVersion: '1',
    name: 'ZipError',
    code: 'ZIP_READER_CLOSED',
    message: 'Entry reader has been closed',
    hint: 'Acquire a new entry reader to read the entry again',
    context: {},
    entryName: 'a.txt',
    method: 8,
    offset: '42'
  });
  assert.equal(JSON.stringify(err), JSON.stringify(err.toJSON()));
});

test('toJSON falls back to the message when no hint is registered', () => {
  const err = new ZipError('ZIP_TRUNCATED', 'Central directory truncated');
  assert.equal(err.toJSON().hint, 'Central directory truncated');
});

test('toJSON drops context keys that shadow report fields', () => {
  const err = new ZipError('ZIP_BAD_EOCD', 'bad', {
    entryName: 'x',
    context: {
      code: 'spoofed',
      schemaVersion: '99',
      entryName: 'shadow',
      offset: 'shadow',
      detail: 'kept'
    }
  });
  assert.deepEqual(err.toJSON().context, { offset: 'shadow', detail: 'kept' });
});

test('storage failures become ZIP_IO_ERROR with the original as cause', () => {
  const original = Object.assign(new Error('permission denied'), { code: 'EACCES' });
  const mapped = mapIoError(original, 'read', '/tmp/a.zip');
  assert.ok(mapped instanceof ZipError);
  assert.equal(mapped.code, 'ZIP_IO_ERROR');
  assert.equal(mapped.message, 'Archive read failed: permission denied');
  assert.equal(mapped.cause, original);
  assert.deepEqual(mapped.context, { operation: 'read', locator: '/tmp/a.zip', errno: 'EACCES' });
});

test('ZipErrors and aborts pass through the storage mapping unchanged', () => {
  const zipError = new ZipError('ZIP_TRUNCATED', 'short');
  assert.equal(mapIoError(zipError, 'read', 'memory'), zipError);
  const abort = new DOMException('The operation was aborted', 'AbortError');
  assert.equal(mapIoError(abort, 'read', 'memory'), abort);
});
