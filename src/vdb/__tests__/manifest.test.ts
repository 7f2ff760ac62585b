import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as path from 'path';
import { parseManifest, objectRecords, readManifest } from '../manifest.js';
import { ManifestMissingError } from '../../core/errors.js';
import { cleanupTempDir, createTempDir, obj, writeVdb } from '../../test/vdb_fixture.js';

describe('parseManifest', () => {
  it('keeps the type and the first path token of each record', () => {
    const records = parseManifest(
      [
        'dir /usr/lib64',
        'obj /usr/lib64/libbar.so.1.2.0 0123456789abcdef0123456789abcdef 1700000000',
        'sym /usr/lib64/libbar.so.1 -> libbar.so.1.2.0 1700000000',
        '',
      ].join('\n'),
    );

    expect(records).toEqual([
      { type: 'dir', path: '/usr/lib64' },
      { type: 'obj', path: '/usr/lib64/libbar.so.1.2.0' },
      { type: 'sym', path: '/usr/lib64/libbar.so.1' },
    ]);
  });

  it('skips blank lines and lines without a path', () => {
    expect(parseManifest('\n\nobj\n\nobj /usr/bin/foo x 1\n')).toEqual([{ type: 'obj', path: '/usr/bin/foo' }]);
  });

  it('returns no records for empty text', () => {
    expect(parseManifest('')).toEqual([]);
  });
});

describe('objectRecords', () => {
  it('keeps only obj records', () => {
    const records = parseManifest('dir /usr/bin\nobj /usr/bin/foo a 1\nsym /usr/bin/f -> foo 1\nfif /run/x\n');
    expect(objectRecords(records)).toEqual([{ type: 'obj', path: '/usr/bin/foo' }]);
  });
});

describe('readManifest', () => {
  let vdb: string;

  beforeEach(() => {
    vdb = createTempDir();
  });

  afterEach(() => {
    cleanupTempDir(vdb);
  });

  it('reads CONTENTS from the package directory', async () => {
    const [dir] = writeVdb(vdb, [{ cpf: 'cat-a/foo-1.0', contents: [obj('/usr/bin/foo')] }]);

    const records = await readManifest({ dir, cpf: 'cat-a/foo-1.0', category: 'cat-a', pf: 'foo-1.0' });

    expect(records).toEqual([{ type: 'obj', path: '/usr/bin/foo' }]);
  });

  it('raises ManifestMissingError when CONTENTS is absent', async () => {
    const [dir] = writeVdb(vdb, [{ cpf: 'cat-a/foo-1.0' }]);
    const entry = { dir, cpf: 'cat-a/foo-1.0', category: 'cat-a', pf: 'foo-1.0' };

    const error = await readManifest(entry).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ManifestMissingError);
    expect(error).toMatchObject({
      code: 'MANIFEST_MISSING',
      cpf: 'cat-a/foo-1.0',
      manifestPath: path.join(dir, 'CONTENTS'),
      fatal: true,
    });
  });
});
