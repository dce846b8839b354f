import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  isAtomicTempFor,
  isDirectory,
  isFile,
  removeIfExists,
  syncDirectory,
  writeFileAtomic,
} from './file.js';

let root: string;

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), 'equirect-file-'));
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe('writeFileAtomic', () => {
  it('replaces content without leaving temp files', async () => {
    const target = join(root, 'record.json');
    await writeFile(target, 'old');

    await writeFileAtomic(target, 'new');

    expect(await readFile(target, 'utf8')).toBe('new');
    expect(await readdir(root)).toEqual(['record.json']);
  });

  it('keeps the last of many consecutive replacements', async () => {
    const target = join(root, 'record.json');
    for (let i = 0; i < 20; i++) {
      await writeFileAtomic(target, `{"n":${i}}`);
    }

    expect(await readFile(target, 'utf8')).toBe('{"n":19}');
    expect(await readdir(root)).toEqual(['record.json']);
  });

  it('fails when the directory is missing', async () => {
    await expect(writeFileAtomic(join(root, 'missing', 'record.json'), 'x')).rejects.toThrow();
  });
});

describe.skipIf(process.platform === 'win32')('syncDirectory', () => {
  it('syncs an existing directory', async () => {
    await expect(syncDirectory(root)).resolves.toBeUndefined();
  });

  it('fails for a missing directory', async () => {
    await expect(syncDirectory(join(root, 'missing'))).rejects.toMatchObject({ code: 'ENOENT' });
  });
});

describe('isAtomicTempFor', () => {
  it('matches temp names of the target only', () => {
    expect(isAtomicTempFor('.record.json.42.1700000000000.tmp', 'record.json')).toBe(true);
    expect(isAtomicTempFor('record.json', 'record.json')).toBe(false);
    expect(isAtomicTempFor('.other.json.42.1.tmp', 'record.json')).toBe(false);
  });
});

describe('file checks', () => {
  it('tells files and directories apart', async () => {
    await writeFile(join(root, 'a.mp4'), '');
    await mkdir(join(root, 'dir'));

    expect(await isFile(join(root, 'a.mp4'))).toBe(true);
    expect(await isFile(join(root, 'dir'))).toBe(false);
    expect(await isDirectory(join(root, 'dir'))).toBe(true);
    expect(await isDirectory(join(root, 'a.mp4', 'nested'))).toBe(false);
  });

  it('reports whether removeIfExists removed anything', async () => {
    await writeFile(join(root, 'a.mp4'), '');

    expect(await removeIfExists(join(root, 'a.mp4'))).toBe(true);
    expect(await removeIfExists(join(root, 'a.mp4'))).toBe(false);
  });
});
