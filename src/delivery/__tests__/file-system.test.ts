/**
 * Tests for the Node file system capability
 *
 * Runs against temporary directories. rename is wrapped so one test can
 * simulate a cross-device move; every other call reaches the real fs.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const { renameFault } = vi.hoisted(() => {
  const renameFault: { code?: string } = {};
  return { renameFault };
});

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return {
    ...actual,
    rename: vi.fn(async (from: string, to: string) => {
      if (renameFault.code) {
        throw Object.assign(new Error(`${renameFault.code}: simulated rename failure`), { code: renameFault.code });
      }
      return actual.rename(from, to);
    }),
  };
});

import { mkdir, mkdtemp, readFile, readdir, rm, symlink, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { nodeFileSystem } from '../file-system.js';

let dir: string;
let source: string;
let sent: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'ebook-mailer-fs-'));
  source = join(dir, 'to-send');
  sent = join(dir, 'sent');
  await mkdir(source);
  renameFault.code = undefined;
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// listFiles
// ---------------------------------------------------------------------------

describe('listFiles', () => {
  it('lists regular files and file symlinks in name order, skipping directories', async () => {
    await writeFile(join(source, 'c.txt'), 'c');
    await writeFile(join(source, 'a.epub'), 'a');
    await writeFile(join(source, 'b.pdf'), 'b');
    await mkdir(join(source, 'nested'));
    await writeFile(join(source, 'nested', 'inner.epub'), 'x');
    await symlink(join(source, 'a.epub'), join(source, 'link.epub'));
    await symlink(join(source, 'does-not-exist'), join(source, 'zz-dangling'));

    expect(await nodeFileSystem.listFiles(source)).toEqual([
      join(source, 'a.epub'),
      join(source, 'b.pdf'),
      join(source, 'c.txt'),
      join(source, 'link.epub'),
    ]);
  });

  it('returns an empty list for an empty directory', async () => {
    expect(await nodeFileSystem.listFiles(source)).toEqual([]);
  });

  it('rejects when the directory does not exist', async () => {
    await expect(nodeFileSystem.listFiles(join(dir, 'missing'))).rejects.toMatchObject({ code: 'ENOENT' });
  });
});

// ---------------------------------------------------------------------------
// moveFile
// ---------------------------------------------------------------------------

describe('moveFile', () => {
  it('moves the file into the destination, creating it', async () => {
    const filePath = join(source, 'book1.epub');
    await writeFile(filePath, 'book one');

    const movedTo = await nodeFileSystem.moveFile(filePath, sent);

    expect(movedTo).toBe(join(sent, 'book1.epub'));
    expect(await readdir(source)).toEqual([]);
    expect(await readFile(movedTo, 'utf8')).toBe('book one');
  });

  it('refuses to overwrite an existing file', async () => {
    const filePath = join(source, 'book1.epub');
    await writeFile(filePath, 'new copy');
    await mkdir(sent);
    await writeFile(join(sent, 'book1.epub'), 'old copy');

    await expect(nodeFileSystem.moveFile(filePath, sent)).rejects.toThrow(
      `Destination already exists: ${join(sent, 'book1.epub')}`,
    );
    expect(await readFile(filePath, 'utf8')).toBe('new copy');
    expect(await readFile(join(sent, 'book1.epub'), 'utf8')).toBe('old copy');
  });

  it('falls back to copy and delete across devices', async () => {
    const filePath = join(source, 'book1.epub');
    await writeFile(filePath, 'book one');
    renameFault.code = 'EXDEV';

    const movedTo = await nodeFileSystem.moveFile(filePath, sent);

    expect(await readdir(source)).toEqual([]);
    expect(await readFile(movedTo, 'utf8')).toBe('book one');
  });

  it('leaves the source in place when rename fails for another reason', async () => {
    const filePath = join(source, 'book1.epub');
    await writeFile(filePath, 'book one');
    renameFault.code = 'EACCES';

    await expect(nodeFileSystem.moveFile(filePath, sent)).rejects.toMatchObject({ code: 'EACCES' });
    expect(await readdir(source)).toEqual(['book1.epub']);
    expect(await readdir(sent)).toEqual([]);
  });
});
