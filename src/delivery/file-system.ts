/**
 * File System Capability
 *
 * The two filesystem primitives the orchestrator needs, behind an interface
 * so runs can be tested against an in-memory fake.
 *
 * - listFiles: regular files directly inside a directory (symlinks to regular
 *   files included), sorted by name, as absolute paths
 * - moveFile: moves a file into a directory, keeping its name. Creates the
 *   directory if needed, refuses to overwrite, falls back to copy + unlink
 *   across devices.
 */

import { constants } from 'node:fs';
import { copyFile, lstat, mkdir, readdir, rename, stat, unlink } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';

export interface FileSystem {
  listFiles(directory: string): Promise<string[]>;
  /** @returns the path the file now lives at */
  moveFile(filePath: string, destinationDir: string): Promise<string>;
}

function hasCode(err: unknown, code: string): boolean {
  return err !== null && typeof err === 'object' && 'code' in err && err.code === code;
}

async function exists(path: string): Promise<boolean> {
  try {
    await lstat(path);
    return true;
  } catch (err) {
    if (hasCode(err, 'ENOENT')) return false;
    throw err;
  }
}

async function isRegularFileTarget(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    // dangling symlink
    return false;
  }
}

export const nodeFileSystem: FileSystem = {
  async listFiles(directory: string): Promise<string[]> {
    const root = resolve(directory);
    const entries = await readdir(root, { withFileTypes: true });

    const files: string[] = [];
    for (const entry of entries) {
      const fullPath = join(root, entry.name);
      if (entry.isFile() || (entry.isSymbolicLink() && await isRegularFileTarget(fullPath))) {
        files.push(fullPath);
      }
    }

    return files.sort();
  },

  async moveFile(filePath: string, destinationDir: string): Promise<string> {
    const fileName = basename(filePath);
    if (!fileName) {
      throw new Error(`Invalid source path: no filename in "${filePath}"`);
    }

    await mkdir(destinationDir, { recursive: true });
    const destination = join(destinationDir, fileName);

    if (await exists(destination)) {
      throw new Error(`Destination already exists: ${destination}`);
    }

    try {
      await rename(filePath, destination);
    } catch (err) {
      if (!hasCode(err, 'EXDEV')) throw err;
      await copyFile(filePath, destination, constants.COPYFILE_EXCL);
      await unlink(filePath);
    }

    return destination;
  },
};
