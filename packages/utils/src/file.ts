/**
 * File Operations
 *
 * Safe file operations with proper error handling.
 */

import {
  open,
  rename,
  rm,
  stat,
} from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { basename, dirname, join } from 'node:path';

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

async function safeStat(path: string): Promise<Stats | null> {
  try {
    return await stat(path);
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return null;
    }
    throw error;
  }
}

export async function pathExists(path: string): Promise<boolean> {
  return (await safeStat(path)) !== null;
}

export async function isFile(path: string): Promise<boolean> {
  return (await safeStat(path))?.isFile() ?? false;
}

export async function isDirectory(path: string): Promise<boolean> {
  return (await safeStat(path))?.isDirectory() ?? false;
}

/**
 * Remove a file if it exists. Returns whether something was removed.
 */
export async function removeIfExists(filePath: string): Promise<boolean> {
  if (!(await pathExists(filePath))) {
    return false;
  }
  await rm(filePath, { force: true });
  return true;
}

/**
 * Replace a file's content atomically.
 *
 * The content goes to a sibling temp file that is fsynced and then renamed
 * over the target, so readers see either the old or the new content. The
 * directory is synced afterwards so the rename itself is durable.
 */
export async function writeFileAtomic(
  filePath: string,
  content: string
): Promise<void> {
  const tempPath = join(
    dirname(filePath),
    `.${basename(filePath)}.${process.pid}.${Date.now()}.tmp`
  );

  const handle = await open(tempPath, 'w');
  try {
    await handle.writeFile(content, 'utf8');
    await handle.sync();
  } catch (error) {
    await handle.close();
    await rm(tempPath, { force: true });
    throw error;
  }
  await handle.close();

  try {
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }

  await syncDirectory(dirname(filePath));
}

/**
 * Flush a directory entry change (create, rename) to disk.
 * Windows can't open directories for syncing, so it's skipped there.
 */
export async function syncDirectory(dirPath: string): Promise<void> {
  if (process.platform === 'win32') {
    return;
  }
  const handle = await open(dirPath, 'r');
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
}

/**
 * Temp file names produced by writeFileAtomic for a target name
 */
export function isAtomicTempFor(filename: string, targetName: string): boolean {
  return filename.startsWith(`.${targetName}.`) && filename.endsWith('.tmp');
}
