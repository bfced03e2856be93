// ============================================
// STRATA - Model Lock
// One writer per model directory
// ============================================

import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import * as path from 'path';
import { MigrationError } from '../errors';
import { ensureDir } from '../utils/files';

export const LOCK_FILE = '.lock';

const chains = new Map<string, Promise<void>>();

/**
 * Run `fn` while holding the lock on `dir`.
 * Callers in this process queue up; another process holding `.lock` is an error.
 */
export async function withModelLock<T>(dir: string, fn: () => Promise<T>): Promise<T> {
  const key = path.resolve(dir);
  const previous = chains.get(key) ?? Promise.resolve();

  let release: () => void = () => undefined;
  const current = new Promise<void>(resolve => {
    release = resolve;
  });
  const tail = previous.then(() => current);
  chains.set(key, tail);

  await previous;
  try {
    return await withLockFile(key, fn);
  } finally {
    release();
    if (chains.get(key) === tail) {
      chains.delete(key);
    }
  }
}

async function withLockFile<T>(dir: string, fn: () => Promise<T>): Promise<T> {
  await ensureDir(dir);
  const lockPath = path.join(dir, LOCK_FILE);

  let handle: FileHandle;
  try {
    handle = await fs.open(lockPath, 'wx');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
      throw new MigrationError(
        `${lockPath} exists: another migration process holds this model (remove the file if it is stale)`,
        { lock: lockPath }
      );
    }
    throw error;
  }

  try {
    try {
      await handle.writeFile(`${process.pid}\n`);
    } finally {
      await handle.close();
    }
    return await fn();
  } finally {
    await fs.rm(lockPath, { force: true });
  }
}
