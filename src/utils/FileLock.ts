import fs, { FileHandle } from 'fs/promises';
import { causeMessage, errorCode } from './errors';
import { logger } from './logger';

export interface FileLockOptions {
  /** Give up acquiring after this long */
  timeoutMs?: number;
  /** A lock file older than this is treated as abandoned */
  staleMs?: number;
  /** First wait between attempts, doubled each time up to 500ms */
  retryDelayMs?: number;
}

export class LockTimeoutError extends Error {
  constructor(public readonly lockPath: string, timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for lock ${lockPath}`);
    this.name = 'LockTimeoutError';
  }
}

/**
 * Run `critical` while holding an exclusive lock file.
 * The lock is created with O_EXCL and removed on every exit path.
 */
export async function withFileLock<T>(
  lockPath: string,
  critical: () => Promise<T>,
  options: FileLockOptions = {},
): Promise<T> {
  const handle = await acquire(lockPath, options);
  try {
    return await critical();
  } finally {
    await handle.close();
    try {
      await fs.unlink(lockPath);
    } catch (error: unknown) {
      if (errorCode(error) !== 'ENOENT') {
        logger.warn('Failed to release lock', { lockPath, error: causeMessage(error) });
      }
    }
  }
}

async function acquire(lockPath: string, options: FileLockOptions): Promise<FileHandle> {
  const timeoutMs = options.timeoutMs ?? 10000;
  const staleMs = options.staleMs ?? 30000;
  let delay = options.retryDelayMs ?? 10;
  const deadline = Date.now() + timeoutMs;

  for (;;) {
    const handle = await tryCreate(lockPath);
    if (handle) {
      return handle;
    }

    if (await removeIfStale(lockPath, staleMs)) {
      continue;
    }

    if (Date.now() >= deadline) {
      throw new LockTimeoutError(lockPath, timeoutMs);
    }
    await new Promise((resolve) => setTimeout(resolve, delay));
    delay = Math.min(delay * 2, 500);
  }
}

/**
 * Create the lock file exclusively, undefined when someone else holds it
 */
async function tryCreate(lockPath: string): Promise<FileHandle | undefined> {
  let handle: FileHandle;
  try {
    handle = await fs.open(lockPath, 'wx');
  } catch (error: unknown) {
    if (errorCode(error) === 'EEXIST') {
      return undefined;
    }
    throw error;
  }

  try {
    await handle.writeFile(String(process.pid), 'utf-8');
    return handle;
  } catch (error) {
    await handle.close();
    await fs.unlink(lockPath);
    throw error;
  }
}

async function removeIfStale(lockPath: string, staleMs: number): Promise<boolean> {
  try {
    const stats = await fs.stat(lockPath);
    if (Date.now() - stats.mtimeMs <= staleMs) {
      return false;
    }
    await fs.unlink(lockPath);
    logger.warn('Removed abandoned lock file', { lockPath });
    return true;
  } catch (error: unknown) {
    // Released between our open and stat: try again
    if (errorCode(error) === 'ENOENT') {
      return true;
    }
    throw error;
  }
}
