import * as fs from 'fs-extra';
import * as path from 'path';
import { ProcessUtils } from './ProcessUtils';
import { FileSystem } from './FileSystem';
import { logger } from './Logger';

const EMPTY_LOCK_GRACE_MS = 10 * 1000;

export interface InstallLockOptions {
  timeoutMs?: number;
  pollMs?: number;
}

/**
 * Advisory lock held as `<target>.lock` while an install or uninstall
 * touches `target`. The file records the owner's pid; a lock whose owner is
 * gone is taken over.
 */
export class InstallLock {
  private released = false;

  private constructor(readonly lockPath: string) {}

  static lockPathFor(targetPath: string): string {
    return `${targetPath}.lock`;
  }

  static async acquire(targetPath: string, options: InstallLockOptions = {}): Promise<InstallLock> {
    const lockPath = this.lockPathFor(targetPath);
    const timeoutMs = options.timeoutMs ?? 10 * 60 * 1000;
    const pollMs = options.pollMs ?? 250;
    const deadline = Date.now() + timeoutMs;

    await fs.ensureDir(path.dirname(lockPath));

    for (;;) {
      try {
        await fs.writeFile(lockPath, String(process.pid), { flag: 'wx' });
        return new InstallLock(lockPath);
      } catch (error) {
        const held = typeof error === 'object' && error !== null && 'code' in error && error.code === 'EEXIST';
        if (!held) {
          throw error;
        }
      }

      if (await this.isStale(lockPath)) {
        logger.debug(`Removing stale lock ${lockPath}`);
        await fs.remove(lockPath);
        continue;
      }

      if (Date.now() >= deadline) {
        throw new Error(`Timed out waiting for lock ${lockPath}`);
      }
      await new Promise(resolve => setTimeout(resolve, pollMs));
    }
  }

  static async withLock<T>(
    targetPath: string,
    fn: () => Promise<T>,
    options: InstallLockOptions = {}
  ): Promise<T> {
    const lock = await this.acquire(targetPath, options);
    try {
      return await fn();
    } finally {
      await lock.release();
    }
  }

  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    await fs.remove(this.lockPath);
  }

  private static async isStale(lockPath: string): Promise<boolean> {
    const content = await fs.readFile(lockPath, 'utf8').catch(() => null);
    if (content === null) {
      // released between our write attempt and this read
      return false;
    }
    if (content.trim() === '') {
      // the owner has created the file but not written its pid yet
      const mtime = await FileSystem.modifiedTime(lockPath);
      return mtime !== null && Date.now() - mtime > EMPTY_LOCK_GRACE_MS;
    }
    const pid = parseInt(content.trim(), 10);
    if (isNaN(pid)) {
      return true;
    }
    return pid !== process.pid && !ProcessUtils.isProcessRunning(pid);
  }
}
