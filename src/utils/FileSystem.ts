import * as fs from 'fs-extra';
import * as path from 'path';
import { createHash } from 'crypto';
import { errorMessage } from './Errors';

export class FileSystem {
  static async ensureDirExists(dirPath: string): Promise<void> {
    try {
      await fs.ensureDir(dirPath);
    } catch (error) {
      throw new Error(`Failed to create directory ${dirPath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Removes a file or directory tree. Missing paths are not an error.
   */
  static async removeAll(targetPath: string): Promise<void> {
    try {
      await fs.remove(targetPath);
    } catch (error) {
      throw new Error(`Failed to remove directory ${targetPath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Names of the subdirectories of `dirPath`, skipping dot entries. A missing
   * directory yields an empty list.
   */
  static async listDirectories(dirPath: string): Promise<string[]> {
    if (!(await fs.pathExists(dirPath))) {
      return [];
    }

    const entries = await fs.readdir(dirPath);
    const dirs = await Promise.all(
      entries
        .filter(entry => !entry.startsWith('.'))
        .map(async entry => {
          const stat = await fs.stat(path.join(dirPath, entry)).catch(() => null);
          return stat?.isDirectory() ? entry : null;
        })
    );

    return dirs.filter((entry): entry is string => entry !== null);
  }

  static async listFiles(dirPath: string): Promise<string[]> {
    if (!(await fs.pathExists(dirPath))) {
      return [];
    }

    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries.filter(entry => entry.isFile()).map(entry => entry.name);
  }

  static isSymlink(filePath: string): boolean {
    try {
      return fs.lstatSync(filePath).isSymbolicLink();
    } catch {
      return false;
    }
  }

  /**
   * Symlinks such as `installs/node/18 -> ./18.2.0` point at a sibling
   * install and are not installs of their own.
   */
  static isRuntimeSymlink(filePath: string): boolean {
    if (!this.isSymlink(filePath)) {
      return false;
    }
    try {
      return fs.readlinkSync(filePath).startsWith('./');
    } catch {
      return false;
    }
  }

  /**
   * Modification time in milliseconds, or null when the path does not exist.
   */
  static async modifiedTime(filePath: string): Promise<number | null> {
    try {
      const stats = await fs.stat(filePath);
      return stats.mtimeMs;
    } catch {
      return null;
    }
  }

  static hashToStr(value: string): string {
    return createHash('sha256').update(value).digest('hex').slice(0, 16);
  }

  static displayPath(filePath: string): string {
    const home = process.env.HOME;
    if (home && filePath.startsWith(home + path.sep)) {
      return `~${filePath.slice(home.length)}`;
    }
    return filePath;
  }
}
