import * as fs from 'fs-extra';
import * as path from 'path';
import * as zlib from 'zlib';
import { randomBytes } from 'crypto';
import { encode, decode } from '@msgpack/msgpack';
import { z } from 'zod';
import { FileSystem } from '../../utils/FileSystem';
import { logger } from '../../utils/Logger';
import { errorMessage } from '../../utils/Errors';

/**
 * Read-through cache backed by one file. The file is fresh while it is
 * younger than the fresh duration (if any) and no freshness file has a later
 * modification time. Stale or unreadable files are recomputed.
 */
export class CacheManager<T> {
  readonly cacheFilePath: string;
  private readonly schema: z.ZodType<T>;
  private freshDuration: number | null = null;
  private readonly freshFiles: string[] = [];
  private memo: { value: T } | null = null;
  private pending: Promise<T> | null = null;

  constructor(cacheFilePath: string, schema: z.ZodType<T>) {
    this.cacheFilePath = cacheFilePath;
    this.schema = schema;
  }

  /**
   * @param durationMs maximum age of the cache file; null disables the age check
   */
  withFreshDuration(durationMs: number | null): this {
    this.freshDuration = durationMs;
    return this;
  }

  withFreshFile(filePath: string): this {
    this.freshFiles.push(filePath);
    return this;
  }

  async getOrTryInit(fetch: () => Promise<T>): Promise<T> {
    if (this.pending) {
      return this.pending;
    }

    this.pending = this.load(fetch);
    try {
      return await this.pending;
    } finally {
      this.pending = null;
    }
  }

  async clear(): Promise<void> {
    this.memo = null;
    await fs.remove(this.cacheFilePath);
  }

  async isFresh(): Promise<boolean> {
    const cacheModified = await FileSystem.modifiedTime(this.cacheFilePath);
    if (cacheModified === null) {
      return false;
    }

    if (this.freshDuration !== null && Date.now() - cacheModified >= this.freshDuration) {
      return false;
    }

    for (const freshFile of this.freshFiles) {
      const modified = await FileSystem.modifiedTime(freshFile);
      if (modified !== null && modified > cacheModified) {
        return false;
      }
    }

    return true;
  }

  private async load(fetch: () => Promise<T>): Promise<T> {
    if (await this.isFresh()) {
      if (this.memo) {
        return this.memo.value;
      }
      const cached = await this.parse();
      if (cached) {
        this.memo = cached;
        return cached.value;
      }
    }

    const value = await fetch();
    await this.write(value);
    this.memo = { value };
    return value;
  }

  private async parse(): Promise<{ value: T } | null> {
    try {
      const compressed = await fs.readFile(this.cacheFilePath);
      const decoded = decode(zlib.inflateSync(compressed));
      const result = this.schema.safeParse(decoded);
      if (!result.success) {
        logger.debug(`Ignoring malformed cache ${this.cacheFilePath}: ${result.error.message}`);
        return null;
      }
      return { value: result.data };
    } catch (error) {
      logger.debug(`Failed to read cache ${this.cacheFilePath}: ${errorMessage(error)}`);
      return null;
    }
  }

  private async write(value: T): Promise<void> {
    await fs.ensureDir(path.dirname(this.cacheFilePath));
    const payload = zlib.deflateSync(encode(value));
    const tempPath = `${this.cacheFilePath}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`;

    try {
      await fs.writeFile(tempPath, payload);
      await fs.rename(tempPath, this.cacheFilePath);
    } catch (error) {
      await fs.remove(tempPath);
      throw new Error(`Failed to write cache ${this.cacheFilePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
