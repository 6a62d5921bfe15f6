import * as fs from 'fs-extra';
import * as path from 'path';
import { z } from 'zod';
import { CacheManager } from '../../src/core/cache/CacheManager';
import { createTempDir, cleanupTempDir, touch } from '../setup';

describe('CacheManager', () => {
  let tempDir: string;
  let cacheFile: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
    cacheFile = path.join(tempDir, 'cache', 'versions.msgpack.z');
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  const versionsCache = () => new CacheManager(cacheFile, z.array(z.string()));

  describe('getOrTryInit', () => {
    it('should compute once and serve the second read from the cache', async () => {
      const fetch = jest.fn(async () => ['1.0.0', '1.1.0']);
      const cache = versionsCache();

      expect(await cache.getOrTryInit(fetch)).toEqual(['1.0.0', '1.1.0']);
      expect(await cache.getOrTryInit(fetch)).toEqual(['1.0.0', '1.1.0']);
      expect(fetch).toHaveBeenCalledTimes(1);
    });

    it('should read a value written by another instance', async () => {
      await versionsCache().getOrTryInit(async () => ['2.0.0']);
      const fetch = jest.fn(async () => ['unused']);

      expect(await versionsCache().getOrTryInit(fetch)).toEqual(['2.0.0']);
      expect(fetch).not.toHaveBeenCalled();
    });

    it('should round-trip null and nested values', async () => {
      const schema = z.object({
        latest: z.string().nullable(),
        env: z.record(z.string()),
      });
      const value = { latest: null, env: { JAVA_HOME: '/opt/java' } };
      await new CacheManager(cacheFile, schema).getOrTryInit(async () => value);

      const fetch = jest.fn(async () => ({ latest: 'x', env: {} }));
      const read = await new CacheManager(cacheFile, schema).getOrTryInit(fetch);

      expect(read).toEqual(value);
      expect(fetch).not.toHaveBeenCalled();
    });

    it('should share one computation between concurrent callers', async () => {
      const fetch = jest.fn(async () => ['1.0.0']);
      const cache = versionsCache();

      const [first, second] = await Promise.all([
        cache.getOrTryInit(fetch),
        cache.getOrTryInit(fetch),
      ]);

      expect(first).toEqual(['1.0.0']);
      expect(second).toEqual(['1.0.0']);
      expect(fetch).toHaveBeenCalledTimes(1);
    });

    it('should recompute when a freshness file is newer than the cache', async () => {
      const freshFile = path.join(tempDir, 'list-all');
      await fs.writeFile(freshFile, '');
      const fetch = jest
        .fn<Promise<string[]>, []>()
        .mockResolvedValueOnce(['1.0.0'])
        .mockResolvedValueOnce(['1.0.0', '2.0.0']);
      const cache = versionsCache().withFreshFile(freshFile);

      await cache.getOrTryInit(fetch);
      await touch(freshFile, 60_000);

      expect(await cache.getOrTryInit(fetch)).toEqual(['1.0.0', '2.0.0']);
      expect(fetch).toHaveBeenCalledTimes(2);
    });

    it('should stay fresh when freshness files are older than the cache', async () => {
      const freshFile = path.join(tempDir, 'list-all');
      await fs.writeFile(freshFile, '');
      await touch(freshFile, -60_000);
      const fetch = jest.fn(async () => ['1.0.0']);

      await versionsCache().withFreshFile(freshFile).getOrTryInit(fetch);
      await versionsCache().withFreshFile(freshFile).getOrTryInit(fetch);

      expect(fetch).toHaveBeenCalledTimes(1);
    });

    it('should ignore freshness files that do not exist', async () => {
      const fetch = jest.fn(async () => ['1.0.0']);
      const missing = path.join(tempDir, 'missing');

      await versionsCache().withFreshFile(missing).getOrTryInit(fetch);
      await versionsCache().withFreshFile(missing).getOrTryInit(fetch);

      expect(fetch).toHaveBeenCalledTimes(1);
    });

    it('should recompute once the fresh duration has passed', async () => {
      const fetch = jest.fn(async () => ['1.0.0']);
      const cache = versionsCache().withFreshDuration(5_000);

      await cache.getOrTryInit(fetch);
      await touch(cacheFile, -10_000);
      await cache.getOrTryInit(fetch);

      expect(fetch).toHaveBeenCalledTimes(2);
    });

    it('should keep a cache younger than the fresh duration', async () => {
      const fetch = jest.fn(async () => ['1.0.0']);

      await versionsCache().withFreshDuration(60_000).getOrTryInit(fetch);
      await versionsCache().withFreshDuration(60_000).getOrTryInit(fetch);

      expect(fetch).toHaveBeenCalledTimes(1);
    });

    it('should treat a corrupted cache file as a miss', async () => {
      await fs.ensureDir(path.dirname(cacheFile));
      await fs.writeFile(cacheFile, 'not a cache file');
      const fetch = jest.fn(async () => ['1.0.0']);

      expect(await versionsCache().getOrTryInit(fetch)).toEqual(['1.0.0']);
      expect(fetch).toHaveBeenCalledTimes(1);
    });

    it('should treat a payload of the wrong shape as a miss', async () => {
      await versionsCache().getOrTryInit(async () => ['1.0.0']);
      const fetch = jest.fn(async () => 42);

      expect(await new CacheManager(cacheFile, z.number()).getOrTryInit(fetch)).toBe(42);
      expect(fetch).toHaveBeenCalledTimes(1);
    });

    it('should not write a cache file when the computation fails', async () => {
      const cache = versionsCache();

      await expect(
        cache.getOrTryInit(async () => {
          throw new Error('list-all failed');
        })
      ).rejects.toThrow('list-all failed');
      expect(await fs.pathExists(cacheFile)).toBe(false);
    });
  });

  describe('clear', () => {
    it('should remove the cache file and force a recompute', async () => {
      const fetch = jest.fn(async () => ['1.0.0']);
      const cache = versionsCache();
      await cache.getOrTryInit(fetch);

      await cache.clear();

      expect(await fs.pathExists(cacheFile)).toBe(false);
      await cache.getOrTryInit(fetch);
      expect(fetch).toHaveBeenCalledTimes(2);
    });
  });
});
