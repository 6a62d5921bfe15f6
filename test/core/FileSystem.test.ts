import { FileSystem } from '../../src/utils/FileSystem';
import { createTempDir, cleanupTempDir } from '../setup';
import * as fs from 'fs-extra';
import * as path from 'path';

describe('FileSystem', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  describe('listDirectories', () => {
    it('should list subdirectories without dot entries or files', async () => {
      await fs.ensureDir(path.join(tempDir, 'nodejs'));
      await fs.ensureDir(path.join(tempDir, 'python'));
      await fs.ensureDir(path.join(tempDir, '.hidden'));
      await fs.writeFile(path.join(tempDir, 'README'), '');

      const dirs = await FileSystem.listDirectories(tempDir);

      expect(dirs.sort()).toEqual(['nodejs', 'python']);
    });

    it('should follow symlinks to directories', async () => {
      await fs.ensureDir(path.join(tempDir, '20.1.0'));
      await fs.symlink('./20.1.0', path.join(tempDir, '20'));

      expect((await FileSystem.listDirectories(tempDir)).sort()).toEqual(['20', '20.1.0']);
    });

    it('should return an empty list for a missing directory', async () => {
      expect(await FileSystem.listDirectories(path.join(tempDir, 'missing'))).toEqual([]);
    });
  });

  describe('listFiles', () => {
    it('should list regular files only', async () => {
      await fs.writeFile(path.join(tempDir, 'command.bash'), '');
      await fs.ensureDir(path.join(tempDir, 'nested'));

      expect(await FileSystem.listFiles(tempDir)).toEqual(['command.bash']);
    });
  });

  describe('isRuntimeSymlink', () => {
    it('should only accept relative links to siblings', async () => {
      const target = path.join(tempDir, '18.2.0');
      await fs.ensureDir(target);
      await fs.symlink('./18.2.0', path.join(tempDir, '18'));
      await fs.symlink(target, path.join(tempDir, 'absolute'));

      expect(FileSystem.isRuntimeSymlink(path.join(tempDir, '18'))).toBe(true);
      expect(FileSystem.isRuntimeSymlink(path.join(tempDir, 'absolute'))).toBe(false);
      expect(FileSystem.isRuntimeSymlink(target)).toBe(false);
      expect(FileSystem.isRuntimeSymlink(path.join(tempDir, 'missing'))).toBe(false);
    });
  });

  describe('modifiedTime', () => {
    it('should return the mtime or null', async () => {
      const file = path.join(tempDir, 'stamp');
      await fs.writeFile(file, '');
      const mtime = new Date(1_700_000_000_000);
      await fs.utimes(file, mtime, mtime);

      expect(await FileSystem.modifiedTime(file)).toBe(1_700_000_000_000);
      expect(await FileSystem.modifiedTime(path.join(tempDir, 'missing'))).toBeNull();
    });
  });

  describe('removeAll', () => {
    it('should remove trees and ignore missing paths', async () => {
      await fs.ensureDir(path.join(tempDir, 'a', 'b'));

      await FileSystem.removeAll(path.join(tempDir, 'a'));
      await FileSystem.removeAll(path.join(tempDir, 'a'));

      expect(await fs.pathExists(path.join(tempDir, 'a'))).toBe(false);
    });
  });

  describe('hashToStr', () => {
    it('should produce a stable 16 character hex digest', () => {
      const hash = FileSystem.hashToStr('/opt/node');

      expect(hash).toMatch(/^[0-9a-f]{16}$/);
      expect(FileSystem.hashToStr('/opt/node')).toBe(hash);
      expect(FileSystem.hashToStr('/opt/node2')).not.toBe(hash);
    });
  });

  describe('displayPath', () => {
    const originalHome = process.env.HOME;

    afterEach(() => {
      if (originalHome === undefined) {
        delete process.env.HOME;
      } else {
        process.env.HOME = originalHome;
      }
    });

    it('should abbreviate the home directory', () => {
      process.env.HOME = '/home/dev';

      expect(FileSystem.displayPath('/home/dev/.local/share/polyver')).toBe('~/.local/share/polyver');
      expect(FileSystem.displayPath('/home/developer/x')).toBe('/home/developer/x');
    });
  });
});
