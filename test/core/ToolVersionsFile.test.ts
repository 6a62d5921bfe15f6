import * as fs from 'fs-extra';
import * as path from 'path';
import {
  findVersionFiles,
  loadToolVersions,
  parseToolVersions,
} from '../../src/core/toolset/ToolVersionsFile';
import { requestVersion } from '../../src/core/toolset/ToolVersionRequest';
import { createTempDir, cleanupTempDir } from '../setup';

describe('ToolVersionsFile', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  describe('parseToolVersions', () => {
    it('should read one list per plugin and skip comments and bare names', () => {
      const content = [
        '# pinned for CI',
        'nodejs 20.1 18 # keep 18 for the old build',
        'python   system',
        '',
        'nodejs prefix:16',
        'lonely',
      ].join('\n');

      const lists = parseToolVersions(content, '/work/.tool-versions');

      expect(lists.map(list => list.pluginName)).toEqual(['nodejs', 'python']);
      expect(lists[0]?.requests.map(entry => requestVersion(entry.request))).toEqual([
        '20.1',
        '18',
        'prefix-16',
      ]);
      expect(lists[1]?.requests.map(entry => entry.request.type)).toEqual(['system']);
      expect(lists[0]?.source).toEqual({ type: 'tool-versions', path: '/work/.tool-versions' });
    });

    it('should accept CRLF line endings', () => {
      const lists = parseToolVersions('golang 1.22\r\nruby 3.3\r\n', '/work/.tool-versions');

      expect(lists.map(list => list.pluginName)).toEqual(['golang', 'ruby']);
    });
  });

  describe('findVersionFiles', () => {
    it('should find the nearest file above a directory', async () => {
      const outer = path.join(tempDir, '.tool-versions');
      const inner = path.join(tempDir, 'app', '.tool-versions');
      await fs.ensureDir(path.join(tempDir, 'app', 'lib'));
      await fs.writeFile(outer, 'nodejs 18\n');
      await fs.writeFile(inner, 'nodejs 20\n');

      expect(await findVersionFiles(path.join(tempDir, 'app', 'lib'))).toEqual({
        dir: path.join(tempDir, 'app'),
        toolVersions: inner,
        legacy: [],
      });
      expect((await findVersionFiles(tempDir))?.toolVersions).toBe(outer);
    });

    it('should stop at a directory holding only a legacy file', async () => {
      await fs.ensureDir(path.join(tempDir, 'app'));
      await fs.writeFile(path.join(tempDir, '.tool-versions'), 'nodejs 18\n');
      await fs.writeFile(path.join(tempDir, 'app', '.node-version'), '20\n');
      const legacyFilenames = new Map([['nodejs', ['.nvmrc', '.node-version']]]);

      expect(await findVersionFiles(path.join(tempDir, 'app'), legacyFilenames)).toEqual({
        dir: path.join(tempDir, 'app'),
        toolVersions: null,
        legacy: [{ pluginName: 'nodejs', path: path.join(tempDir, 'app', '.node-version') }],
      });
    });

    it('should take the first legacy name that exists', async () => {
      await fs.writeFile(path.join(tempDir, '.nvmrc'), '20\n');
      await fs.writeFile(path.join(tempDir, '.node-version'), '18\n');

      const found = await findVersionFiles(tempDir, new Map([['nodejs', ['.nvmrc', '.node-version']]]));

      expect(found?.legacy).toEqual([{ pluginName: 'nodejs', path: path.join(tempDir, '.nvmrc') }]);
    });
  });

  describe('loadToolVersions', () => {
    it('should name the file it failed to read', async () => {
      const missing = path.join(tempDir, '.tool-versions');

      await expect(loadToolVersions(missing)).rejects.toThrow(`Failed to read ${missing}`);
    });
  });
});
