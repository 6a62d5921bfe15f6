import * as fs from 'fs-extra';
import * as path from 'path';
import { Config } from '../../src/core/Config';
import { Git } from '../../src/core/Git';
import { ProgressReport } from '../../src/core/ProgressReport';
import { SettingsBuilder } from '../../src/core/SettingsBuilder';
import {
  ExternalPlugin,
  parseAliases,
  pluginNameFromUrl,
} from '../../src/core/plugins/ExternalPlugin';
import { ToolVersion } from '../../src/core/toolset/ToolVersion';
import { Dirs } from '../../src/types/Config';
import { ToolVersionRequest } from '../../src/types/Toolset';
import {
  PluginNotInstalledError,
  UnsupportedOperationError,
} from '../../src/utils/Errors';
import { FileSystem } from '../../src/utils/FileSystem';
import { ProcessUtils } from '../../src/utils/ProcessUtils';
import {
  callCount,
  cleanupTempDir,
  countCall,
  createFakePlugin,
  createTempDir,
  createTestConfig,
  createTestDirs,
  touch,
} from '../setup';

describe('ExternalPlugin', () => {
  let tempDir: string;
  let dirs: Dirs;
  let config: Config;
  let counter: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
    dirs = createTestDirs(tempDir);
    config = createTestConfig(tempDir);
    counter = path.join(tempDir, 'calls');
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await cleanupTempDir(tempDir);
  });

  const newPlugin = () => new ExternalPlugin('demo', dirs, config.settings);

  const versionOf = (version: string, request?: ToolVersionRequest): ToolVersion =>
    new ToolVersion(
      config.getTool('demo'),
      request ?? { type: 'version', pluginName: 'demo', version },
      {},
      version
    );

  describe('isInstalled', () => {
    it('should depend on the plugin directory', async () => {
      expect(newPlugin().isInstalled()).toBe(false);

      await createFakePlugin(dirs, 'demo', {});

      expect(newPlugin().isInstalled()).toBe(true);
      expect(newPlugin().getType()).toBe('external');
    });
  });

  describe('listRemoteVersions', () => {
    it('should split the list-all output on whitespace', async () => {
      await createFakePlugin(dirs, 'demo', { 'list-all': 'echo "1.0.0 1.1.0"\necho "2.0.0"' });

      expect(await newPlugin().listRemoteVersions(config.settings)).toEqual([
        '1.0.0',
        '1.1.0',
        '2.0.0',
      ]);
    });

    it('should run list-all once and serve later calls from the cache', async () => {
      await createFakePlugin(dirs, 'demo', { 'list-all': `${countCall(counter)}\necho 1.0.0` });

      await newPlugin().listRemoteVersions(config.settings);
      await newPlugin().listRemoteVersions(config.settings);

      expect(await callCount(counter)).toBe(1);
      expect(
        await fs.pathExists(path.join(dirs.cache, 'demo', 'remote_versions.msgpack.z'))
      ).toBe(true);
    });

    it('should run list-all again after the script changes', async () => {
      const pluginPath = await createFakePlugin(dirs, 'demo', {
        'list-all': `${countCall(counter)}\necho 1.0.0`,
      });
      await newPlugin().listRemoteVersions(config.settings);

      await touch(path.join(pluginPath, 'bin', 'list-all'), 60_000);
      await newPlugin().listRemoteVersions(config.settings);

      expect(await callCount(counter)).toBe(2);
    });

    it('should report plugins without list-all as unsupported', async () => {
      await createFakePlugin(dirs, 'demo', {});

      await expect(newPlugin().listRemoteVersions(config.settings)).rejects.toThrow(
        UnsupportedOperationError
      );
    });

    it('should wrap script failures with the plugin name', async () => {
      await createFakePlugin(dirs, 'demo', { 'list-all': 'exit 3' });

      await expect(newPlugin().listRemoteVersions(config.settings)).rejects.toThrow(
        /Failed listing remote versions for plugin .*demo.*exited with code 3/
      );
    });
  });

  describe('latestStableVersion', () => {
    it('should return null without running anything when there is no script', async () => {
      await createFakePlugin(dirs, 'demo', {});
      const execute = jest.spyOn(ProcessUtils, 'execute');

      expect(await newPlugin().latestStableVersion(config.settings)).toBeNull();
      expect(execute).not.toHaveBeenCalled();
    });

    it('should return the trimmed script output', async () => {
      await createFakePlugin(dirs, 'demo', { 'latest-stable': 'echo "  3.1.0  "' });

      expect(await newPlugin().latestStableVersion(config.settings)).toBe('3.1.0');
    });

    it('should treat empty output as no version', async () => {
      await createFakePlugin(dirs, 'demo', { 'latest-stable': 'true' });

      expect(await newPlugin().latestStableVersion(config.settings)).toBeNull();
    });
  });

  describe('getAliases', () => {
    it('should parse alias pairs from the script, skipping other lines', async () => {
      await createFakePlugin(dirs, 'demo', {
        'list-aliases': `printf 'lts 20.11.0\\nnot an alias\\ncurrent 21.6.0\\n'`,
      });

      const aliases = await newPlugin().getAliases(config.settings);

      expect([...aliases.entries()]).toEqual([
        ['current', '21.6.0'],
        ['lts', '20.11.0'],
      ]);
    });

    it('should prefer literal data from the manifest over the script', async () => {
      await createFakePlugin(
        dirs,
        'demo',
        { 'list-aliases': `${countCall(counter)}\necho 'lts 1.0.0'` },
        { manifest: 'list-aliases:\n  data: |\n    stable 1.2.0\n' }
      );

      const aliases = await newPlugin().getAliases(config.settings);

      expect([...aliases.entries()]).toEqual([['stable', '1.2.0']]);
      expect(await callCount(counter)).toBe(0);
    });

    it('should be empty without a script', async () => {
      await createFakePlugin(dirs, 'demo', {});

      expect((await newPlugin().getAliases(config.settings)).size).toBe(0);
    });
  });

  describe('legacyFilenames', () => {
    it('should read the manifest data', async () => {
      await createFakePlugin(
        dirs,
        'demo',
        {},
        { manifest: 'list-legacy-filenames:\n  data: ".nvmrc .node-version"\n' }
      );

      expect(await newPlugin().legacyFilenames(config.settings)).toEqual([
        '.nvmrc',
        '.node-version',
      ]);
    });

    it('should fall back to the script output', async () => {
      await createFakePlugin(dirs, 'demo', { 'list-legacy-filenames': 'echo .python-version' });

      expect(await newPlugin().legacyFilenames(config.settings)).toEqual(['.python-version']);
    });
  });

  describe('parseLegacyFile', () => {
    it('should parse an unchanged file only once', async () => {
      await createFakePlugin(dirs, 'demo', {
        'parse-legacy-file': `${countCall(counter)}\ntr -d v < "$1"`,
      });
      const legacyFile = path.join(tempDir, '.nvmrc');
      await fs.writeFile(legacyFile, 'v18.2.0\n');

      expect(await newPlugin().parseLegacyFile(legacyFile, config.settings)).toBe('18.2.0');
      expect(await newPlugin().parseLegacyFile(legacyFile, config.settings)).toBe('18.2.0');
      expect(await callCount(counter)).toBe(1);
    });

    it('should parse the file again after it changes', async () => {
      await createFakePlugin(dirs, 'demo', {
        'parse-legacy-file': `${countCall(counter)}\ntr -d v < "$1"`,
      });
      const legacyFile = path.join(tempDir, '.nvmrc');
      await fs.writeFile(legacyFile, 'v18.2.0\n');
      await newPlugin().parseLegacyFile(legacyFile, config.settings);

      await fs.writeFile(legacyFile, 'v20.0.0\n');
      await touch(legacyFile, 60_000);

      expect(await newPlugin().parseLegacyFile(legacyFile, config.settings)).toBe('20.0.0');
      expect(await callCount(counter)).toBe(2);
    });

    it('should read the raw file when the plugin has no parser', async () => {
      await createFakePlugin(dirs, 'demo', {});
      const legacyFile = path.join(tempDir, '.python-version');
      await fs.writeFile(legacyFile, '3.11.4\n');

      expect(await newPlugin().parseLegacyFile(legacyFile, config.settings)).toBe('3.11.4');
    });
  });

  describe('listBinPaths', () => {
    it('should default to bin/ under the install path', async () => {
      await createFakePlugin(dirs, 'demo', {});
      const tv = versionOf('1.0.0');

      expect(await newPlugin().listBinPaths(config, tv)).toEqual([
        path.join(tv.installPath, 'bin'),
      ]);
    });

    it('should resolve script output against the install path', async () => {
      await createFakePlugin(dirs, 'demo', { 'list-bin-paths': 'echo "bin libexec/bin"' });
      const tv = versionOf('1.0.0');

      expect(await newPlugin().listBinPaths(config, tv)).toEqual([
        path.join(tv.installPath, 'bin'),
        path.join(tv.installPath, 'libexec', 'bin'),
      ]);
    });

    it('should be empty for system versions', async () => {
      await createFakePlugin(dirs, 'demo', { 'list-bin-paths': `${countCall(counter)}\necho bin` });
      const tv = versionOf('system', { type: 'system', pluginName: 'demo' });

      expect(await newPlugin().listBinPaths(config, tv)).toEqual([]);
      expect(await callCount(counter)).toBe(0);
    });
  });

  describe('execEnv', () => {
    const execEnvScript = (counterFile: string) =>
      `${countCall(counterFile)}\nexport DEMO_HOME="$POLYVER_INSTALL_PATH"\nexport DEMO_VERSION="$ASDF_INSTALL_VERSION"`;

    it('should return the variables the exec-env script exports', async () => {
      await createFakePlugin(dirs, 'demo', { 'exec-env': execEnvScript(counter) });
      const tv = versionOf('1.0.0');

      expect(await newPlugin().execEnv(config, tv)).toEqual({
        DEMO_HOME: tv.installPath,
        DEMO_VERSION: '1.0.0',
      });
    });

    it('should cache the result per version', async () => {
      await createFakePlugin(dirs, 'demo', { 'exec-env': execEnvScript(counter) });
      const tv = versionOf('1.0.0');

      await newPlugin().execEnv(config, tv);
      await newPlugin().execEnv(config, tv);

      expect(await callCount(counter)).toBe(1);
      expect(await fs.pathExists(path.join(tv.cachePath, 'exec_env.msgpack.z'))).toBe(true);
    });

    it('should key the cache by the rendered manifest cache key', async () => {
      await createFakePlugin(
        dirs,
        'demo',
        { 'exec-env': execEnvScript(counter) },
        { manifest: 'exec-env:\n  cache-key:\n    - "{{ version }}"\n' }
      );
      const tv = versionOf('1.0.0');

      await newPlugin().execEnv(config, tv);

      const key = FileSystem.hashToStr('1.0.0').slice(0, 10);
      expect(await fs.pathExists(path.join(tv.cachePath, 'exec_env', `${key}.msgpack.z`))).toBe(
        true
      );
    });

    it('should be empty for system versions and plugins without the script', async () => {
      await createFakePlugin(dirs, 'demo', {});

      expect(await newPlugin().execEnv(config, versionOf('1.0.0'))).toEqual({});
      expect(
        await newPlugin().execEnv(config, versionOf('system', { type: 'system', pluginName: 'demo' }))
      ).toEqual({});
    });
  });

  describe('installVersion', () => {
    it('should run download and install with the version environment', async () => {
      await createFakePlugin(dirs, 'demo', {
        download: 'echo downloaded > "$POLYVER_DOWNLOAD_PATH/archive"',
        install: [
          'cp "$ASDF_DOWNLOAD_PATH/archive" "$ASDF_INSTALL_PATH/archive"',
          'echo "$POLYVER_INSTALL_TYPE:$POLYVER_INSTALL_VERSION" > "$POLYVER_INSTALL_PATH/info"',
        ].join('\n'),
      });
      const tool = config.getTool('demo');
      const tv = versionOf('1.0.0');

      await tool.installVersion(config, tv, ProgressReport.silent());

      expect(await fs.readFile(path.join(tv.installPath, 'archive'), 'utf8')).toBe('downloaded\n');
      expect(await fs.readFile(path.join(tv.installPath, 'info'), 'utf8')).toBe('version:1.0.0\n');
      expect(await fs.pathExists(tv.downloadPath)).toBe(false);
    });

    it('should pass the ref for ref requests', async () => {
      await createFakePlugin(dirs, 'demo', {
        install: 'echo "$ASDF_INSTALL_TYPE:$ASDF_INSTALL_VERSION" > "$ASDF_INSTALL_PATH/info"',
      });
      const tv = versionOf('ref-main', { type: 'ref', pluginName: 'demo', ref: 'main' });

      await config.getTool('demo').installVersion(config, tv, ProgressReport.silent());

      expect(tv.installPath).toBe(path.join(dirs.installs, 'demo', 'ref-main'));
      expect(await fs.readFile(path.join(tv.installPath, 'info'), 'utf8')).toBe('ref:main\n');
    });

    it('should remove a failed install', async () => {
      await createFakePlugin(dirs, 'demo', { install: 'touch "$ASDF_INSTALL_PATH/partial"\nexit 1' });
      const tv = versionOf('1.0.0');

      await expect(
        config.getTool('demo').installVersion(config, tv, ProgressReport.silent())
      ).rejects.toThrow(/Failed to install demo@1\.0\.0/);
      expect(await fs.pathExists(tv.installPath)).toBe(false);
    });

    it('should keep a failed install when configured to', async () => {
      const keeping = new Config(
        new SettingsBuilder({ alwaysKeepInstall: true }).build(),
        dirs
      );
      await createFakePlugin(dirs, 'demo', { install: 'touch "$ASDF_INSTALL_PATH/partial"\nexit 1' });
      const tv = new ToolVersion(
        keeping.getTool('demo'),
        { type: 'version', pluginName: 'demo', version: '1.0.0' },
        {},
        '1.0.0'
      );

      await expect(
        keeping.getTool('demo').installVersion(keeping, tv, ProgressReport.silent())
      ).rejects.toThrow(/Failed to install/);
      expect(await fs.pathExists(path.join(tv.installPath, 'partial'))).toBe(true);
    });
  });

  describe('install', () => {
    let fixture: string;

    beforeEach(async () => {
      const fixtureDirs = createTestDirs(path.join(tempDir, 'fixture'));
      fixture = await createFakePlugin(fixtureDirs, 'demo', {
        'list-all': `${countCall(counter)}\necho 1.0.0 2.0.0`,
      });
    });

    const stubGit = () => {
      const clone = jest.spyOn(Git.prototype, 'clone').mockImplementation(async () => {
        await fs.copy(fixture, path.join(dirs.plugins, 'demo'));
      });
      const update = jest
        .spyOn(Git.prototype, 'update')
        .mockResolvedValue(['1111111aaaa', '2222222bbbb']);
      jest.spyOn(Git.prototype, 'currentShaShort').mockResolvedValue('2222222');
      return { clone, update };
    };

    it('should clone the shorthand repository, check out the ref and warm the caches', async () => {
      const withShorthand = new Config(
        config.settings,
        dirs,
        new Map(),
        new Map([['demo', 'https://example.com/asdf-demo.git#v1']])
      );
      const { clone, update } = stubGit();
      const pr = ProgressReport.silent();
      const finish = jest.spyOn(pr, 'finishWithMessage');
      const plugin = new ExternalPlugin('demo', dirs, config.settings);

      await plugin.install(withShorthand, pr);

      expect(clone).toHaveBeenCalledWith('https://example.com/asdf-demo.git');
      expect(update).toHaveBeenCalledWith('v1');
      expect(await callCount(counter)).toBe(1);
      expect(finish).toHaveBeenCalledWith(expect.stringContaining('https://example.com/asdf-demo.git#'));
      expect(await plugin.listRemoteVersions(config.settings)).toEqual(['1.0.0', '2.0.0']);
      expect(await callCount(counter)).toBe(1);
    });

    it('should prefer an explicit repository url', async () => {
      const { clone, update } = stubGit();
      const plugin = newPlugin();
      plugin.repoUrl = 'https://example.com/other/demo.git';

      await plugin.install(config, ProgressReport.silent());

      expect(clone).toHaveBeenCalledWith('https://example.com/other/demo.git');
      expect(update).not.toHaveBeenCalled();
      expect(plugin.isInstalled()).toBe(true);
    });

    it('should fail when no repository is known', async () => {
      const clone = jest.spyOn(Git.prototype, 'clone');

      await expect(newPlugin().install(config, ProgressReport.silent())).rejects.toThrow(
        'No repository found for plugin demo'
      );
      expect(clone).not.toHaveBeenCalled();
    });
  });

  describe('update', () => {
    it('should skip plugins that are not git checkouts', async () => {
      await createFakePlugin(dirs, 'demo', {});
      const update = jest.spyOn(Git.prototype, 'update');

      await newPlugin().update();

      expect(update).not.toHaveBeenCalled();
    });
  });

  describe('uninstall', () => {
    it('should remove the plugin, its installs and its downloads', async () => {
      const pluginPath = await createFakePlugin(dirs, 'demo', {});
      await fs.ensureDir(path.join(dirs.installs, 'demo', '1.0.0'));
      await fs.ensureDir(path.join(dirs.downloads, 'demo', '1.0.0'));

      await newPlugin().uninstall(ProgressReport.silent());

      expect(await fs.pathExists(pluginPath)).toBe(false);
      expect(await fs.pathExists(path.join(dirs.installs, 'demo'))).toBe(false);
      expect(await fs.pathExists(path.join(dirs.downloads, 'demo'))).toBe(false);
    });
  });

  describe('external commands', () => {
    it('should list lib/commands scripts as command paths', async () => {
      await createFakePlugin(
        dirs,
        'demo',
        {},
        {
          files: {
            'lib/commands/command-hello.bash': 'echo hello',
            'lib/commands/command-foo-bar.bash': 'echo foo bar',
            'lib/commands/helpers.bash': 'true',
          },
        }
      );

      expect(await newPlugin().externalCommands()).toEqual([
        ['demo', 'foo', 'bar'],
        ['demo', 'hello'],
      ]);
    });

    it('should return the exit code of the command', async () => {
      await createFakePlugin(
        dirs,
        'demo',
        {},
        { files: { 'lib/commands/command-fail.bash': 'exit 7' } }
      );

      expect(await newPlugin().executeExternalCommand('fail', [])).toBe(7);
    });

    it('should refuse to run commands of a plugin that is not installed', async () => {
      await expect(newPlugin().executeExternalCommand('hello', [])).rejects.toThrow(
        PluginNotInstalledError
      );
    });
  });

  describe('helpers', () => {
    it('should parse alias lines', () => {
      expect(parseAliases('lts 20\n\n  stable   1.2  \nbroken\na b c\n')).toEqual([
        ['lts', '20'],
        ['stable', '1.2'],
      ]);
    });

    it('should derive plugin names from repository urls', () => {
      expect(pluginNameFromUrl('https://github.com/org/asdf-nodejs.git')).toBe('nodejs');
      expect(pluginNameFromUrl('git@github.com:org/polyver-python.git#main')).toBe('python');
      expect(pluginNameFromUrl('https://example.com/tools/ruby/')).toBe('ruby');
    });
  });
});
