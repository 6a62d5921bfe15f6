import * as fs from 'fs-extra';
import * as path from 'path';
import chalk from 'chalk';
import { z } from 'zod';
import { PluginManifest, PluginType } from '../../types/Plugin';
import { Dirs, Settings } from '../../types/Config';
import { InstallType } from '../../types/Toolset';
import { CacheManager } from '../cache/CacheManager';
import { EnvDiff } from '../EnvDiff';
import { Git } from '../Git';
import type { Config } from '../Config';
import { ProgressReport } from '../ProgressReport';
import type { ToolVersion } from '../toolset/ToolVersion';
import { FileSystem } from '../../utils/FileSystem';
import { ProcessUtils } from '../../utils/ProcessUtils';
import {
  PluginNotInstalledError,
  UnsupportedOperationError,
  errorMessage,
} from '../../utils/Errors';
import { BasePlugin } from './BasePlugin';
import { ExternalPluginCache } from './ExternalPluginCache';
import { PLUGIN_MANIFEST_FILE, loadPluginManifest } from './PluginManifest';
import { SCRIPT_MARKER_ENV, ScriptManager, Scripts } from './ScriptManager';

const REMOTE_VERSIONS_TTL = 24 * 60 * 60 * 1000;

/**
 * A plugin installed as a git checkout under the plugins directory, whose
 * behaviour comes from the executables in its `bin/` directory.
 */
export class ExternalPlugin extends BasePlugin {
  readonly pluginPath: string;
  repoUrl: string | null = null;

  private readonly cachePath: string;
  private readonly downloadsPath: string;
  private readonly installsPath: string;
  private readonly shimsPath: string;
  private readonly scriptMan: ScriptManager;
  private readonly cache: ExternalPluginCache;
  private readonly remoteVersionCache: CacheManager<string[]>;
  private readonly latestStableCache: CacheManager<string | null>;
  private readonly aliasCache: CacheManager<[string, string][]>;
  private readonly legacyFilenameCache: CacheManager<string[]>;
  private loadedManifest: PluginManifest | null = null;

  constructor(name: string, dirs: Dirs, settings: Settings) {
    super(name);
    this.pluginPath = path.join(dirs.plugins, name);
    this.cachePath = path.join(dirs.cache, name);
    this.downloadsPath = path.join(dirs.downloads, name);
    this.installsPath = path.join(dirs.installs, name);
    this.shimsPath = dirs.shims;
    this.scriptMan = new ScriptManager(this.pluginPath, {
      POLYVER_PLUGIN_NAME: name,
      POLYVER_PLUGIN_PATH: this.pluginPath,
      POLYVER_SHIMS_DIR: this.shimsPath,
    });
    this.cache = new ExternalPluginCache(this.pluginPath);

    const freshDuration = settings.preferStale ? null : REMOTE_VERSIONS_TTL;
    const scriptCache = <T>(file: string, script: string, schema: z.ZodType<T>) =>
      new CacheManager(path.join(this.cachePath, file), schema)
        .withFreshFile(this.pluginPath)
        .withFreshFile(path.join(this.pluginPath, 'bin', script));

    this.remoteVersionCache = scriptCache(
      'remote_versions.msgpack.z',
      'list-all',
      z.array(z.string())
    ).withFreshDuration(freshDuration);
    this.latestStableCache = scriptCache(
      'latest_stable.msgpack.z',
      'latest-stable',
      z.string().nullable()
    ).withFreshDuration(freshDuration);
    this.aliasCache = scriptCache(
      'aliases.msgpack.z',
      'list-aliases',
      z.array(z.tuple([z.string(), z.string()]))
    );
    this.legacyFilenameCache = scriptCache(
      'legacy_filenames.msgpack.z',
      'list-legacy-filenames',
      z.array(z.string())
    );
  }

  /** Read on first use, once the checkout exists. */
  get manifest(): PluginManifest {
    if (this.loadedManifest) {
      return this.loadedManifest;
    }
    const manifest = loadPluginManifest(path.join(this.pluginPath, PLUGIN_MANIFEST_FILE));
    if (this.isInstalled()) {
      this.loadedManifest = manifest;
    }
    return manifest;
  }

  override getType(): PluginType {
    return 'external';
  }

  override isInstalled(): boolean {
    return fs.pathExistsSync(this.pluginPath);
  }

  override async getRemoteUrl(): Promise<string | null> {
    return new Git(this.pluginPath).getRemoteUrl();
  }

  async listRemoteVersions(settings: Settings): Promise<string[]> {
    if (!this.scriptMan.scriptExists(Scripts.listAll)) {
      throw new UnsupportedOperationError(this.name, 'listing remote versions');
    }
    try {
      return await this.remoteVersionCache.getOrTryInit(async () => {
        const stdout = await this.scriptMan.read(settings, Scripts.listAll);
        return splitWhitespace(stdout);
      });
    } catch (error) {
      throw new Error(
        `Failed listing remote versions for plugin ${chalk.cyan(this.name)}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  override async latestStableVersion(settings: Settings): Promise<string | null> {
    if (!this.scriptMan.scriptExists(Scripts.latestStable)) {
      return null;
    }
    try {
      return await this.latestStableCache.getOrTryInit(async () => {
        const stdout = await this.scriptMan.read(settings, Scripts.latestStable);
        return stdout.trim() || null;
      });
    } catch (error) {
      throw new Error(
        `Failed fetching latest stable version for plugin ${chalk.cyan(this.name)}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  override async getAliases(settings: Settings): Promise<Map<string, string>> {
    const data = this.manifest.listAliases.data;
    if (data !== undefined) {
      return sortedMap(parseAliases(data));
    }
    if (!this.scriptMan.scriptExists(Scripts.listAliases)) {
      return new Map();
    }
    try {
      const aliases = await this.aliasCache.getOrTryInit(async () =>
        parseAliases(await this.scriptMan.read(settings, Scripts.listAliases))
      );
      return sortedMap(aliases);
    } catch (error) {
      throw new Error(
        `Failed fetching aliases for plugin ${chalk.cyan(this.name)}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  override async legacyFilenames(settings: Settings): Promise<string[]> {
    const data = this.manifest.listLegacyFilenames.data;
    if (data !== undefined) {
      return splitWhitespace(data);
    }
    if (!this.scriptMan.scriptExists(Scripts.listLegacyFilenames)) {
      return [];
    }
    try {
      return await this.legacyFilenameCache.getOrTryInit(async () =>
        splitWhitespace(await this.scriptMan.read(settings, Scripts.listLegacyFilenames))
      );
    } catch (error) {
      throw new Error(
        `Failed fetching legacy filenames for plugin ${chalk.cyan(this.name)}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * Reads the version a legacy file (`.nvmrc`, `.python-version`, ...) asks
   * for. Results are cached per file until the file changes.
   */
  override async parseLegacyFile(filePath: string, settings: Settings): Promise<string> {
    const cached = await this.fetchCachedLegacyFile(filePath);
    if (cached !== null) {
      return cached;
    }

    this.log('debug', `parsing legacy file: ${filePath}`);
    const script = Scripts.parseLegacyFile(filePath);
    const raw = this.scriptMan.scriptExists(script)
      ? await this.scriptMan.read(settings, script)
      : await fs.readFile(filePath, 'utf8');
    const version = raw.trim();

    await this.writeLegacyCache(filePath, version);
    return version;
  }

  /**
   * Clones the plugin repository, checks out the requested ref and warms the
   * version, alias and legacy filename caches.
   */
  override async install(config: Config, pr: ProgressReport): Promise<void> {
    const repository = this.repoUrl ?? config.getRepoUrl(this.name);
    if (!repository) {
      throw new Error(`No repository found for plugin ${this.name}`);
    }
    const { url, ref } = Git.splitUrlAndRef(repository);
    this.log('debug', `install ${repository}`);

    if (this.isInstalled()) {
      await this.uninstall(pr);
    }

    const git = new Git(this.pluginPath);
    pr.setMessage(`cloning ${url}`);
    await git.clone(url);
    if (ref) {
      pr.setMessage(`checking out ${ref}`);
      await git.update(ref);
    }

    pr.setMessage('loading plugin remote versions');
    if (this.scriptMan.scriptExists(Scripts.listAll)) {
      await this.listRemoteVersions(config.settings);
    }
    if (this.scriptMan.scriptExists(Scripts.listAliases)) {
      pr.setMessage('getting plugin aliases');
      await this.getAliases(config.settings);
    }
    if (this.scriptMan.scriptExists(Scripts.listLegacyFilenames)) {
      pr.setMessage('getting plugin legacy filenames');
      await this.legacyFilenames(config.settings);
    }

    const sha = await git.currentShaShort();
    pr.finishWithMessage(`${url}#${chalk.yellow.bold(sha)}`);
  }

  override async update(gitRef?: string): Promise<void> {
    if (FileSystem.isSymlink(this.pluginPath)) {
      this.log('warn', `plugin ${chalk.cyan(this.name)} is a symlink, not updating`);
      return;
    }
    const git = new Git(this.pluginPath);
    if (!git.isRepo()) {
      this.log('warn', `plugin ${chalk.cyan(this.name)} is not a git repository, not updating`);
      return;
    }
    const [previous, current] = await git.update(gitRef);
    this.log('debug', `updated ${previous.slice(0, 7)} -> ${current.slice(0, 7)}`);
  }

  /**
   * Removes downloads, installs and the plugin checkout. Directories that are
   * already gone are skipped.
   */
  override async uninstall(pr: ProgressReport): Promise<void> {
    if (!this.isInstalled()) {
      return;
    }
    pr.setMessage('uninstalling');

    for (const dir of [this.downloadsPath, this.installsPath, this.pluginPath]) {
      if (!(await fs.pathExists(dir))) {
        continue;
      }
      pr.setMessage(`removing ${FileSystem.displayPath(dir)}`);
      await FileSystem.removeAll(dir);
    }
  }

  override async externalCommands(): Promise<string[][]> {
    const commandPath = path.join(this.pluginPath, 'lib', 'commands');
    if (!this.isInstalled()) {
      return [];
    }

    const files = await FileSystem.listFiles(commandPath);
    return files
      .filter(file => file.startsWith('command-') && file.endsWith('.bash'))
      .sort()
      .map(file => [this.name, ...file.slice('command-'.length, -'.bash'.length).split('-')]);
  }

  /**
   * Runs `lib/commands/command-<command>.bash` attached to the terminal.
   *
   * @returns the command's exit code
   */
  override async executeExternalCommand(command: string, args: string[]): Promise<number> {
    if (!this.isInstalled()) {
      throw new PluginNotInstalledError(this.name);
    }
    const commandFile = path.join(this.pluginPath, 'lib', 'commands', `command-${command}.bash`);
    if (!(await fs.pathExists(commandFile))) {
      throw new Error(`Plugin ${this.name} has no command ${command}`);
    }
    const child = ProcessUtils.spawn(commandFile, args, {
      env: this.scriptMan.env,
      stdio: 'inherit',
    });
    return ProcessUtils.waitForExit(child);
  }

  override async installVersion(config: Config, tv: ToolVersion, pr: ProgressReport): Promise<void> {
    const scriptMan = this.scriptManForTv(config, tv);

    if (scriptMan.scriptExists(Scripts.download)) {
      pr.setMessage('downloading');
      await scriptMan.runByLine(config.settings, Scripts.download, pr);
    }
    pr.setMessage('installing');
    await scriptMan.runByLine(config.settings, Scripts.install, pr);
  }

  override async uninstallVersion(config: Config, tv: ToolVersion): Promise<void> {
    const scriptMan = this.scriptManForTv(config, tv);
    if (scriptMan.scriptExists(Scripts.uninstall)) {
      await scriptMan.run(config.settings, Scripts.uninstall);
    }
  }

  override async listBinPaths(config: Config, tv: ToolVersion): Promise<string[]> {
    if (tv.request.type === 'system') {
      return [];
    }
    return this.cache.listBinPaths(tv, () => this.fetchBinPaths(config, tv));
  }

  override async execEnv(config: Config, tv: ToolVersion): Promise<Record<string, string>> {
    if (tv.request.type === 'system') {
      return {};
    }
    // inside one of our own scripts exec-env would recurse
    if (!this.scriptMan.scriptExists(Scripts.execEnv) || process.env[SCRIPT_MARKER_ENV]) {
      return {};
    }
    return this.cache.execEnv(config, tv, this.manifest.execEnv.cacheKey, () =>
      this.fetchExecEnv(config, tv)
    );
  }

  async clearRemoteVersionCache(): Promise<void> {
    await this.remoteVersionCache.clear();
    await this.latestStableCache.clear();
  }

  private async fetchBinPaths(config: Config, tv: ToolVersion): Promise<string[]> {
    let binPaths: string[];
    if (this.scriptMan.scriptExists(Scripts.listBinPaths)) {
      const output = await this.scriptManForTv(config, tv).read(config.settings, Scripts.listBinPaths);
      binPaths = splitWhitespace(output);
    } else {
      binPaths = ['bin'];
    }
    return binPaths.map(binPath => path.join(tv.installPath, binPath));
  }

  private async fetchExecEnv(config: Config, tv: ToolVersion): Promise<Record<string, string>> {
    const scriptMan = this.scriptManForTv(config, tv);
    const diff = await EnvDiff.fromBashScript(scriptMan.getScriptPath(Scripts.execEnv), {
      ...scriptMan.env,
    });
    return diff.additions();
  }

  /**
   * Script manager carrying the version-specific variables, under both our
   * names and the asdf-compatible ones.
   */
  private scriptManForTv(config: Config, tv: ToolVersion): ScriptManager {
    let sm = this.scriptMan;
    for (const [key, value] of Object.entries(tv.opts)) {
      sm = sm.withEnv(`POLYVER_TOOL_OPTS__${key.toUpperCase()}`, value);
    }
    if (config.projectRoot) {
      sm = sm.withEnv('POLYVER_PROJECT_ROOT', config.projectRoot);
    }

    const request = tv.request;
    if (request.type === 'system') {
      throw new Error(`${tv} is a system tool and has no scripts to run`);
    }
    const installType: InstallType = request.type === 'prefix' ? 'version' : request.type;
    const installVersion = request.type === 'ref' ? request.ref : tv.version;

    return sm
      .withEnv('POLYVER_INSTALL_PATH', tv.installPath)
      .withEnv('ASDF_INSTALL_PATH', tv.installPath)
      .withEnv('POLYVER_DOWNLOAD_PATH', tv.downloadPath)
      .withEnv('ASDF_DOWNLOAD_PATH', tv.downloadPath)
      .withEnv('POLYVER_INSTALL_TYPE', installType)
      .withEnv('ASDF_INSTALL_TYPE', installType)
      .withEnv('POLYVER_INSTALL_VERSION', installVersion)
      .withEnv('ASDF_INSTALL_VERSION', installVersion);
  }

  private legacyCacheFilePath(legacyFile: string): string {
    return path.join(this.cachePath, 'legacy', `${FileSystem.hashToStr(legacyFile)}.txt`);
  }

  private async fetchCachedLegacyFile(legacyFile: string): Promise<string | null> {
    const cacheFile = this.legacyCacheFilePath(legacyFile);
    const cacheModified = await FileSystem.modifiedTime(cacheFile);
    const legacyModified = await FileSystem.modifiedTime(legacyFile);
    if (cacheModified === null || legacyModified === null || cacheModified < legacyModified) {
      return null;
    }
    return (await fs.readFile(cacheFile, 'utf8')).trim();
  }

  private async writeLegacyCache(legacyFile: string, version: string): Promise<void> {
    const cacheFile = this.legacyCacheFilePath(legacyFile);
    await fs.ensureDir(path.dirname(cacheFile));
    await fs.writeFile(cacheFile, version);
  }
}

function splitWhitespace(data: string): string[] {
  return data.split(/\s+/).filter(part => part.length > 0);
}

/**
 * One `alias version` pair per line; anything else is skipped.
 */
export function parseAliases(data: string): [string, string][] {
  const aliases: [string, string][] = [];
  for (const line of data.split('\n')) {
    const parts = splitWhitespace(line);
    const [alias, version] = parts;
    if (parts.length === 2 && alias !== undefined && version !== undefined) {
      aliases.push([alias, version]);
    }
  }
  return aliases;
}

function sortedMap(entries: [string, string][]): Map<string, string> {
  return new Map([...entries].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

/**
 * Plugin name implied by a repository url:
 * `https://github.com/org/asdf-nodejs.git` gives `nodejs`.
 */
export function pluginNameFromUrl(url: string): string {
  const { url: bare } = Git.splitUrlAndRef(url);
  const last = bare.replace(/\/+$/, '').split(/[/:]/).pop() ?? bare;
  return last.replace(/\.git$/, '').replace(/^(asdf|polyver)-/, '');
}
