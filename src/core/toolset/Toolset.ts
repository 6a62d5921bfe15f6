import chalk from 'chalk';
import { formatErrorChain } from '../../utils/Errors';
import { mapWithConcurrency } from '../../utils/Concurrency';
import { logger } from '../../utils/Logger';
import type { Config } from '../Config';
import { ProgressReport } from '../ProgressReport';
import { ToolVersion } from './ToolVersion';
import { ToolVersionList } from './ToolVersionList';
import { parseToolArg, parseToolVersionRequest } from './ToolVersionRequest';
import { LegacyVersionFile, findVersionFiles, loadToolVersions } from './ToolVersionsFile';

export interface InstallOptions {
  force?: boolean;
  /** Draw spinners instead of logging progress. */
  progress?: boolean;
}

/**
 * Every tool version the current context asks for, one list per plugin.
 * A list added later replaces an earlier one for the same plugin.
 */
export class Toolset {
  private readonly lists = new Map<string, ToolVersionList>();

  constructor(lists: ToolVersionList[] = []) {
    lists.forEach(list => this.add(list));
  }

  /** One list per plugin named in `plugin@version` arguments. */
  static fromArgs(args: string[]): Toolset {
    const lists = new Map<string, ToolVersionList>();
    for (const arg of args) {
      const request = parseToolArg(arg);
      let list = lists.get(request.pluginName);
      if (!list) {
        list = new ToolVersionList(request.pluginName, { type: 'argument' });
        lists.set(request.pluginName, list);
      }
      list.addRequest(request);
    }
    return new Toolset([...lists.values()]);
  }

  /**
   * The toolset of the nearest directory above `dir` with a `.tool-versions`
   * or, when `legacyVersionFile` is on, a plugin's legacy version file. That
   * directory becomes the config's project root. `.tool-versions` entries
   * override legacy files for the same plugin.
   */
  static async fromToolVersions(config: Config, dir: string): Promise<Toolset> {
    const legacyFilenames = config.settings.legacyVersionFile
      ? await this.legacyFilenames(config)
      : new Map<string, string[]>();
    const found = await findVersionFiles(dir, legacyFilenames);
    if (found === null) {
      logger.debug(`no version files found from ${dir}`);
      return new Toolset();
    }
    config.projectRoot = found.dir;

    const toolset = new Toolset();
    for (const legacy of found.legacy) {
      const list = await this.loadLegacyList(config, legacy);
      if (list) {
        toolset.add(list);
      }
    }
    if (found.toolVersions !== null) {
      (await loadToolVersions(found.toolVersions)).forEach(list => toolset.add(list));
    }
    return toolset;
  }

  private static async legacyFilenames(config: Config): Promise<Map<string, string[]>> {
    const filenames = new Map<string, string[]>();
    for (const tool of config.listTools()) {
      if (!tool.isInstalled()) {
        continue;
      }
      try {
        const names = await tool.plugin.legacyFilenames(config.settings);
        if (names.length > 0) {
          filenames.set(tool.name, names);
        }
      } catch (error) {
        logger.warn(`Failed to list legacy version files of ${tool.name}`, error);
      }
    }
    return filenames;
  }

  private static async loadLegacyList(
    config: Config,
    legacy: LegacyVersionFile
  ): Promise<ToolVersionList | null> {
    try {
      const plugin = config.getTool(legacy.pluginName).plugin;
      const content = await plugin.parseLegacyFile(legacy.path, config.settings);
      const versions = content.split(/\s+/).filter(version => version.length > 0);
      if (versions.length === 0) {
        return null;
      }
      const list = new ToolVersionList(legacy.pluginName, {
        type: 'legacy-version-file',
        path: legacy.path,
      });
      for (const version of versions) {
        list.addRequest(parseToolVersionRequest(legacy.pluginName, version));
      }
      return list;
    } catch (error) {
      logger.warn(`Failed to read ${legacy.path} for ${legacy.pluginName}`, error);
      return null;
    }
  }

  add(list: ToolVersionList): this {
    this.lists.delete(list.pluginName);
    this.lists.set(list.pluginName, list);
    return this;
  }

  get pluginNames(): string[] {
    return [...this.lists.keys()];
  }

  getList(pluginName: string): ToolVersionList | undefined {
    return this.lists.get(pluginName);
  }

  /** Resolves all lists, at most `settings.jobs` plugins at a time. */
  async resolve(config: Config, latestVersions: boolean = false): Promise<void> {
    await mapWithConcurrency([...this.lists.values()], config.settings.jobs, list =>
      list.resolve(config, latestVersions)
    );
  }

  listCurrentVersions(): ToolVersion[] {
    return [...this.lists.values()].flatMap(list => list.versions);
  }

  async listMissingVersions(config: Config): Promise<ToolVersion[]> {
    const missing: ToolVersion[] = [];
    for (const tv of this.listCurrentVersions()) {
      if (!(await config.getTool(tv.pluginName).isVersionInstalled(tv))) {
        missing.push(tv);
      }
    }
    return missing;
  }

  /**
   * Plugins this toolset needs that are not installed but have a known
   * repository; installs them so that their versions can resolve.
   */
  async installMissingPlugins(config: Config, options: InstallOptions = {}): Promise<string[]> {
    const missing = this.pluginNames.filter(name => {
      const tool = config.getTool(name);
      return !tool.isInstalled() && config.getRepoUrl(name) !== null;
    });

    const results = await mapWithConcurrency(missing, config.settings.jobs, async name => {
      const pr = new ProgressReport(name, options.progress ?? false);
      pr.setMessage('installing plugin');
      await config.getTool(name).plugin.install(config, pr);
    });
    throwIfFailed(results, missing, 'plugin');
    return missing;
  }

  /**
   * Installs versions that are not on disk yet. Versions of one plugin
   * install in order; different plugins install concurrently.
   */
  async installMissing(config: Config, options: InstallOptions = {}): Promise<ToolVersion[]> {
    const force = options.force ?? false;
    const wanted = force ? this.listCurrentVersions() : await this.listMissingVersions(config);

    const byPlugin = new Map<string, ToolVersion[]>();
    for (const tv of wanted) {
      byPlugin.set(tv.pluginName, [...(byPlugin.get(tv.pluginName) ?? []), tv]);
    }
    const plugins = [...byPlugin.keys()];

    const results = await mapWithConcurrency(plugins, config.settings.jobs, async name => {
      const tool = config.getTool(name);
      for (const tv of byPlugin.get(name) ?? []) {
        const pr = new ProgressReport(tv.toString(), options.progress ?? false);
        await tool.installVersion(config, tv, pr, force);
      }
    });
    throwIfFailed(results, plugins, 'tool');
    return wanted;
  }

  async binPaths(config: Config): Promise<string[]> {
    const paths: string[] = [];
    for (const tv of this.listCurrentVersions()) {
      const tool = config.getTool(tv.pluginName);
      if (!(await tool.isVersionInstalled(tv))) {
        continue;
      }
      paths.push(...(await tool.plugin.listBinPaths(config, tv)));
    }
    return paths;
  }

  /**
   * Environment exported by every installed version. Later versions win on
   * conflicting keys.
   */
  async execEnv(config: Config): Promise<Record<string, string>> {
    const env: Record<string, string> = {};
    for (const tv of this.listCurrentVersions()) {
      const tool = config.getTool(tv.pluginName);
      if (!(await tool.isVersionInstalled(tv))) {
        continue;
      }
      Object.assign(env, await tool.plugin.execEnv(config, tv));
    }
    return env;
  }
}

function throwIfFailed(
  results: PromiseSettledResult<void>[],
  names: string[],
  kind: 'plugin' | 'tool'
): void {
  const failed: string[] = [];
  results.forEach((result, index) => {
    if (result.status === 'rejected') {
      const name = names[index] ?? '';
      failed.push(name);
      logger.error(`${chalk.cyan(name)}: ${formatErrorChain(result.reason)}`);
    }
  });
  if (failed.length > 0) {
    throw new Error(`Failed to install ${kind}${failed.length > 1 ? 's' : ''}: ${failed.join(', ')}`);
  }
}
