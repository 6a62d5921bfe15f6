import * as fs from 'fs-extra';
import * as path from 'path';
import { Plugin } from '../../types/Plugin';
import { Dirs, Settings } from '../../types/Config';
import { FileSystem } from '../../utils/FileSystem';
import { InstallLock } from '../../utils/InstallLock';
import { UnsupportedOperationError, errorMessage } from '../../utils/Errors';
import { fuzzyMatchFilter, sortVersions } from '../../utils/Version';
import { logger } from '../../utils/Logger';
import type { Config } from '../Config';
import { ProgressReport } from '../ProgressReport';
import type { ToolVersion } from '../toolset/ToolVersion';

/**
 * A plugin bound to the on-disk layout: knows which versions are installed
 * and drives installs and uninstalls of individual versions.
 */
export class Tool {
  readonly name: string;
  readonly plugin: Plugin;
  readonly dirs: Dirs;
  readonly installsPath: string;

  constructor(plugin: Plugin, dirs: Dirs) {
    this.name = plugin.name;
    this.plugin = plugin;
    this.dirs = dirs;
    this.installsPath = path.join(dirs.installs, plugin.name);
  }

  isInstalled(): boolean {
    return this.plugin.isInstalled();
  }

  async listInstalledVersions(): Promise<string[]> {
    const entries = await FileSystem.listDirectories(this.installsPath);
    const versions = entries.filter(
      entry => !FileSystem.isRuntimeSymlink(path.join(this.installsPath, entry))
    );
    return sortVersions(versions);
  }

  async listInstalledVersionsMatching(query: string): Promise<string[]> {
    return fuzzyMatchFilter(await this.listInstalledVersions(), query);
  }

  async listRemoteVersions(settings: Settings): Promise<string[]> {
    return this.plugin.listRemoteVersions(settings);
  }

  /**
   * Remote versions matching `query`, oldest first. A plugin with no way to
   * list remote versions is answered from the installed versions.
   */
  async listVersionsMatching(settings: Settings, query: string): Promise<string[]> {
    let versions: string[];
    try {
      versions = await this.plugin.listRemoteVersions(settings);
    } catch (error) {
      if (!(error instanceof UnsupportedOperationError)) {
        throw error;
      }
      logger.debug(`${error.message}, using installed versions`);
      versions = await this.listInstalledVersions();
    }
    return sortVersions(fuzzyMatchFilter(versions, query));
  }

  /**
   * Newest version matching `query`; without a query the plugin's latest
   * stable version, or else the newest stable-looking remote version.
   */
  async latestVersion(settings: Settings, query?: string): Promise<string | null> {
    if (query === undefined) {
      const stable = await this.plugin.latestStableVersion(settings);
      if (stable !== null) {
        return stable;
      }
      return this.latestVersion(settings, 'latest');
    }

    const matches = await this.listVersionsMatching(settings, query);
    return findMatchInList(matches, query);
  }

  async latestInstalledVersion(query: string = 'latest'): Promise<string | null> {
    const matches = await this.listInstalledVersionsMatching(query);
    return findMatchInList(matches, query);
  }

  async isVersionInstalled(tv: ToolVersion): Promise<boolean> {
    if (tv.request.type === 'system') {
      return true;
    }
    return fs.pathExists(tv.installPath);
  }

  /**
   * Installs one version under an advisory lock on its install path. An
   * existing install is removed first when `force` is set; a failed install
   * is removed unless the settings say to keep it.
   */
  async installVersion(
    config: Config,
    tv: ToolVersion,
    pr: ProgressReport,
    force: boolean = false
  ): Promise<void> {
    if (tv.request.type === 'system') {
      return;
    }

    await InstallLock.withLock(tv.installPath, async () => {
      if (!force && (await this.isVersionInstalled(tv))) {
        pr.finishWithMessage(`${tv} already installed`);
        return;
      }

      await this.cleanupVersion(tv);
      await FileSystem.ensureDirExists(tv.downloadPath);
      await FileSystem.ensureDirExists(tv.installPath);

      try {
        await this.plugin.installVersion(config, tv, pr);
      } catch (error) {
        pr.fail(`failed to install ${tv}`);
        if (!config.settings.alwaysKeepInstall) {
          await FileSystem.removeAll(tv.installPath);
        }
        throw new Error(`Failed to install ${tv}: ${errorMessage(error)}`, { cause: error });
      }

      if (!config.settings.alwaysKeepDownload) {
        await FileSystem.removeAll(tv.downloadPath);
      }
      pr.finishWithMessage(`${tv} installed`);
    });
  }

  /**
   * Runs the plugin's uninstall hook, then removes the install, download and
   * cache directories of the version.
   */
  async uninstallVersion(
    config: Config,
    tv: ToolVersion,
    pr: ProgressReport,
    dryRun: boolean = false
  ): Promise<void> {
    if (tv.request.type === 'system') {
      return;
    }

    pr.setMessage(`uninstalling ${tv}`);
    if (dryRun) {
      pr.finishWithMessage(`would uninstall ${tv}`);
      return;
    }

    await InstallLock.withLock(tv.installPath, async () => {
      await this.plugin.uninstallVersion(config, tv);
      await this.cleanupVersion(tv);
      await FileSystem.removeAll(tv.cachePath);
    });
    pr.finishWithMessage(`${tv} uninstalled`);
  }

  private async cleanupVersion(tv: ToolVersion): Promise<void> {
    await FileSystem.removeAll(tv.installPath);
    await FileSystem.removeAll(tv.downloadPath);
  }
}

/**
 * `query` itself when listed, otherwise the last (newest) entry.
 */
function findMatchInList(list: string[], query: string): string | null {
  if (list.includes(query)) {
    return query;
  }
  return list.length > 0 ? list[list.length - 1] ?? null : null;
}
