import * as fs from 'fs-extra';
import * as path from 'path';
import { Plugin, PluginType } from '../../types/Plugin';
import { Settings } from '../../types/Config';
import { logger } from '../../utils/Logger';
import type { Config } from '../Config';
import type { ProgressReport } from '../ProgressReport';
import type { ToolVersion } from '../toolset/ToolVersion';

/**
 * Defaults shared by every backend. Built-in (core) backends only need to
 * list versions and install one; the rest has a sensible empty answer.
 */
export abstract class BasePlugin implements Plugin {
  readonly name: string;

  constructor(name: string) {
    this.name = name;
  }

  abstract listRemoteVersions(settings: Settings): Promise<string[]>;

  abstract installVersion(config: Config, tv: ToolVersion, pr: ProgressReport): Promise<void>;

  getType(): PluginType {
    return 'core';
  }

  isInstalled(): boolean {
    return true;
  }

  async getRemoteUrl(): Promise<string | null> {
    return null;
  }

  async latestStableVersion(_settings: Settings): Promise<string | null> {
    return null;
  }

  async getAliases(_settings: Settings): Promise<Map<string, string>> {
    return new Map();
  }

  async legacyFilenames(_settings: Settings): Promise<string[]> {
    return [];
  }

  async parseLegacyFile(filePath: string, _settings: Settings): Promise<string> {
    const contents = await fs.readFile(filePath, 'utf8');
    return contents.trim();
  }

  async install(_config: Config, _pr: ProgressReport): Promise<void> {}

  async update(_gitRef?: string): Promise<void> {}

  async uninstall(_pr: ProgressReport): Promise<void> {}

  async externalCommands(): Promise<string[][]> {
    return [];
  }

  async executeExternalCommand(command: string, _args: string[]): Promise<number> {
    throw new Error(`Plugin ${this.name} has no command ${command}`);
  }

  async uninstallVersion(_config: Config, _tv: ToolVersion): Promise<void> {}

  async listBinPaths(_config: Config, tv: ToolVersion): Promise<string[]> {
    if (tv.request.type === 'system') {
      return [];
    }
    return [path.join(tv.installPath, 'bin')];
  }

  async execEnv(_config: Config, _tv: ToolVersion): Promise<Record<string, string>> {
    return {};
  }

  protected log(level: 'debug' | 'info' | 'warn' | 'error', message: string, meta?: unknown): void {
    logger[level](`[${this.name}] ${message}`, meta);
  }
}
