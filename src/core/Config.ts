import { AliasMap, Dirs, Settings } from '../types/Config';
import { Plugin } from '../types/Plugin';
import { FileSystem } from '../utils/FileSystem';
import { ExternalPlugin } from './plugins/ExternalPlugin';
import { Tool } from './plugins/Tool';

/**
 * Everything a command needs: settings, directory layout, the plugins found
 * on disk, configured aliases and the short-name registry.
 */
export class Config {
  readonly settings: Settings;
  readonly dirs: Dirs;
  readonly aliases: AliasMap;
  readonly shorthands: ReadonlyMap<string, string>;
  projectRoot: string | null = null;

  private readonly tools = new Map<string, Tool>();

  constructor(
    settings: Settings,
    dirs: Dirs,
    aliases: AliasMap = new Map(),
    shorthands: ReadonlyMap<string, string> = new Map()
  ) {
    this.settings = settings;
    this.dirs = dirs;
    this.aliases = aliases;
    this.shorthands = shorthands;
  }

  /** Registers one tool for every directory under `plugins/`. */
  async loadTools(): Promise<void> {
    for (const name of await FileSystem.listDirectories(this.dirs.plugins)) {
      this.getTool(name);
    }
  }

  addPlugin(plugin: Plugin): Tool {
    const tool = new Tool(plugin, this.dirs);
    this.tools.set(plugin.name, tool);
    return tool;
  }

  /**
   * The tool named `name`. Unknown names get an external plugin that is
   * simply not installed yet.
   */
  getTool(name: string): Tool {
    const existing = this.tools.get(name);
    if (existing) {
      return existing;
    }
    return this.addPlugin(new ExternalPlugin(name, this.dirs, this.settings));
  }

  hasTool(name: string): boolean {
    return this.tools.has(name);
  }

  listTools(): Tool[] {
    return [...this.tools.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  /**
   * Maps a user alias (`lts`, `stable`) to a version specifier. Aliases from
   * the config file take precedence over the ones the plugin publishes.
   */
  async resolveAlias(tool: Tool, version: string): Promise<string> {
    const configured = this.aliases.get(tool.name)?.get(version);
    if (configured !== undefined) {
      return configured;
    }
    if (!tool.isInstalled()) {
      return version;
    }
    const pluginAliases = await tool.plugin.getAliases(this.settings);
    return pluginAliases.get(version) ?? version;
  }

  getRepoUrl(name: string): string | null {
    return this.shorthands.get(name) ?? null;
  }
}
