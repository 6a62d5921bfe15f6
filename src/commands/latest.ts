import { Args, Flags } from '@oclif/core';
import { BaseCommand, settingsFlags } from '../cli/BaseCommand';
import { PluginNotInstalledError, VersionNotFoundError } from '../utils/Errors';

export default class Latest extends BaseCommand {
  static override description = 'Show the newest version of a tool, optionally within a prefix';

  static override examples = [
    '<%= config.bin %> <%= command.id %> nodejs',
    '<%= config.bin %> <%= command.id %> nodejs@18',
    '<%= config.bin %> <%= command.id %> python@3.11 --installed',
  ];

  static override args = {
    tool: Args.string({
      description: 'Plugin name with an optional version prefix (plugin@prefix)',
      required: true,
    }),
  };

  static override flags = {
    ...settingsFlags,
    installed: Flags.boolean({
      char: 'i',
      description: 'Only consider installed versions',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Latest);
    const at = args.tool.indexOf('@');
    const pluginName = at === -1 ? args.tool : args.tool.slice(0, at);
    const prefix = at === -1 ? undefined : args.tool.slice(at + 1) || undefined;

    try {
      const config = await this.loadConfig(flags);
      const tool = config.getTool(pluginName);
      if (!tool.isInstalled()) {
        throw new PluginNotInstalledError(pluginName);
      }

      const version = flags.installed
        ? await tool.latestInstalledVersion(prefix)
        : await tool.latestVersion(config.settings, prefix);
      if (version === null) {
        throw new VersionNotFoundError(pluginName, prefix ?? 'latest');
      }
      this.log(version);
    } catch (error) {
      this.fail(`Failed to find the latest version of ${pluginName}`, error);
    }
  }
}
