import { Args } from '@oclif/core';
import { BaseCommand, settingsFlags } from '../cli/BaseCommand';
import { PluginNotInstalledError } from '../utils/Errors';

export default class LsRemote extends BaseCommand {
  static override description = 'List the versions a plugin can install';

  static override examples = [
    '<%= config.bin %> <%= command.id %> nodejs',
    '<%= config.bin %> <%= command.id %> nodejs 20',
  ];

  static override args = {
    plugin: Args.string({
      description: 'Plugin to list versions for',
      required: true,
    }),
    prefix: Args.string({
      description: 'Only show versions starting with this prefix',
    }),
  };

  static override flags = {
    ...settingsFlags,
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(LsRemote);

    try {
      const config = await this.loadConfig(flags);
      const tool = config.getTool(args.plugin);
      if (!tool.isInstalled()) {
        throw new PluginNotInstalledError(args.plugin);
      }

      const versions = args.prefix
        ? await tool.listVersionsMatching(config.settings, args.prefix)
        : await tool.listRemoteVersions(config.settings);
      for (const version of versions) {
        this.log(version);
      }
    } catch (error) {
      this.fail(`Failed to list versions of ${args.plugin}`, error);
    }
  }
}
