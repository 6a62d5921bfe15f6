import { Args } from '@oclif/core';
import { BaseCommand, settingsFlags } from '../../cli/BaseCommand';

export default class PluginsExec extends BaseCommand {
  static override description = "Run one of a plugin's own commands (lib/commands/command-*.bash)";

  static override examples = ['<%= config.bin %> <%= command.id %> nodejs update-nodebuild'];

  static override strict = false;

  static override args = {
    plugin: Args.string({
      description: 'Plugin that provides the command',
      required: true,
    }),
    command: Args.string({
      description: 'Command name',
      required: true,
    }),
  };

  static override flags = {
    ...settingsFlags,
  };

  public async run(): Promise<void> {
    const { args, argv, flags } = await this.parse(PluginsExec);
    // argv also holds the two named arguments
    const rest = this.variadic(argv).slice(2);

    let exitCode: number;
    try {
      const config = await this.loadConfig(flags);
      const plugin = config.getTool(args.plugin).plugin;
      exitCode = await plugin.executeExternalCommand(args.command, rest);
    } catch (error) {
      this.fail(`Failed to run ${args.plugin} ${args.command}`, error);
    }
    if (exitCode !== 0) {
      this.exit(exitCode);
    }
  }
}
