import { Args } from '@oclif/core';
import chalk from 'chalk';
import { BaseCommand, settingsFlags } from '../cli/BaseCommand';
import { ToolVersion } from '../core/toolset/ToolVersion';
import { parseToolArg } from '../core/toolset/ToolVersionRequest';
import { PluginNotInstalledError } from '../utils/Errors';

export default class Where extends BaseCommand {
  static override description = 'Print the install directory of a tool version';

  static override examples = [
    '<%= config.bin %> <%= command.id %> nodejs@20',
    '<%= config.bin %> <%= command.id %> python@3.12.1',
  ];

  static override args = {
    tool: Args.string({
      description: 'Tool and version (plugin@version)',
      required: true,
    }),
  };

  static override flags = {
    ...settingsFlags,
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Where);

    let installPath: string;
    try {
      const config = await this.loadConfig(flags);
      const request = parseToolArg(args.tool);
      const tool = config.getTool(request.pluginName);
      if (!tool.isInstalled()) {
        throw new PluginNotInstalledError(request.pluginName);
      }

      const tv = await ToolVersion.resolve(config, tool, request, {}, false);
      if (!(await tool.isVersionInstalled(tv))) {
        throw new Error(`${chalk.cyan(tv.toString())} is not installed`);
      }
      installPath = tv.installPath;
    } catch (error) {
      this.fail(`Failed to locate ${args.tool}`, error);
    }
    this.log(installPath);
  }
}
