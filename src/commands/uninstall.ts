import { Flags } from '@oclif/core';
import chalk from 'chalk';
import { BaseCommand, settingsFlags } from '../cli/BaseCommand';
import { ProgressReport } from '../core/ProgressReport';
import { ToolVersion } from '../core/toolset/ToolVersion';
import { parseToolArg } from '../core/toolset/ToolVersionRequest';
import { PluginNotInstalledError } from '../utils/Errors';
import { logger } from '../utils/Logger';

export default class Uninstall extends BaseCommand {
  static override description = 'Remove installed tool versions';

  static override examples = [
    '<%= config.bin %> <%= command.id %> nodejs@18.2.0',
    '<%= config.bin %> <%= command.id %> nodejs@18 python@3.11.4 --dry-run',
  ];

  static override strict = false;

  static override flags = {
    ...settingsFlags,
    'dry-run': Flags.boolean({
      char: 'n',
      description: 'Show what would be removed without removing it',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { argv, flags } = await this.parse(Uninstall);
    const tools = this.variadic(argv);
    if (tools.length === 0) {
      this.error('Specify at least one tool to uninstall, e.g. nodejs@18.2.0');
    }

    try {
      const config = await this.loadConfig(flags);

      for (const arg of tools) {
        const request = parseToolArg(arg);
        const tool = config.getTool(request.pluginName);
        if (!tool.isInstalled()) {
          throw new PluginNotInstalledError(request.pluginName);
        }

        const tv = await ToolVersion.resolve(config, tool, request, {}, false);
        if (!(await tool.isVersionInstalled(tv))) {
          logger.warn(`${chalk.cyan(tv.toString())} is not installed`);
          continue;
        }

        const pr = new ProgressReport(tv.toString(), this.showProgress(config));
        await tool.uninstallVersion(config, tv, pr, flags['dry-run']);
        if (flags['dry-run']) {
          this.log(`would uninstall ${chalk.cyan(tv.toString())}`);
        } else {
          logger.success(`Uninstalled ${chalk.cyan(tv.toString())}`);
        }
      }
    } catch (error) {
      this.fail('Failed to uninstall', error);
    }
  }
}
