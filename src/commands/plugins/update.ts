import { Args, Flags } from '@oclif/core';
import chalk from 'chalk';
import { BaseCommand, settingsFlags } from '../../cli/BaseCommand';
import { PluginNotInstalledError, formatErrorChain } from '../../utils/Errors';
import { mapWithConcurrency } from '../../utils/Concurrency';
import { logger } from '../../utils/Logger';

export default class PluginsUpdate extends BaseCommand {
  static override description = 'Update one plugin, or every installed plugin, from git';

  static override examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> nodejs',
    '<%= config.bin %> <%= command.id %> nodejs --ref v2.0.0',
  ];

  static override args = {
    name: Args.string({
      description: 'Plugin to update; all plugins when omitted',
    }),
  };

  static override flags = {
    ...settingsFlags,
    ref: Flags.string({
      char: 'r',
      description: 'Git ref to check out (default: the current branch)',
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(PluginsUpdate);
    if (flags.ref !== undefined && args.name === undefined) {
      this.error('--ref needs a plugin name');
    }

    try {
      const config = await this.loadConfig(flags);
      let names: string[];
      if (args.name !== undefined) {
        if (!config.getTool(args.name).isInstalled()) {
          throw new PluginNotInstalledError(args.name);
        }
        names = [args.name];
      } else {
        names = config.listTools().filter(tool => tool.isInstalled()).map(tool => tool.name);
      }

      const results = await mapWithConcurrency(names, config.settings.jobs, async name => {
        await config.getTool(name).plugin.update(flags.ref);
      });

      let failures = 0;
      results.forEach((result, index) => {
        const name = names[index] ?? '';
        if (result.status === 'fulfilled') {
          logger.success(`Updated plugin ${chalk.cyan(name)}`);
        } else {
          failures++;
          logger.error(`Failed to update ${chalk.cyan(name)}: ${formatErrorChain(result.reason)}`);
        }
      });
      if (failures > 0) {
        throw new Error(`${failures} plugin${failures > 1 ? 's' : ''} failed to update`);
      }
    } catch (error) {
      this.fail('Failed to update plugins', error);
    }
  }
}
