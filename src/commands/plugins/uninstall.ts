import { Args, Flags } from '@oclif/core';
import chalk from 'chalk';
import inquirer from 'inquirer';
import { BaseCommand, settingsFlags } from '../../cli/BaseCommand';
import { ProgressReport } from '../../core/ProgressReport';
import { errorMessage } from '../../utils/Errors';
import { logger } from '../../utils/Logger';

export default class PluginsUninstall extends BaseCommand {
  static override description = 'Remove a plugin together with its installs and downloads';

  static override examples = [
    '<%= config.bin %> <%= command.id %> nodejs',
    '<%= config.bin %> <%= command.id %> nodejs --yes',
  ];

  static override args = {
    name: Args.string({
      description: 'Plugin to remove',
      required: true,
    }),
  };

  static override flags = {
    ...settingsFlags,
    yes: Flags.boolean({
      char: 'y',
      description: 'Do not ask for confirmation',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(PluginsUninstall);

    try {
      const config = await this.loadConfig(flags);
      const plugin = config.getTool(args.name).plugin;
      if (!plugin.isInstalled()) {
        logger.warn(`Plugin ${chalk.cyan(args.name)} is not installed`);
        return;
      }

      if (!flags.yes && !(await this.confirmRemoval(args.name))) {
        this.log(chalk.gray('Cancelled'));
        return;
      }

      const pr = new ProgressReport(args.name, this.showProgress(config));
      await plugin.uninstall(pr);
      logger.success(`Uninstalled plugin ${chalk.cyan(args.name)}`);
    } catch (error) {
      this.fail(`Failed to uninstall plugin ${args.name}`, error);
    }
  }

  private async confirmRemoval(name: string): Promise<boolean> {
    try {
      const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
        {
          type: 'confirm',
          name: 'confirmed',
          message: `Remove plugin ${chalk.white(name)} and every version installed with it?`,
          default: false,
        },
      ]);
      return confirmed;
    } catch (error) {
      // non-interactive terminals cannot answer
      logger.warn(`Could not prompt for confirmation (${errorMessage(error)}), pass --yes to remove`);
      return false;
    }
  }
}
