import { Args, Flags } from '@oclif/core';
import chalk from 'chalk';
import { BaseCommand, settingsFlags } from '../../cli/BaseCommand';
import { ProgressReport } from '../../core/ProgressReport';
import { ExternalPlugin, pluginNameFromUrl } from '../../core/plugins/ExternalPlugin';
import { logger } from '../../utils/Logger';

export default class PluginsInstall extends BaseCommand {
  static override description = 'Install a plugin from its git repository';

  static override examples = [
    '<%= config.bin %> <%= command.id %> nodejs',
    '<%= config.bin %> <%= command.id %> nodejs https://github.com/asdf-vm/asdf-nodejs.git',
    '<%= config.bin %> <%= command.id %> https://github.com/asdf-vm/asdf-nodejs.git#v1.0.0',
  ];

  static override args = {
    name: Args.string({
      description: 'Plugin name, or a git url to derive it from',
      required: true,
    }),
    url: Args.string({
      description: 'Git url with an optional #ref; defaults to the known shorthand',
    }),
  };

  static override flags = {
    ...settingsFlags,
    force: Flags.boolean({
      char: 'f',
      description: 'Reinstall even if the plugin is already installed',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(PluginsInstall);

    const looksLikeUrl = args.url === undefined && /[:/]/.test(args.name);
    const name = looksLikeUrl ? pluginNameFromUrl(args.name) : args.name;
    const url = looksLikeUrl ? args.name : args.url;

    try {
      const config = await this.loadConfig(flags);
      const plugin = config.getTool(name).plugin;

      if (plugin.isInstalled() && !flags.force) {
        logger.warn(`Plugin ${chalk.cyan(name)} is already installed, use --force to reinstall`);
        return;
      }
      if (url !== undefined && plugin instanceof ExternalPlugin) {
        plugin.repoUrl = url;
      }

      const pr = new ProgressReport(name, this.showProgress(config));
      await plugin.install(config, pr);
      logger.success(`Installed plugin ${chalk.cyan(name)}`);
    } catch (error) {
      this.fail(`Failed to install plugin ${name}`, error);
    }
  }
}
