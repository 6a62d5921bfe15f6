import { Flags } from '@oclif/core';
import chalk from 'chalk';
import { BaseCommand, settingsFlags } from '../cli/BaseCommand';
import { Toolset } from '../core/toolset/Toolset';
import { logger } from '../utils/Logger';

export default class Install extends BaseCommand {
  static override description =
    'Install tool versions. Without arguments, installs everything .tool-versions asks for';

  static override examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> nodejs@20',
    '<%= config.bin %> <%= command.id %> nodejs@lts python@3.12 --jobs 2',
    '<%= config.bin %> <%= command.id %> nodejs@ref:main --force',
  ];

  static override strict = false;

  static override flags = {
    ...settingsFlags,
    force: Flags.boolean({
      char: 'f',
      description: 'Reinstall even if the version is already installed',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { argv, flags } = await this.parse(Install);
    const tools = this.variadic(argv);

    try {
      const config = await this.loadConfig(flags);
      const progress = this.showProgress(config);
      const toolset =
        tools.length > 0
          ? Toolset.fromArgs(tools)
          : await Toolset.fromToolVersions(config, process.cwd());

      if (toolset.pluginNames.length === 0) {
        logger.warn('Nothing to install: no tools given and no .tool-versions found');
        return;
      }

      await toolset.installMissingPlugins(config, { progress });
      for (const name of toolset.pluginNames) {
        if (!config.getTool(name).isInstalled()) {
          logger.warn(
            `Plugin ${chalk.cyan(name)} is not installed. Run ${chalk.white(`${this.config.bin} plugins install ${name} <git-url>`)}`
          );
        }
      }

      await toolset.resolve(config, tools.length > 0);
      const installed = await toolset.installMissing(config, { force: flags.force, progress });

      if (installed.length === 0) {
        logger.info('All requested versions are already installed');
        return;
      }
      for (const tv of installed) {
        logger.success(`Installed ${chalk.cyan(tv.toString())}`);
      }
    } catch (error) {
      this.fail('Failed to install tools', error);
    }
  }
}
