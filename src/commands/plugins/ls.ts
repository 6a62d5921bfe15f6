import { Flags } from '@oclif/core';
import chalk from 'chalk';
import { BaseCommand, settingsFlags } from '../../cli/BaseCommand';

export default class PluginsLs extends BaseCommand {
  static override description = 'List installed plugins';

  static override examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> --urls',
  ];

  static override flags = {
    ...settingsFlags,
    urls: Flags.boolean({
      char: 'u',
      description: 'Show the git remote of each plugin',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(PluginsLs);

    const rows: string[] = [];
    try {
      const config = await this.loadConfig(flags);
      const tools = config.listTools().filter(tool => tool.isInstalled());
      const width = Math.max(0, ...tools.map(tool => tool.name.length));

      for (const tool of tools) {
        if (!flags.urls) {
          rows.push(tool.name);
          continue;
        }
        const url = await tool.plugin.getRemoteUrl();
        rows.push(`${tool.name.padEnd(width)}  ${url ?? chalk.gray('(no remote)')}`);
      }
    } catch (error) {
      this.fail('Failed to list plugins', error);
    }
    rows.forEach(row => this.log(row));
  }
}
