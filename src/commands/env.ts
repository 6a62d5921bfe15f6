import * as path from 'path';
import { BaseCommand, settingsFlags } from '../cli/BaseCommand';
import { Toolset } from '../core/toolset/Toolset';

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export default class Env extends BaseCommand {
  static override description =
    'Print export statements that put tool versions on PATH, for use with eval';

  static override examples = [
    'eval "$(<%= config.bin %> <%= command.id %>)"',
    'eval "$(<%= config.bin %> <%= command.id %> nodejs@20 python@3.12)"',
  ];

  static override strict = false;

  static override flags = {
    ...settingsFlags,
  };

  public async run(): Promise<void> {
    const { argv, flags } = await this.parse(Env);
    const tools = this.variadic(argv);

    let lines: string[];
    try {
      const config = await this.loadConfig(flags);
      const toolset =
        tools.length > 0
          ? Toolset.fromArgs(tools)
          : await Toolset.fromToolVersions(config, process.cwd());
      await toolset.resolve(config);

      const env = await toolset.execEnv(config);
      const binPaths = await toolset.binPaths(config);
      const currentPath = env.PATH ?? process.env.PATH ?? '';
      env.PATH = [...binPaths, currentPath].filter(p => p.length > 0).join(path.delimiter);

      lines = Object.entries(env)
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([key, value]) => `export ${key}=${shellQuote(value)}`);
    } catch (error) {
      this.fail('Failed to build the environment', error);
    }
    lines.forEach(line => this.log(line));
  }
}
