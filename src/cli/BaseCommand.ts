import { Command, Flags } from '@oclif/core';
import { Config } from '../core/Config';
import { ConfigManager } from '../core/ConfigManager';
import { PartialSettings } from '../types/Config';
import { DEBUG_HINT, formatErrorChain } from '../utils/Errors';
import { logger } from '../utils/Logger';

/** Flags every command that loads the configuration accepts. */
export const settingsFlags = {
  verbose: Flags.boolean({
    char: 'v',
    description: 'Show script output and debug logging',
    default: false,
  }),
  raw: Flags.boolean({
    description: 'Attach plugin scripts directly to the terminal (implies --verbose --jobs=1)',
    default: false,
  }),
  jobs: Flags.integer({
    char: 'j',
    description: 'Number of plugins to process in parallel',
    min: 1,
  }),
};

interface SettingsFlagValues {
  verbose: boolean;
  raw: boolean;
  jobs: number | undefined;
}

export abstract class BaseCommand extends Command {
  protected async loadConfig(flags: SettingsFlagValues): Promise<Config> {
    const overrides: PartialSettings = {};
    if (flags.verbose) overrides.verbose = true;
    if (flags.raw) overrides.raw = true;
    if (flags.jobs !== undefined) overrides.jobs = flags.jobs;
    return ConfigManager.load(overrides);
  }

  /** Spinners only make sense on a terminal and get in the way of verbose output. */
  protected showProgress(config: Config): boolean {
    return Boolean(process.stderr.isTTY) && !config.settings.verbose;
  }

  /** Variadic arguments of a non-strict command. */
  protected variadic(argv: unknown[]): string[] {
    return argv.filter((arg): arg is string => typeof arg === 'string');
  }

  protected fail(message: string, error: unknown): never {
    logger.debug(message, error);
    const hint = logger.isDebugEnabled() ? '' : `\n${DEBUG_HINT}`;
    this.error(`${message}: ${formatErrorChain(error)}${hint}`);
  }
}
