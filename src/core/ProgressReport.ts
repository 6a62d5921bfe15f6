import chalk from 'chalk';
import ora from 'ora';
import { logger } from '../utils/Logger';

/**
 * Status line for one long-running job (a plugin or tool install). Shows an
 * ora spinner on interactive terminals and falls back to debug logging.
 */
export class ProgressReport {
  readonly prefix: string;
  private readonly spinner: ora.Ora | null;

  constructor(prefix: string, enabled: boolean = false) {
    this.prefix = prefix;
    this.spinner = enabled ? ora({ prefixText: chalk.cyan(prefix), text: '' }).start() : null;
  }

  /** A report that never draws anything. */
  static silent(prefix: string = ''): ProgressReport {
    return new ProgressReport(prefix, false);
  }

  setMessage(message: string): void {
    if (this.spinner) {
      this.spinner.text = message;
    } else {
      logger.debug(`${this.prefix} ${message}`.trim());
    }
  }

  finishWithMessage(message: string): void {
    if (this.spinner) {
      this.spinner.succeed(message);
    } else {
      logger.debug(`${this.prefix} ${message}`.trim());
    }
  }

  fail(message: string): void {
    if (this.spinner) {
      this.spinner.fail(message);
    } else {
      logger.debug(`${this.prefix} ${message}`.trim());
    }
  }
}
