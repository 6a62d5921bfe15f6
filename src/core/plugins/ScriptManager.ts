import * as fs from 'fs-extra';
import * as path from 'path';
import { Script } from '../../types/Plugin';
import { Settings } from '../../types/Config';
import { ProcessUtils } from '../../utils/ProcessUtils';
import { ScriptExecutionError } from '../../utils/Errors';
import { logger } from '../../utils/Logger';
import { ProgressReport } from '../ProgressReport';

/** Set for every script we run; scripts that call back into us see it. */
export const SCRIPT_MARKER_ENV = '__POLYVER_SCRIPT';

const OUTPUT_TAIL_LINES = 10;

export const Scripts = {
  listAll: { name: 'list-all' },
  latestStable: { name: 'latest-stable' },
  listAliases: { name: 'list-aliases' },
  listLegacyFilenames: { name: 'list-legacy-filenames' },
  listBinPaths: { name: 'list-bin-paths' },
  execEnv: { name: 'exec-env' },
  download: { name: 'download' },
  install: { name: 'install' },
  uninstall: { name: 'uninstall' },
  parseLegacyFile: (filePath: string): Script => ({ name: 'parse-legacy-file', args: [filePath] }),
} satisfies Record<string, Script | ((filePath: string) => Script)>;

/**
 * Locates and runs the scripts under a plugin's `bin/` directory with the
 * plugin's environment layered over the process environment.
 */
export class ScriptManager {
  readonly pluginPath: string;
  readonly env: Readonly<Record<string, string>>;

  constructor(pluginPath: string, env: Record<string, string> = {}) {
    this.pluginPath = pluginPath;
    this.env = { ...env, [SCRIPT_MARKER_ENV]: '1' };
  }

  /** A copy of this manager with one more variable set. */
  withEnv(key: string, value: string): ScriptManager {
    return new ScriptManager(this.pluginPath, { ...this.env, [key]: value });
  }

  getScriptPath(script: Script): string {
    return path.join(this.pluginPath, 'bin', script.name);
  }

  scriptExists(script: Script): boolean {
    return fs.pathExistsSync(this.getScriptPath(script));
  }

  /**
   * Runs the script with output captured and returns stdout. In verbose mode
   * stderr is echoed even when the script succeeds.
   */
  async read(settings: Settings, script: Script, verbose: boolean = settings.verbose): Promise<string> {
    const scriptPath = this.getScriptPath(script);
    const result = await ProcessUtils.execute(scriptPath, script.args ?? [], {
      env: this.env,
      trim: false,
    });

    if (result.exitCode !== 0) {
      throw new ScriptExecutionError(scriptPath, result.exitCode, result.stderr);
    }
    if (verbose && result.stderr) {
      logger.info(result.stderr);
    }

    return result.stdout;
  }

  async run(settings: Settings, script: Script): Promise<void> {
    await this.read(settings, script);
  }

  /**
   * Runs a long script, feeding each output line into the progress report.
   * Raw mode hands the terminal to the script instead.
   */
  async runByLine(settings: Settings, script: Script, pr: ProgressReport): Promise<void> {
    const scriptPath = this.getScriptPath(script);
    const stdout: string[] = [];

    const result = await ProcessUtils.executeByLine(
      scriptPath,
      script.args ?? [],
      { env: this.env, stdio: settings.raw ? 'inherit' : 'pipe' },
      (line, source) => {
        if (source === 'stdout') {
          stdout.push(line);
        }
        if (settings.verbose) {
          logger.info(line);
        } else {
          pr.setMessage(line);
        }
      }
    );

    if (result.exitCode !== 0) {
      const tail = stdout.slice(-OUTPUT_TAIL_LINES).join('\n');
      const detail = tail
        ? `exited with code ${result.exitCode}, last output:\n${tail}`
        : `exited with code ${result.exitCode}`;
      throw new ScriptExecutionError(scriptPath, result.exitCode, result.stderr, detail);
    }
  }
}
