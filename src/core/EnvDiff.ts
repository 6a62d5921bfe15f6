import { randomBytes } from 'crypto';
import { ProcessUtils } from '../utils/ProcessUtils';
import { ScriptExecutionError } from '../utils/Errors';

export type EnvDiffOperation =
  | { type: 'add'; key: string; value: string }
  | { type: 'change'; key: string; value: string }
  | { type: 'remove'; key: string };

// Variables bash maintains itself; they differ between snapshots for
// reasons unrelated to the sourced script.
const IGNORED_KEYS = new Set(['_', 'SHLVL', 'PWD', 'OLDPWD']);

// $1 is the script, $2 the delimiter. Both snapshots come from the same
// shell so nothing can change the environment in between.
const SNAPSHOT_SCRIPT = [
  '__envdiff_script="$1"',
  '__envdiff_delim="$2"',
  'shift 2',
  'env -0',
  'printf "%s" "$__envdiff_delim"',
  '. "$__envdiff_script"',
  'env -0',
].join('\n');

/**
 * Environment changes made by sourcing a bash script.
 */
export class EnvDiff {
  readonly before: Map<string, string>;
  readonly after: Map<string, string>;

  constructor(before: Map<string, string>, after: Map<string, string>) {
    this.before = before;
    this.after = after;
  }

  static async fromBashScript(
    scriptPath: string,
    env: Record<string, string>
  ): Promise<EnvDiff> {
    const delimiter = `__POLYVER_ENV_DIFF_${randomBytes(8).toString('hex')}__`;
    const result = await ProcessUtils.execute(
      'bash',
      ['-c', SNAPSHOT_SCRIPT, 'bash', scriptPath, delimiter],
      { env, trim: false }
    );

    if (result.exitCode !== 0) {
      throw new ScriptExecutionError(scriptPath, result.exitCode, result.stderr);
    }

    const index = result.stdout.indexOf(delimiter);
    if (index === -1) {
      throw new ScriptExecutionError(
        scriptPath,
        result.exitCode,
        result.stderr,
        'environment snapshot delimiter missing from output'
      );
    }

    return new EnvDiff(
      parseEnvOutput(result.stdout.slice(0, index)),
      parseEnvOutput(result.stdout.slice(index + delimiter.length))
    );
  }

  /**
   * Operations that turn `before` into `after`, ordered by variable name.
   */
  toPatches(): EnvDiffOperation[] {
    const keys = new Set([...this.before.keys(), ...this.after.keys()]);
    const patches: EnvDiffOperation[] = [];

    for (const key of Array.from(keys).sort()) {
      const oldValue = this.before.get(key);
      const newValue = this.after.get(key);

      if (oldValue === undefined && newValue !== undefined) {
        patches.push({ type: 'add', key, value: newValue });
      } else if (oldValue !== undefined && newValue === undefined) {
        patches.push({ type: 'remove', key });
      } else if (newValue !== undefined && oldValue !== newValue) {
        patches.push({ type: 'change', key, value: newValue });
      }
    }

    return patches;
  }

  /**
   * Variables the script added or changed. Removals are dropped: the
   * managed environment only ever grows.
   */
  additions(): Record<string, string> {
    const env: Record<string, string> = {};
    for (const patch of this.toPatches()) {
      if (patch.type === 'add' || patch.type === 'change') {
        env[patch.key] = patch.value;
      }
    }
    return env;
  }
}

function parseEnvOutput(output: string): Map<string, string> {
  const env = new Map<string, string>();

  for (const entry of output.split('\0')) {
    const eq = entry.indexOf('=');
    if (eq <= 0) continue;
    const key = entry.slice(0, eq);
    if (IGNORED_KEYS.has(key)) continue;
    env.set(key, entry.slice(eq + 1));
  }

  return env;
}
