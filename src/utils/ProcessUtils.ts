import { ChildProcess } from 'child_process';
import * as readline from 'readline';
import kill from 'tree-kill';
import crossSpawn from 'cross-spawn';

export interface ProcessOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  shell?: boolean;
  detached?: boolean;
  stdio?: 'inherit' | 'pipe' | 'ignore';
  trim?: boolean;
}

export interface ProcessResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export type LineSource = 'stdout' | 'stderr';

export class ProcessUtils {
  private static readonly running = new Set<ChildProcess>();

  static async execute(
    command: string,
    args: string[] = [],
    options: ProcessOptions = {}
  ): Promise<ProcessResult> {
    return new Promise((resolve, reject) => {
      const child = this.track(
        crossSpawn(command, args, {
          cwd: options.cwd || process.cwd(),
          env: { ...process.env, ...options.env },
          shell: options.shell || false,
          stdio: options.stdio || 'pipe',
        })
      );

      let stdout = '';
      let stderr = '';

      if (child.stdout) {
        child.stdout.on('data', (data: Buffer) => {
          stdout += data.toString();
        });
      }

      if (child.stderr) {
        child.stderr.on('data', (data: Buffer) => {
          stderr += data.toString();
        });
      }

      child.on('close', (code: number | null) => {
        const trim = options.trim ?? true;
        resolve({
          stdout: trim ? stdout.trim() : stdout,
          stderr: stderr.trim(),
          exitCode: code ?? 1,
        });
      });

      child.on('error', (error: Error) => {
        reject(new Error(`Process execution failed: ${error.message}`));
      });
    });
  }

  /**
   * Runs a command and hands every output line to `onLine` as it arrives.
   * With `stdio: 'inherit'` the output goes straight to the terminal and
   * `onLine` is never called.
   */
  static async executeByLine(
    command: string,
    args: string[],
    options: ProcessOptions,
    onLine: (line: string, source: LineSource) => void
  ): Promise<ProcessResult> {
    return new Promise((resolve, reject) => {
      const child = this.track(
        crossSpawn(command, args, {
          cwd: options.cwd || process.cwd(),
          env: { ...process.env, ...options.env },
          stdio: options.stdio || 'pipe',
        })
      );

      const stdout: string[] = [];
      const stderr: string[] = [];

      if (child.stdout) {
        readline.createInterface({ input: child.stdout }).on('line', line => {
          stdout.push(line);
          onLine(line, 'stdout');
        });
      }

      if (child.stderr) {
        readline.createInterface({ input: child.stderr }).on('line', line => {
          stderr.push(line);
          onLine(line, 'stderr');
        });
      }

      child.on('close', (code: number | null) => {
        resolve({
          stdout: stdout.join('\n').trim(),
          stderr: stderr.join('\n').trim(),
          exitCode: code ?? 1,
        });
      });

      child.on('error', (error: Error) => {
        reject(new Error(`Process execution failed: ${error.message}`));
      });
    });
  }

  static spawn(command: string, args: string[] = [], options: ProcessOptions = {}): ChildProcess {
    return this.track(
      crossSpawn(command, args, {
        cwd: options.cwd || process.cwd(),
        env: { ...process.env, ...options.env },
        shell: options.shell || false,
        stdio: options.stdio || 'inherit',
        detached: options.detached || false,
      })
    );
  }

  static async waitForExit(child: ChildProcess): Promise<number> {
    return new Promise((resolve, reject) => {
      child.on('close', (code: number | null) => resolve(code ?? 1));
      child.on('error', (error: Error) => {
        reject(new Error(`Process execution failed: ${error.message}`));
      });
    });
  }

  static async killProcess(pid: number, signal: string = 'SIGTERM'): Promise<void> {
    return new Promise((resolve, reject) => {
      kill(pid, signal, (error?: Error) => {
        if (error) {
          reject(new Error(`Failed to kill process ${pid}: ${error.message}`));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Kills every child started through this class that is still running,
   * along with its descendants.
   */
  static async killAll(signal: string = 'SIGTERM'): Promise<void> {
    const pids = Array.from(this.running)
      .map(child => child.pid)
      .filter((pid): pid is number => pid !== undefined);

    await Promise.allSettled(pids.map(pid => this.killProcess(pid, signal)));
  }

  static isProcessRunning(pid: number): boolean {
    try {
      process.kill(pid, 0);
      return true;
    } catch {
      return false;
    }
  }

  private static track(child: ChildProcess): ChildProcess {
    this.running.add(child);
    child.on('close', () => this.running.delete(child));
    child.on('error', () => this.running.delete(child));
    return child;
  }
}
