import * as fs from 'fs-extra';
import * as path from 'path';
import { ProcessUtils } from '../utils/ProcessUtils';
import { VersionParseError } from '../utils/Errors';
import { logger } from '../utils/Logger';

/**
 * Thin wrapper over the git CLI for one working directory.
 */
export class Git {
  readonly dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  /**
   * Splits `url#ref` or `url@ref` into its parts. An `@` only counts when it
   * comes after the last `/`, so `git@host:org/repo.git` stays intact.
   */
  static splitUrlAndRef(combined: string): { url: string; ref: string | null } {
    let url = combined;
    let ref: string | null = null;

    const hash = combined.indexOf('#');
    if (hash !== -1) {
      url = combined.slice(0, hash);
      ref = combined.slice(hash + 1);
    } else {
      const at = combined.lastIndexOf('@');
      if (at > combined.lastIndexOf('/')) {
        url = combined.slice(0, at);
        ref = combined.slice(at + 1);
      }
    }

    if (!url || ref === '') {
      throw new VersionParseError(combined, 'expected a repository url with an optional #ref');
    }
    return { url, ref };
  }

  isRepo(): boolean {
    return fs.pathExistsSync(path.join(this.dir, '.git'));
  }

  async clone(url: string): Promise<void> {
    logger.debug(`cloning ${url} into ${this.dir}`);
    await fs.ensureDir(path.dirname(this.dir));
    await this.run(['clone', '-q', '--depth', '1', url, this.dir], path.dirname(this.dir));
  }

  /**
   * Fetches `gitRef` (default: the current branch) and checks it out.
   *
   * @returns the commit before and after the update
   */
  async update(gitRef?: string): Promise<[string, string]> {
    const ref = gitRef ?? (await this.currentBranch());
    const previous = await this.currentSha();

    await this.run(['fetch', '--prune', '--update-head-ok', 'origin', `${ref}:${ref}`]);
    await this.run([
      '-c',
      'advice.detachedHead=false',
      '-c',
      'advice.objectNameWarning=false',
      'checkout',
      '--force',
      ref,
    ]);

    return [previous, await this.currentSha()];
  }

  async currentBranch(): Promise<string> {
    return this.run(['branch', '--show-current']);
  }

  async currentSha(): Promise<string> {
    return this.run(['rev-parse', 'HEAD']);
  }

  async currentShaShort(): Promise<string> {
    return this.run(['rev-parse', '--short', 'HEAD']);
  }

  async getRemoteUrl(): Promise<string | null> {
    if (!this.isRepo()) {
      return null;
    }
    try {
      const url = await this.run(['config', '--get', 'remote.origin.url']);
      return url || null;
    } catch {
      return null;
    }
  }

  private async run(args: string[], cwd: string = this.dir): Promise<string> {
    const result = await ProcessUtils.execute('git', args, { cwd });
    if (result.exitCode !== 0) {
      throw new Error(`git ${args.join(' ')} failed with code ${result.exitCode}: ${result.stderr}`);
    }
    return result.stdout;
  }
}
