import * as os from 'os';
import * as path from 'path';
import { Dirs } from '../types/Config';

const APP_NAME = 'polyver';

/**
 * Builds the directory layout from the environment. Every root can be moved
 * with a POLYVER_*_DIR variable; otherwise the XDG base directories apply.
 */
export function resolveDirs(env: NodeJS.ProcessEnv = process.env): Dirs {
  const home = env.HOME || os.homedir();
  const data =
    env.POLYVER_DATA_DIR ||
    path.join(env.XDG_DATA_HOME || path.join(home, '.local', 'share'), APP_NAME);
  const cache =
    env.POLYVER_CACHE_DIR || path.join(env.XDG_CACHE_HOME || path.join(home, '.cache'), APP_NAME);
  const config =
    env.POLYVER_CONFIG_DIR || path.join(env.XDG_CONFIG_HOME || path.join(home, '.config'), APP_NAME);

  return dirsUnder(data, cache, config);
}

export function dirsUnder(data: string, cache: string, config: string): Dirs {
  return {
    data,
    cache,
    config,
    plugins: path.join(data, 'plugins'),
    installs: path.join(data, 'installs'),
    downloads: path.join(data, 'downloads'),
    shims: path.join(data, 'shims'),
  };
}
