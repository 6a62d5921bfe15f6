import * as path from 'path';
import { z } from 'zod';
import { CacheManager } from '../cache/CacheManager';
import { FileSystem } from '../../utils/FileSystem';
import { TemplateContext, renderTemplate } from '../../utils/Template';
import type { Config } from '../Config';
import type { ToolVersion } from '../toolset/ToolVersion';

const binPathsSchema = z.array(z.string());
const execEnvSchema = z.record(z.string());

/**
 * Per-version caches of an external plugin: bin paths and exec-env output,
 * kept beside the version's other cache files and invalidated when the
 * plugin or the install changes.
 */
export class ExternalPluginCache {
  private readonly pluginPath: string;
  private readonly binPaths = new Map<string, CacheManager<string[]>>();
  private readonly execEnvs = new Map<string, CacheManager<Record<string, string>>>();

  constructor(pluginPath: string) {
    this.pluginPath = pluginPath;
  }

  async listBinPaths(tv: ToolVersion, fetch: () => Promise<string[]>): Promise<string[]> {
    let cache = this.binPaths.get(tv.installPath);
    if (!cache) {
      cache = new CacheManager(path.join(tv.cachePath, 'bin_paths.msgpack.z'), binPathsSchema)
        .withFreshFile(this.pluginPath)
        .withFreshFile(tv.installPath);
      this.binPaths.set(tv.installPath, cache);
    }
    return cache.getOrTryInit(fetch);
  }

  async execEnv(
    config: Config,
    tv: ToolVersion,
    cacheKey: string[] | undefined,
    fetch: () => Promise<Record<string, string>>
  ): Promise<Record<string, string>> {
    const cachePath = cacheKey
      ? path.join(tv.cachePath, 'exec_env', `${renderCacheKey(config, tv, cacheKey)}.msgpack.z`)
      : path.join(tv.cachePath, 'exec_env.msgpack.z');

    let cache = this.execEnvs.get(cachePath);
    if (!cache) {
      cache = new CacheManager(cachePath, execEnvSchema)
        .withFreshFile(this.pluginPath)
        .withFreshFile(tv.installPath);
      this.execEnvs.set(cachePath, cache);
    }
    return cache.getOrTryInit(fetch);
  }
}

/**
 * Renders each cache-key template, hashes it and joins the first ten
 * characters of every hash with "-".
 */
export function renderCacheKey(config: Config, tv: ToolVersion, templates: string[]): string {
  const env: TemplateContext = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) env[key] = value;
  }

  const context: TemplateContext = {
    env,
    opts: { ...tv.opts },
    version: tv.version,
    plugin_name: tv.pluginName,
    install_path: tv.installPath,
    project_root: config.projectRoot ?? '',
  };

  return templates
    .map(template => FileSystem.hashToStr(renderTemplate(template, context).trim()).slice(0, 10))
    .join('-');
}
