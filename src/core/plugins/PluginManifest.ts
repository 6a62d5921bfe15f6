import * as fs from 'fs-extra';
import * as yaml from 'yaml';
import { z } from 'zod';
import { PluginManifest } from '../../types/Plugin';
import { errorMessage } from '../../utils/Errors';

export const PLUGIN_MANIFEST_FILE = 'polyver.plugin.yml';

const dataSection = z
  .object({
    data: z.string().optional(),
  })
  .strict();

const manifestSchema = z
  .object({
    'list-aliases': dataSection.optional(),
    'list-legacy-filenames': dataSection.optional(),
    'exec-env': z
      .object({
        'cache-key': z.array(z.string()).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export function emptyManifest(): PluginManifest {
  return { listAliases: {}, listLegacyFilenames: {}, execEnv: {} };
}

/**
 * Parses the manifest text. Literal `data` sections stand in for the
 * corresponding scripts.
 */
export function parsePluginManifest(content: string, source: string = PLUGIN_MANIFEST_FILE): PluginManifest {
  let raw: unknown;
  try {
    raw = yaml.parse(content);
  } catch (error) {
    throw new Error(`Failed to parse ${source}: ${errorMessage(error)}`, { cause: error });
  }

  const result = manifestSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new Error(`Invalid plugin manifest ${source}: ${result.error.message}`);
  }

  const parsed = result.data;
  const manifest = emptyManifest();
  const aliasData = parsed['list-aliases']?.data;
  const legacyData = parsed['list-legacy-filenames']?.data;
  const cacheKey = parsed['exec-env']?.['cache-key'];

  if (aliasData !== undefined) manifest.listAliases.data = aliasData;
  if (legacyData !== undefined) manifest.listLegacyFilenames.data = legacyData;
  if (cacheKey !== undefined) manifest.execEnv.cacheKey = cacheKey;

  return manifest;
}

/**
 * Reads `polyver.plugin.yml` from a plugin directory. A plugin without one
 * gets the empty manifest.
 */
export function loadPluginManifest(manifestPath: string): PluginManifest {
  if (!fs.pathExistsSync(manifestPath)) {
    return emptyManifest();
  }
  return parsePluginManifest(fs.readFileSync(manifestPath, 'utf8'), manifestPath);
}
