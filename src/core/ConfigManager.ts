import * as fs from 'fs-extra';
import * as path from 'path';
import * as yaml from 'yaml';
import { z } from 'zod';
import defaultShorthands from '../data/shorthands.json';
import { AliasMap, ConfigFile, Dirs, PartialSettings, Settings } from '../types/Config';
import { errorMessage } from '../utils/Errors';
import { LOG_LEVELS, isLogLevel, logger } from '../utils/Logger';
import { Config } from './Config';
import { resolveDirs } from './Dirs';
import { SettingsBuilder } from './SettingsBuilder';

export const CONFIG_FILE_NAME = 'config.yml';

const settingsSchema = z
  .object({
    verbose: z.boolean(),
    jobs: z.number().int().positive(),
    raw: z.boolean(),
    preferStale: z.boolean(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
    alwaysKeepDownload: z.boolean(),
    alwaysKeepInstall: z.boolean(),
    legacyVersionFile: z.boolean(),
    shorthandsFile: z.string(),
    disableDefaultShorthands: z.boolean(),
  })
  .partial()
  .strict();

const configFileSchema = z
  .object({
    settings: settingsSchema.optional(),
    aliases: z.record(z.record(z.string())).optional(),
  })
  .strict();

const shorthandsSchema = z.record(z.string());

function parseBoolean(value: string): boolean {
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Loads settings in layers: `<configDir>/config.yml`, then POLYVER_*
 * environment variables, then whatever the command line passed.
 */
export class ConfigManager {
  readonly dirs: Dirs;
  readonly configPath: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(dirs: Dirs = resolveDirs(), env: NodeJS.ProcessEnv = process.env) {
    this.dirs = dirs;
    this.env = env;
    this.configPath = path.join(dirs.config, CONFIG_FILE_NAME);
  }

  static async load(flags: PartialSettings = {}): Promise<Config> {
    return new ConfigManager().load(flags);
  }

  async load(flags: PartialSettings = {}): Promise<Config> {
    const file = await this.loadConfigFile();

    const settings = new SettingsBuilder(file.settings ?? {})
      .merge(this.settingsFromEnv())
      .merge(flags)
      .build();
    logger.setLevel(settings.verbose && settings.logLevel === 'info' ? 'debug' : settings.logLevel);

    const config = new Config(
      settings,
      this.dirs,
      this.aliasMap(file.aliases ?? {}),
      await this.loadShorthands(settings)
    );
    await config.loadTools();
    return config;
  }

  async loadConfigFile(): Promise<ConfigFile> {
    if (!(await fs.pathExists(this.configPath))) {
      return {};
    }

    try {
      const content = await fs.readFile(this.configPath, 'utf8');
      const parsed = configFileSchema.parse(yaml.parse(content) ?? {});
      const file: ConfigFile = {};
      if (parsed.settings) file.settings = stripUndefined(parsed.settings);
      if (parsed.aliases) file.aliases = parsed.aliases;
      return file;
    } catch (error) {
      throw new Error(`Failed to load config at ${this.configPath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  settingsFromEnv(): PartialSettings {
    const env = this.env;
    const settings: PartialSettings = {};

    if (env.POLYVER_VERBOSE) settings.verbose = parseBoolean(env.POLYVER_VERBOSE);
    if (env.POLYVER_RAW) settings.raw = parseBoolean(env.POLYVER_RAW);
    if (env.POLYVER_PREFER_STALE) settings.preferStale = parseBoolean(env.POLYVER_PREFER_STALE);
    if (env.POLYVER_ALWAYS_KEEP_DOWNLOAD) {
      settings.alwaysKeepDownload = parseBoolean(env.POLYVER_ALWAYS_KEEP_DOWNLOAD);
    }
    if (env.POLYVER_ALWAYS_KEEP_INSTALL) {
      settings.alwaysKeepInstall = parseBoolean(env.POLYVER_ALWAYS_KEEP_INSTALL);
    }
    if (env.POLYVER_LEGACY_VERSION_FILE) {
      settings.legacyVersionFile = parseBoolean(env.POLYVER_LEGACY_VERSION_FILE);
    }
    if (env.POLYVER_DISABLE_DEFAULT_SHORTHANDS) {
      settings.disableDefaultShorthands = parseBoolean(env.POLYVER_DISABLE_DEFAULT_SHORTHANDS);
    }
    if (env.POLYVER_SHORTHANDS_FILE) settings.shorthandsFile = env.POLYVER_SHORTHANDS_FILE;

    if (env.POLYVER_JOBS) {
      const jobs = Number.parseInt(env.POLYVER_JOBS, 10);
      if (Number.isNaN(jobs) || jobs < 1) {
        logger.warn(`Ignoring POLYVER_JOBS=${env.POLYVER_JOBS}: expected a positive integer`);
      } else {
        settings.jobs = jobs;
      }
    }

    if (env.POLYVER_DEBUG && parseBoolean(env.POLYVER_DEBUG)) {
      settings.logLevel = 'debug';
    } else if (env.POLYVER_LOG_LEVEL) {
      const level = env.POLYVER_LOG_LEVEL.toLowerCase();
      if (isLogLevel(level)) {
        settings.logLevel = level;
      } else {
        logger.warn(
          `Ignoring POLYVER_LOG_LEVEL=${env.POLYVER_LOG_LEVEL}: expected one of ${LOG_LEVELS.join(', ')}`
        );
      }
    }

    return settings;
  }

  /**
   * Short plugin names mapped to repository urls. Entries from the user's
   * shorthands file override the built-in ones.
   */
  async loadShorthands(settings: Settings): Promise<Map<string, string>> {
    const shorthands = new Map<string, string>();
    if (!settings.disableDefaultShorthands) {
      for (const [name, url] of Object.entries(defaultShorthands)) {
        shorthands.set(name, url);
      }
    }

    if (settings.shorthandsFile) {
      try {
        const content = await fs.readFile(settings.shorthandsFile, 'utf8');
        const parsed = shorthandsSchema.parse(yaml.parse(content) ?? {});
        for (const [name, url] of Object.entries(parsed)) {
          shorthands.set(name, url);
        }
      } catch (error) {
        throw new Error(
          `Failed to load shorthands from ${settings.shorthandsFile}: ${errorMessage(error)}`,
          { cause: error }
        );
      }
    }

    return shorthands;
  }

  private aliasMap(aliases: Record<string, Record<string, string>>): AliasMap {
    const map: AliasMap = new Map();
    for (const [plugin, entries] of Object.entries(aliases)) {
      map.set(plugin, new Map(Object.entries(entries)));
    }
    return map;
  }
}

function stripUndefined(values: z.infer<typeof settingsSchema>): PartialSettings {
  const settings: PartialSettings = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) {
      Object.assign(settings, { [key]: value });
    }
  }
  return settings;
}
