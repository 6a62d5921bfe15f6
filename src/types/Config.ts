import { LogLevel } from '../utils/Logger';

export interface Settings {
  verbose: boolean;
  /** Maximum number of plugins resolved or installed at once. */
  jobs: number;
  /** Pass script output straight through; implies verbose and one job. */
  raw: boolean;
  /** Never expire remote version caches by age. */
  preferStale: boolean;
  logLevel: LogLevel;
  alwaysKeepDownload: boolean;
  alwaysKeepInstall: boolean;
  legacyVersionFile: boolean;
  shorthandsFile?: string;
  disableDefaultShorthands: boolean;
}

export type PartialSettings = {
  [K in keyof Settings]?: Settings[K];
};

export interface Dirs {
  data: string;
  cache: string;
  config: string;
  plugins: string;
  installs: string;
  downloads: string;
  shims: string;
}

/** plugin name → alias → version specifier */
export type AliasMap = Map<string, Map<string, string>>;

export interface ConfigFile {
  settings?: PartialSettings;
  aliases?: Record<string, Record<string, string>>;
}
