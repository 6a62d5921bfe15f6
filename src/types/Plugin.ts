import type { Settings } from './Config';
import type { Config } from '../core/Config';
import type { ProgressReport } from '../core/ProgressReport';
import type { ToolVersion } from '../core/toolset/ToolVersion';

export type PluginType = 'core' | 'external';

/**
 * Capabilities every version backend offers. Read operations a backend
 * cannot serve return an empty value rather than failing, except
 * `listRemoteVersions`, which has no sensible empty answer.
 */
export interface Plugin {
  readonly name: string;

  getType(): PluginType;
  isInstalled(): boolean;
  getRemoteUrl(): Promise<string | null>;

  listRemoteVersions(settings: Settings): Promise<string[]>;
  latestStableVersion(settings: Settings): Promise<string | null>;
  getAliases(settings: Settings): Promise<Map<string, string>>;
  legacyFilenames(settings: Settings): Promise<string[]>;
  parseLegacyFile(filePath: string, settings: Settings): Promise<string>;

  install(config: Config, pr: ProgressReport): Promise<void>;
  update(gitRef?: string): Promise<void>;
  uninstall(pr: ProgressReport): Promise<void>;

  externalCommands(): Promise<string[][]>;
  executeExternalCommand(command: string, args: string[]): Promise<number>;

  installVersion(config: Config, tv: ToolVersion, pr: ProgressReport): Promise<void>;
  uninstallVersion(config: Config, tv: ToolVersion): Promise<void>;
  listBinPaths(config: Config, tv: ToolVersion): Promise<string[]>;
  execEnv(config: Config, tv: ToolVersion): Promise<Record<string, string>>;
}

export type ScriptName =
  | 'list-all'
  | 'latest-stable'
  | 'list-aliases'
  | 'list-legacy-filenames'
  | 'parse-legacy-file'
  | 'list-bin-paths'
  | 'exec-env'
  | 'download'
  | 'install'
  | 'uninstall';

export interface Script {
  name: ScriptName;
  args?: string[];
}

/** Contents of a plugin's `polyver.plugin.yml`. */
export interface PluginManifest {
  listAliases: { data?: string };
  listLegacyFilenames: { data?: string };
  execEnv: { cacheKey?: string[] };
}
