export { Config } from './core/Config';
export { ConfigManager, CONFIG_FILE_NAME } from './core/ConfigManager';
export { SettingsBuilder, DEFAULT_SETTINGS } from './core/SettingsBuilder';
export { resolveDirs, dirsUnder } from './core/Dirs';
export { CacheManager } from './core/cache/CacheManager';
export { EnvDiff } from './core/EnvDiff';
export type { EnvDiffOperation } from './core/EnvDiff';
export { Git } from './core/Git';
export { ProgressReport } from './core/ProgressReport';
export { BasePlugin } from './core/plugins/BasePlugin';
export { ExternalPlugin, parseAliases, pluginNameFromUrl } from './core/plugins/ExternalPlugin';
export { PLUGIN_MANIFEST_FILE, parsePluginManifest } from './core/plugins/PluginManifest';
export { ScriptManager, Scripts } from './core/plugins/ScriptManager';
export { Tool } from './core/plugins/Tool';
export { ToolVersion } from './core/toolset/ToolVersion';
export { ToolVersionList } from './core/toolset/ToolVersionList';
export {
  parseToolArg,
  parseToolVersionRequest,
  requestPathname,
  requestVersion,
} from './core/toolset/ToolVersionRequest';
export { TOOL_VERSIONS_FILE, parseToolVersions } from './core/toolset/ToolVersionsFile';
export { Toolset } from './core/toolset/Toolset';
export * from './utils/Errors';
export { compareVersions, fuzzyMatchFilter, sortVersions, versionSub } from './utils/Version';
export type * from './types/Config';
export type * from './types/Plugin';
export type * from './types/Toolset';
