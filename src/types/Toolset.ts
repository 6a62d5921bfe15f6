/**
 * A version specifier for one plugin, as written by the user.
 */
export type ToolVersionRequest =
  | { type: 'version'; pluginName: string; version: string }
  | { type: 'prefix'; pluginName: string; prefix: string }
  | { type: 'ref'; pluginName: string; ref: string }
  | { type: 'path'; pluginName: string; path: string }
  | { type: 'system'; pluginName: string };

export type ToolVersionRequestType = ToolVersionRequest['type'];

/** User-supplied options for a tool version, in declaration order. */
export type ToolVersionOptions = Record<string, string>;

export type ToolSource =
  | { type: 'argument' }
  | { type: 'environment'; key: string; value: string }
  | { type: 'tool-versions'; path: string }
  | { type: 'config-file'; path: string }
  | { type: 'legacy-version-file'; path: string };

export type InstallType = 'version' | 'ref' | 'path';
