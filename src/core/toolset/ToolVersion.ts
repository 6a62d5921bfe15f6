import * as fs from 'fs-extra';
import * as path from 'path';
import { ToolVersionOptions, ToolVersionRequest } from '../../types/Toolset';
import { FileSystem } from '../../utils/FileSystem';
import { versionSub } from '../../utils/Version';
import { VersionNotFoundError } from '../../utils/Errors';
import type { Config } from '../Config';
import type { Tool } from '../plugins/Tool';
import { requestPathname, requestVersion } from './ToolVersionRequest';

/**
 * A request resolved to a concrete version, with the directories it
 * installs, downloads and caches into.
 */
export class ToolVersion {
  readonly request: ToolVersionRequest;
  readonly pluginName: string;
  readonly version: string;
  readonly installPath: string;
  readonly cachePath: string;
  readonly downloadPath: string;
  readonly opts: ToolVersionOptions;

  constructor(tool: Tool, request: ToolVersionRequest, opts: ToolVersionOptions, version: string) {
    const pathname = requestPathname(request);
    this.request = request;
    this.pluginName = tool.name;
    this.version = version;
    this.installPath = path.join(tool.dirs.installs, tool.name, pathname);
    this.cachePath = path.join(tool.dirs.cache, tool.name, pathname);
    this.downloadPath = path.join(tool.dirs.downloads, tool.name, pathname);
    this.opts = opts;
  }

  /**
   * @param latestVersions prefer remote data over what is already installed
   */
  static async resolve(
    config: Config,
    tool: Tool,
    request: ToolVersionRequest,
    opts: ToolVersionOptions,
    latestVersions: boolean
  ): Promise<ToolVersion> {
    switch (request.type) {
      case 'version':
        return this.resolveVersion(config, tool, request, request.version, opts, latestVersions);
      case 'prefix':
        return this.resolvePrefix(config, tool, request, request.prefix, opts);
      case 'path':
        return this.resolvePath(tool, request.path, opts);
      case 'ref':
      case 'system':
        return new ToolVersion(tool, request, opts, requestVersion(request));
    }
  }

  private static async resolveVersion(
    config: Config,
    tool: Tool,
    request: ToolVersionRequest,
    requested: string,
    opts: ToolVersionOptions,
    latestVersions: boolean
  ): Promise<ToolVersion> {
    const v = await config.resolveAlias(tool, requested);

    const colon = v.indexOf(':');
    if (colon !== -1) {
      const kind = v.slice(0, colon);
      const value = v.slice(colon + 1);
      if (kind === 'ref') {
        return this.resolveRef(tool, value, opts);
      }
      if (kind === 'path') {
        return this.resolvePath(tool, value, opts);
      }
      if (kind === 'prefix') {
        return this.resolvePrefix(config, tool, request, value, opts);
      }
    }

    const build = (version: string): ToolVersion => new ToolVersion(tool, request, opts, version);

    // an existing install needs no remote lookup
    const existingPath = path.join(tool.dirs.installs, tool.name, v);
    if ((await fs.pathExists(existingPath)) && !FileSystem.isRuntimeSymlink(existingPath)) {
      return build(v);
    }

    if (v === 'latest') {
      if (!latestVersions) {
        const installed = await tool.latestInstalledVersion();
        if (installed !== null) {
          return build(installed);
        }
      }
      const latest = await tool.latestVersion(config.settings);
      if (latest !== null) {
        return build(latest);
      }
    }

    if (!latestVersions) {
      const installed = await tool.listInstalledVersionsMatching(v);
      if (installed.includes(v)) {
        return build(v);
      }
    }

    const matches = await tool.listVersionsMatching(config.settings, v);
    if (matches.includes(v)) {
      return build(v);
    }

    if (v.includes('!-')) {
      const resolved = await this.resolveBang(config, tool, request, v, opts);
      if (resolved) {
        return resolved;
      }
    }

    return this.resolvePrefix(config, tool, request, v, opts);
  }

  /**
   * Resolves `12.0.0!-1` to the newest 11.x, `12.1.0!-0.1` to the newest 12.0.x.
   */
  private static async resolveBang(
    config: Config,
    tool: Tool,
    request: ToolVersionRequest,
    v: string,
    opts: ToolVersionOptions
  ): Promise<ToolVersion | null> {
    const separator = v.indexOf('!-');
    const wantedSpec = v.slice(0, separator);
    const minus = v.slice(separator + 2);

    let wanted: string;
    if (wantedSpec === 'latest') {
      const latest = await tool.latestVersion(config.settings);
      if (latest === null) {
        throw new VersionNotFoundError(tool.name, 'latest');
      }
      wanted = latest;
    } else {
      wanted = await config.resolveAlias(tool, wantedSpec);
    }

    const target = versionSub(wanted, minus);
    const version = await tool.latestVersion(config.settings, target);
    return version === null ? null : new ToolVersion(tool, request, opts, version);
  }

  /**
   * Takes the newest version matching `prefix`. With no match the prefix
   * itself is used, so a release that is not yet listed can be requested.
   */
  private static async resolvePrefix(
    config: Config,
    tool: Tool,
    request: ToolVersionRequest,
    prefix: string,
    opts: ToolVersionOptions
  ): Promise<ToolVersion> {
    const matches = await tool.listVersionsMatching(config.settings, prefix);
    const version = matches[matches.length - 1] ?? prefix;
    return new ToolVersion(tool, request, opts, version);
  }

  private static resolveRef(tool: Tool, ref: string, opts: ToolVersionOptions): ToolVersion {
    const request: ToolVersionRequest = { type: 'ref', pluginName: tool.name, ref };
    return new ToolVersion(tool, request, opts, requestVersion(request));
  }

  private static async resolvePath(
    tool: Tool,
    requestedPath: string,
    opts: ToolVersionOptions
  ): Promise<ToolVersion> {
    const canonical = await fs.realpath(requestedPath);
    const request: ToolVersionRequest = { type: 'path', pluginName: tool.name, path: canonical };
    return new ToolVersion(tool, request, opts, requestVersion(request));
  }

  toString(): string {
    return `${this.pluginName}@${this.version}`;
  }
}
