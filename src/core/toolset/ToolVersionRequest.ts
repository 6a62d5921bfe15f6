import { ToolVersionRequest } from '../../types/Toolset';
import { VersionParseError } from '../../utils/Errors';
import { FileSystem } from '../../utils/FileSystem';

/**
 * Parses a specifier such as `18.2`, `prefix:18`, `ref:main`,
 * `path:/opt/node` or `system`.
 */
export function parseToolVersionRequest(pluginName: string, specifier: string): ToolVersionRequest {
  const colon = specifier.indexOf(':');
  if (colon === -1) {
    return specifier === 'system'
      ? { type: 'system', pluginName }
      : { type: 'version', pluginName, version: specifier };
  }

  const kind = specifier.slice(0, colon);
  const value = specifier.slice(colon + 1);
  switch (kind) {
    case 'ref':
      return { type: 'ref', pluginName, ref: value };
    case 'prefix':
      return { type: 'prefix', pluginName, prefix: value };
    case 'path':
      return { type: 'path', pluginName, path: value };
    default:
      throw new VersionParseError(specifier, `unknown request type "${kind}"`);
  }
}

/**
 * Splits `plugin@specifier` (specifier defaults to `latest`).
 */
export function parseToolArg(arg: string): ToolVersionRequest {
  const at = arg.indexOf('@');
  if (at === 0) {
    throw new VersionParseError(arg, 'missing plugin name');
  }
  if (at === -1) {
    return parseToolVersionRequest(arg, 'latest');
  }
  return parseToolVersionRequest(arg.slice(0, at), arg.slice(at + 1) || 'latest');
}

/** The rendered version used for ordering and display. */
export function requestVersion(request: ToolVersionRequest): string {
  switch (request.type) {
    case 'version':
      return request.version;
    case 'prefix':
      return `prefix-${request.prefix}`;
    case 'ref':
      return `ref-${request.ref}`;
    case 'path':
      return `path-${request.path}`;
    case 'system':
      return 'system';
  }
}

/**
 * Directory name for the request under installs/, downloads/ and the
 * cache. Requests with the same pathname share one install.
 */
export function requestPathname(request: ToolVersionRequest): string {
  switch (request.type) {
    case 'version':
      return request.version;
    case 'prefix':
      return `prefix-${request.prefix}`;
    case 'ref':
      return `ref-${request.ref}`;
    case 'path':
      return `path-${FileSystem.hashToStr(request.path)}`;
    case 'system':
      return 'system';
  }
}

export function formatRequest(request: ToolVersionRequest): string {
  return `${request.pluginName}@${requestVersion(request)}`;
}

export function compareRequests(a: ToolVersionRequest, b: ToolVersionRequest): number {
  const left = requestVersion(a);
  const right = requestVersion(b);
  return left < right ? -1 : left > right ? 1 : 0;
}
