import * as fs from 'fs-extra';
import * as path from 'path';
import { errorMessage } from '../../utils/Errors';
import { ToolVersionList } from './ToolVersionList';
import { parseToolVersionRequest } from './ToolVersionRequest';

export const TOOL_VERSIONS_FILE = '.tool-versions';

/**
 * Parses `.tool-versions` content: one `plugin version [version...]` line
 * per tool, `#` starting a comment. A repeated plugin adds to its list.
 */
export function parseToolVersions(content: string, filePath: string): ToolVersionList[] {
  const lists = new Map<string, ToolVersionList>();

  for (const rawLine of content.split(/\r?\n/)) {
    const hash = rawLine.indexOf('#');
    const line = (hash === -1 ? rawLine : rawLine.slice(0, hash)).trim();
    if (!line) {
      continue;
    }

    const [pluginName, ...versions] = line.split(/\s+/);
    if (pluginName === undefined || versions.length === 0) {
      continue;
    }

    let list = lists.get(pluginName);
    if (!list) {
      list = new ToolVersionList(pluginName, { type: 'tool-versions', path: filePath });
      lists.set(pluginName, list);
    }
    for (const version of versions) {
      list.addRequest(parseToolVersionRequest(pluginName, version));
    }
  }

  return [...lists.values()];
}

export async function loadToolVersions(filePath: string): Promise<ToolVersionList[]> {
  try {
    const content = await fs.readFile(filePath, 'utf8');
    return parseToolVersions(content, filePath);
  } catch (error) {
    throw new Error(`Failed to read ${filePath}: ${errorMessage(error)}`, { cause: error });
  }
}

export interface LegacyVersionFile {
  pluginName: string;
  path: string;
}

/** The version files of the nearest project directory. */
export interface VersionFiles {
  dir: string;
  toolVersions: string | null;
  legacy: LegacyVersionFile[];
}

/**
 * Walks up from `dir` to the first directory holding a `.tool-versions` or
 * one of the legacy files in `legacyFilenames` (plugin name to file names,
 * first name wins). Returns null when no directory has either.
 */
export async function findVersionFiles(
  dir: string,
  legacyFilenames: ReadonlyMap<string, string[]> = new Map()
): Promise<VersionFiles | null> {
  let current = path.resolve(dir);
  for (;;) {
    const candidate = path.join(current, TOOL_VERSIONS_FILE);
    const toolVersions = (await fs.pathExists(candidate)) ? candidate : null;

    const legacy: LegacyVersionFile[] = [];
    for (const [pluginName, filenames] of legacyFilenames) {
      for (const filename of filenames) {
        const legacyPath = path.join(current, filename);
        if (await fs.pathExists(legacyPath)) {
          legacy.push({ pluginName, path: legacyPath });
          break;
        }
      }
    }

    if (toolVersions !== null || legacy.length > 0) {
      return { dir: current, toolVersions, legacy };
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return null;
    }
    current = parent;
  }
}
