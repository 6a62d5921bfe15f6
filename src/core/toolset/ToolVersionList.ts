import chalk from 'chalk';
import { ToolSource, ToolVersionOptions, ToolVersionRequest } from '../../types/Toolset';
import { formatErrorChain } from '../../utils/Errors';
import { logger } from '../../utils/Logger';
import type { Config } from '../Config';
import { ToolVersion } from './ToolVersion';
import { formatRequest } from './ToolVersionRequest';

export interface RequestEntry {
  request: ToolVersionRequest;
  opts: ToolVersionOptions;
}

export function describeSource(source: ToolSource): string {
  switch (source.type) {
    case 'argument':
      return 'command line';
    case 'environment':
      return `${source.key}=${source.value}`;
    case 'tool-versions':
    case 'config-file':
    case 'legacy-version-file':
      return source.path;
  }
}

/**
 * The versions of one plugin asked for by one source, e.g. the `nodejs`
 * line of a `.tool-versions` file.
 */
export class ToolVersionList {
  readonly pluginName: string;
  readonly source: ToolSource;
  readonly requests: RequestEntry[] = [];
  versions: ToolVersion[] = [];

  constructor(pluginName: string, source: ToolSource) {
    this.pluginName = pluginName;
    this.source = source;
  }

  addRequest(request: ToolVersionRequest, opts: ToolVersionOptions = {}): this {
    this.requests.push({ request, opts });
    return this;
  }

  /**
   * Resolves every request in order. A missing plugin or a request that
   * fails to resolve is logged and skipped; nothing here throws.
   */
  async resolve(config: Config, latestVersions: boolean): Promise<void> {
    this.versions = [];

    if (!config.hasTool(this.pluginName)) {
      logger.debug(`${this.pluginName}: plugin not found, ignoring ${describeSource(this.source)}`);
      return;
    }
    const tool = config.getTool(this.pluginName);
    if (!tool.isInstalled()) {
      logger.debug(`${this.pluginName}: plugin not installed, ignoring ${describeSource(this.source)}`);
      return;
    }

    for (const { request, opts } of this.requests) {
      try {
        this.versions.push(await ToolVersion.resolve(config, tool, request, opts, latestVersions));
      } catch (error) {
        logger.warn(
          `Failed to resolve ${chalk.cyan(formatRequest(request))} from ${describeSource(this.source)}: ${formatErrorChain(error)}`
        );
      }
    }
  }
}
