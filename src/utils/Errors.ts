/**
 * A backend script exited non-zero, or produced output that could not be
 * interpreted.
 */
export class ScriptExecutionError extends Error {
  readonly scriptPath: string;
  readonly exitCode: number;
  readonly stderr: string;

  constructor(scriptPath: string, exitCode: number, stderr: string, detail?: string) {
    const reason = detail ?? `exited with code ${exitCode}`;
    super(`error running ${scriptPath}: ${reason}${stderr ? `\n${stderr}` : ''}`);
    this.name = 'ScriptExecutionError';
    this.scriptPath = scriptPath;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class UnsupportedOperationError extends Error {
  readonly plugin: string;
  readonly operation: string;

  constructor(plugin: string, operation: string) {
    super(`Plugin ${plugin} does not support ${operation}`);
    this.name = 'UnsupportedOperationError';
    this.plugin = plugin;
    this.operation = operation;
  }
}

export class PluginNotInstalledError extends Error {
  readonly plugin: string;

  constructor(plugin: string) {
    super(`Plugin ${plugin} is not installed`);
    this.name = 'PluginNotInstalledError';
    this.plugin = plugin;
  }
}

export class VersionParseError extends Error {
  readonly input: string;

  constructor(input: string, reason: string) {
    super(`Invalid version "${input}": ${reason}`);
    this.name = 'VersionParseError';
    this.input = input;
  }
}

export class VersionNotFoundError extends Error {
  constructor(plugin: string, query: string) {
    super(`No version of ${plugin} matches ${query}`);
    this.name = 'VersionNotFoundError';
  }
}

export const DEBUG_HINT = 'Run with POLYVER_DEBUG=1 for more information.';

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Renders an error and every `cause` below it, one "Caused by" line each.
 */
export function formatErrorChain(error: unknown): string {
  const lines = [errorMessage(error)];
  let current: unknown = error instanceof Error ? error.cause : undefined;
  let depth = 0;

  while (current !== undefined && depth < 10) {
    lines.push(`  Caused by: ${errorMessage(current)}`);
    current = current instanceof Error ? current.cause : undefined;
    depth++;
  }

  return lines.join('\n');
}
