import { VersionParseError } from './Errors';

export type VersionChunk = number | string;

const UNSTABLE_VERSION_PATTERN =
  /(^Available versions:|-src|-dev|-latest|-stm|[-.]rc|-milestone|-alpha|-beta|[-.]pre|-next|(a|b|c)[0-9]+|snapshot|master)/i;

/**
 * Splits a version into dot/hyphen delimited chunks. Purely numeric chunks
 * become numbers so they compare numerically.
 */
export function parseVersionChunks(version: string): VersionChunk[] {
  return version
    .split(/[.-]/)
    .filter(chunk => chunk.length > 0)
    .map(chunk => (/^\d+$/.test(chunk) ? parseInt(chunk, 10) : chunk));
}

function compareChunks(a: VersionChunk, b: VersionChunk): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  if (typeof a === 'number') return 1;
  if (typeof b === 'number') return -1;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Orders versions chunk by chunk, so "9.2" sorts before "10.1". A numeric
 * chunk sorts after a textual one ("1.0.0" after "1.0.rc1"); when one version
 * is a prefix of the other the shorter one comes first.
 */
export function compareVersions(a: string, b: string): number {
  const left = parseVersionChunks(a);
  const right = parseVersionChunks(b);
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const result = compareChunks(left[i], right[i]);
    if (result !== 0) {
      return result;
    }
  }

  if (left.length !== right.length) {
    return left.length - right.length;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

export function sortVersions(versions: string[]): string[] {
  return [...versions].sort(compareVersions);
}

export function isUnstableVersion(version: string): boolean {
  return UNSTABLE_VERSION_PATTERN.test(version);
}

/**
 * Whether `candidate` satisfies `query`: an exact hit, or a stable version
 * that continues `query` with a "." or "-" separated suffix. `latest`
 * matches every stable version that starts with a digit.
 */
export function fuzzyMatches(candidate: string, query: string): boolean {
  if (candidate === query) {
    return true;
  }
  if (isUnstableVersion(candidate)) {
    return false;
  }
  if (query === 'latest') {
    return /^[0-9]/.test(candidate);
  }
  if (!candidate.startsWith(query)) {
    return false;
  }
  const rest = candidate.slice(query.length);
  return rest.length === 0 || (/^[-.]/.test(rest) && rest.length > 1);
}

export function fuzzyMatchFilter(versions: string[], query: string): string[] {
  return versions.filter(version => fuzzyMatches(version, query));
}

function parseNumericVersion(version: string): number[] {
  const chunks = version.split('.');
  if (version.length === 0 || chunks.some(chunk => !/^\d+$/.test(chunk))) {
    throw new VersionParseError(version, 'expected dot-separated numbers');
  }
  return chunks.map(chunk => parseInt(chunk, 10));
}

/**
 * Subtracts `sub` from `orig` component-wise, keeping only as many
 * components as `sub` has.
 *
 * @example versionSub('18.2.3', '2') === '16'
 * @example versionSub('18.2.3', '0.1') === '18.1'
 */
export function versionSub(orig: string, sub: string): string {
  const wanted = parseNumericVersion(orig).slice(0, parseNumericVersion(sub).length);
  const minus = parseNumericVersion(sub);

  const result = wanted.map((chunk, i) => {
    const value = chunk - (minus[i] ?? 0);
    if (value < 0) {
      throw new VersionParseError(`${orig}!-${sub}`, 'subtraction goes below zero');
    }
    return value;
  });

  return result.join('.');
}
