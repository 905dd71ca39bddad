/**
 * Version resolution from the build-configuration descriptor.
 *
 * A version directive is the token `VERSION`, at least one whitespace
 * character, then `MAJOR.MINOR.PATCH` made of unsigned decimal groups. Any
 * text after the third group (a fourth `.N` group, a closing paren) is ignored.
 */

import { UNRESOLVED_VERSION } from '../../constants/index.js';
import { UnresolvedVersionError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const VERSION_TOKEN = 'VERSION';

export type VersionParseFailure = 'no-version-token' | 'missing-separator' | 'malformed-triple';

export type VersionParseResult =
  | { ok: true; version: string; major: number; minor: number; patch: number }
  | { ok: false; reason: VersionParseFailure };

export type UnresolvedVersionPolicy = 'placeholder' | 'error';

export interface ResolveVersionOptions {
  /** Value kept when no line carries a version directive */
  placeholder?: string;
  /**
   * `placeholder` keeps the placeholder without raising; `error` throws
   * UnresolvedVersionError.
   */
  onUnresolved?: UnresolvedVersionPolicy;
  /** Used in the error message */
  sourceName?: string;
}

export interface ResolvedVersion {
  version: string;
  resolved: boolean;
  /** 1-based line of the directive that supplied the version */
  line?: number;
}

function isDigit(char: string | undefined): boolean {
  return char !== undefined && char >= '0' && char <= '9';
}

function isWhitespace(char: string | undefined): boolean {
  return char === ' ' || char === '\t' || char === '\r' || char === '\n';
}

function readDigits(text: string, start: number): number {
  let end = start;
  while (isDigit(text[end])) {
    end++;
  }
  return end;
}

function parseTripleAt(text: string, start: number): VersionParseResult {
  let cursor = start;
  if (!isWhitespace(text[cursor])) {
    return { ok: false, reason: 'missing-separator' };
  }
  while (isWhitespace(text[cursor])) {
    cursor++;
  }

  const groups: number[] = [];
  const tripleStart = cursor;
  for (let group = 0; group < 3; group++) {
    if (group > 0) {
      if (text[cursor] !== '.') {
        return { ok: false, reason: 'malformed-triple' };
      }
      cursor++;
    }
    const end = readDigits(text, cursor);
    if (end === cursor) {
      return { ok: false, reason: 'malformed-triple' };
    }
    groups.push(Number.parseInt(text.slice(cursor, end), 10));
    cursor = end;
  }

  const [major, minor, patch] = groups;
  return { ok: true, version: text.slice(tripleStart, cursor), major, minor, patch };
}

/**
 * Parse the first version directive on a single line.
 */
export function parseVersionDirective(line: string): VersionParseResult {
  let failure: VersionParseFailure = 'no-version-token';
  let index = line.indexOf(VERSION_TOKEN);

  while (index !== -1) {
    const result = parseTripleAt(line, index + VERSION_TOKEN.length);
    if (result.ok) {
      return result;
    }
    failure = result.reason;
    index = line.indexOf(VERSION_TOKEN, index + VERSION_TOKEN.length);
  }

  return { ok: false, reason: failure };
}

export function splitDescriptorLines(content: string): string[] {
  return content.split(/\r?\n/);
}

/**
 * Scan descriptor lines for the first version directive.
 *
 * Without a directive the placeholder is kept as-is unless the caller asks
 * for `onUnresolved: 'error'`.
 */
export function resolveVersion(lines: readonly string[], options: ResolveVersionOptions = {}): ResolvedVersion {
  const placeholder = options.placeholder ?? UNRESOLVED_VERSION;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (!line.includes(VERSION_TOKEN)) {
      continue;
    }
    const parsed = parseVersionDirective(line);
    if (parsed.ok) {
      logger.debug(`Resolved version ${parsed.version} from line ${i + 1}`);
      return { version: parsed.version, resolved: true, line: i + 1 };
    }
    logger.debug(`Line ${i + 1} mentions ${VERSION_TOKEN} but is not a version directive (${parsed.reason})`);
  }

  if (options.onUnresolved === 'error') {
    throw new UnresolvedVersionError(options.sourceName ?? 'descriptor');
  }

  logger.debug(`No version directive found; keeping placeholder ${placeholder}`);
  return { version: placeholder, resolved: false };
}
