/**
 * CMake descriptor helpers: locating top-level commands and synthesizing the
 * reduced descriptor used for the configure-only pass.
 */

import { FILE_PATTERNS } from '../../constants/index.js';
import { RecipeValidationError } from '../../utils/errors.js';

export interface CMakeCommand {
  /** Command name as written */
  name: string;
  /** Full invocation text, from the name through the closing paren */
  text: string;
  /** Text between the parens */
  args: string;
}

export interface MinimalDescriptor {
  fileName: string;
  content: string;
}

const DEFAULT_MINIMUM_REQUIRED = 'cmake_minimum_required(VERSION 3.20)';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Index of the paren closing the one at `openIndex`, or -1.
 * Quoted arguments and `#` comments do not count.
 */
function findClosingParen(content: string, openIndex: number): number {
  let depth = 0;
  let inQuote = false;
  for (let i = openIndex; i < content.length; i++) {
    const char = content[i];
    if (inQuote) {
      if (char === '\\') {
        i++;
      } else if (char === '"') {
        inQuote = false;
      }
      continue;
    }
    if (char === '"') {
      inQuote = true;
    } else if (char === '#') {
      const newline = content.indexOf('\n', i);
      if (newline === -1) {
        return -1;
      }
      i = newline;
    } else if (char === '(') {
      depth++;
    } else if (char === ')') {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

/**
 * Find the first invocation of a command that starts a line. Command names
 * are case-insensitive in CMake.
 */
export function findCommand(content: string, commandName: string): CMakeCommand | null {
  const pattern = new RegExp(`^[ \\t]*(${escapeRegExp(commandName)})[ \\t]*\\(`, 'im');
  const match = pattern.exec(content);
  if (!match) {
    return null;
  }

  const nameStart = match.index + match[0].indexOf(match[1]);
  const openIndex = match.index + match[0].length - 1;
  const closeIndex = findClosingParen(content, openIndex);
  if (closeIndex === -1) {
    throw new RecipeValidationError(`unterminated ${commandName}() command in ${FILE_PATTERNS.DESCRIPTOR}`);
  }
  return {
    name: match[1],
    text: content.slice(nameStart, closeIndex + 1),
    args: content.slice(openIndex + 1, closeIndex)
  };
}

function unquote(token: string): string {
  return token.length >= 2 && token.startsWith('"') && token.endsWith('"') ? token.slice(1, -1) : token;
}

/**
 * First argument of `project(...)`.
 */
export function parseProjectName(projectCommand: CMakeCommand): string | null {
  const first = projectCommand.args.trim().split(/\s+/)[0];
  return first ? unquote(first) : null;
}

/**
 * Value following a keyword inside a command, e.g. DESCRIPTION "...".
 */
export function readKeywordArgument(command: CMakeCommand, keyword: string): string | undefined {
  const match = new RegExp(`(?:^|\\s)${escapeRegExp(keyword)}\\s+("(?:[^"\\\\]|\\\\.)*"|[^\\s)]+)`).exec(command.args);
  return match ? unquote(match[1]) : undefined;
}

/**
 * Build the reduced descriptor: the original minimum-version and project
 * commands, then only the configuration subdirectory.
 */
export function synthesizeMinimalDescriptor(
  originalContent: string,
  configSubdirectory: string
): MinimalDescriptor {
  const project = findCommand(originalContent, 'project');
  if (!project) {
    throw new RecipeValidationError(
      `${FILE_PATTERNS.DESCRIPTOR} has no project() command; cannot synthesize a configure-only descriptor`
    );
  }
  const minimumRequired = findCommand(originalContent, 'cmake_minimum_required');

  const content = [
    '# Generated by hdrpack for a configure-only pass; replaced by the original afterwards.',
    minimumRequired ? minimumRequired.text : DEFAULT_MINIMUM_REQUIRED,
    '',
    project.text,
    '',
    `add_subdirectory(${configSubdirectory})`,
    ''
  ].join('\n');

  return { fileName: FILE_PATTERNS.MINIMAL_DESCRIPTOR, content };
}
