import path from 'node:path';
import { Minimatch } from 'minimatch';
import type { MinimatchOptions } from 'minimatch';
import { errorMessage, isWindows } from '@codepack/shared';
import type { PackConfig } from '../config';
import type { PackerFs } from '../packer/types';

export const GITIGNORE_FILENAME = '.gitignore';

/**
 * Glob flavour shared by default wildcards and loaded patterns: `*`, `?` and
 * character classes only. No braces, extglobs or negation, and `**` is just two
 * `*` wildcards.
 */
export const GLOB_OPTIONS: MinimatchOptions = {
  dot: true,
  noglobstar: true,
  nobrace: true,
  noext: true,
  nonegate: true,
  nocomment: true,
  nocase: isWindows(),
};

/**
 * Takes the place of `/` in patterns and subjects, so that `*`, `?` and classes
 * match across directories. NUL cannot occur in a path.
 */
const SEPARATOR_STAND_IN = '\u0000';

function flattenSeparators(value: string): string {
  return value.replace(/\//g, SEPARATOR_STAND_IN);
}

export interface IgnorePattern {
  /** Pattern text as written */
  readonly source: string;
  /** Pattern ended with `/` and only applies to directories */
  readonly directoryOnly: boolean;
  /** `null` when the pattern could not be compiled; it then never matches */
  readonly matcher: Minimatch | null;
}

export interface IgnoreRuleSet {
  readonly names: ReadonlySet<string>;
  readonly globs: readonly IgnorePattern[];
  readonly patterns: readonly IgnorePattern[];
}

export interface LoadedIgnoreRules {
  rules: IgnoreRuleSet;
  /** Whether `<root>/.gitignore` was found and read */
  gitignoreFound: boolean;
  warnings: string[];
}

/**
 * Splits `.gitignore` text into patterns: trimmed, without blanks or `#` comments,
 * in file order.
 */
export function parseIgnorePatterns(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

/**
 * Compiles a single pattern. A directory-only pattern is compiled without its
 * trailing slash: matching `rel/` against `pat/` is the same as `rel` against `pat`.
 * The whole pattern is one segment, so `src/*.py` also matches `src/sub/a.py`.
 */
export function compilePattern(source: string): IgnorePattern {
  const directoryOnly = source.endsWith('/');
  const body = directoryOnly ? source.replace(/\/+$/, '') : source;
  if (body.length === 0) {
    return { source, directoryOnly, matcher: null };
  }
  try {
    return { source, directoryOnly, matcher: new Minimatch(flattenSeparators(body), GLOB_OPTIONS) };
  } catch {
    return { source, directoryOnly, matcher: null };
  }
}

/**
 * Whole-string match of a root-relative path or a basename. A pattern without a
 * matcher never matches.
 */
export function matchesPattern(pattern: IgnorePattern, subject: string): boolean {
  return pattern.matcher !== null && pattern.matcher.match(flattenSeparators(subject));
}

export function compileRules(
  names: Iterable<string>,
  globs: Iterable<string>,
  patterns: Iterable<string>,
): IgnoreRuleSet {
  return Object.freeze({
    names: new Set(names),
    globs: Object.freeze(Array.from(globs, compilePattern)),
    patterns: Object.freeze(Array.from(patterns, compilePattern)),
  });
}

/**
 * Builds the rule set for one run: the configured defaults, then `<root>/.gitignore`,
 * then configured extra patterns. A missing or unreadable `.gitignore` only
 * degrades to "no additional patterns".
 */
export async function loadIgnoreRules(
  rootPath: string,
  config: PackConfig,
  fs: Pick<PackerFs, 'readFile'>,
): Promise<LoadedIgnoreRules> {
  const warnings: string[] = [];
  let gitignorePatterns: string[] = [];
  let gitignoreFound = false;

  if (config.useGitignore) {
    try {
      const text = await fs.readFile(path.join(rootPath, GITIGNORE_FILENAME), 'utf8');
      gitignorePatterns = parseIgnorePatterns(text);
      gitignoreFound = true;
    } catch (error) {
      if (!isNotFound(error)) {
        warnings.push(`Could not read ${GITIGNORE_FILENAME}: ${errorMessage(error)}`);
      }
    }
  }

  const rules = compileRules(config.ignoreNames, config.ignoreGlobs, [
    ...gitignorePatterns,
    ...config.extraPatterns,
  ]);

  return { rules, gitignoreFound, warnings };
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
