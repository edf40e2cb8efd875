import path from 'node:path';
import { statSync } from 'node:fs';
import { relative } from '@codepack/shared';
import { matchesPattern } from './rules';
import type { IgnoreRuleSet } from './rules';

export interface IgnoreCheckOptions {
  /**
   * Whether the candidate is a directory. When omitted and a directory-only
   * pattern needs it, the path is stat'ed.
   */
  isDirectory?: boolean;
}

/**
 * Decides whether a file or directory is excluded. First match wins:
 *
 * 1. exact basename in the default name set
 * 2. basename against the default wildcards
 * 3. each loaded pattern, in order, against the root-relative path and the basename;
 *    patterns ending in `/` only match directories, and `*` spans `/`
 */
export function shouldIgnore(
  candidatePath: string,
  rootPath: string,
  rules: IgnoreRuleSet,
  options: IgnoreCheckOptions = {},
): boolean {
  const name = path.basename(candidatePath);

  if (rules.names.has(name)) {
    return true;
  }

  if (rules.globs.some((glob) => matchesPattern(glob, name))) {
    return true;
  }

  if (rules.patterns.length === 0) {
    return false;
  }

  const relativePath = relative(rootPath, candidatePath);
  let isDirectory = options.isDirectory;

  for (const pattern of rules.patterns) {
    if (pattern.directoryOnly) {
      isDirectory ??= isDirectoryPath(candidatePath);
      if (isDirectory && (matchesPattern(pattern, relativePath) || matchesPattern(pattern, name))) {
        return true;
      }
      continue;
    }

    if (matchesPattern(pattern, relativePath) || matchesPattern(pattern, name)) {
      return true;
    }
  }

  return false;
}

function isDirectoryPath(candidatePath: string): boolean {
  try {
    return statSync(candidatePath).isDirectory();
  } catch {
    return false;
  }
}
