import path from 'path';
import { ROOT_ENV_VAR } from '@codepack/shared';

export interface RootSources {
  /** Positional `[path]` argument */
  positional?: string;
  /** `--path` / `-p` */
  flag?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Picks the traversal root: positional argument, then `--path`, then the
 * `CONTEXT_ROOT` environment variable, then the working directory. Empty values
 * are skipped. The result is absolute.
 */
export function resolveRootPath(sources: RootSources = {}): string {
  const cwd = sources.cwd ?? process.cwd();
  const env = sources.env ?? process.env;

  const chosen = [sources.positional, sources.flag, env[ROOT_ENV_VAR]].find(
    (candidate): candidate is string => candidate !== undefined && candidate.trim() !== '',
  );

  return path.resolve(cwd, chosen ?? '.');
}
