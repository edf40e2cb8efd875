import { DEFAULT_OUTPUT_FILENAME } from '@codepack/shared';

/** Extensions eligible for packing, matched case-insensitively. */
export const DEFAULT_EXTENSIONS = [
  '.py',
  '.js',
  '.ts',
  '.tsx',
  '.html',
  '.css',
  '.json',
  '.md',
  '.sql',
  '.go',
  '.rs',
  '.java',
  '.cpp',
  '.c',
  '.h',
  '.hpp',
  '.ino',
  '.txt',
  '.yaml',
  '.yml',
  '.toml',
  '.xml',
  '.sh',
  '.bat',
  '.env',
];

/** Directory and file names ignored wherever they appear, compared literally. */
export const DEFAULT_IGNORE_NAMES = [
  // version control and editors
  '.git',
  '.idea',
  '.vscode',
  '.gemini',
  // dependencies and virtualenvs
  'node_modules',
  'venv',
  '.venv',
  'pycache',
  '__pycache__',
  // build output
  'dist',
  'build',
  'target',
  '.next',
  '.nuxt',
  'coverage',
  'test-results',
  'playwright-report',
  // lockfiles
  'package-lock.json',
  'yarn.lock',
  'pnpm-lock.yaml',
  'bun.lockb',
  // assets
  'images',
  'assets',
  'public',
  'logs.txt',
];

/** Wildcard patterns matched against basenames. */
export const DEFAULT_IGNORE_GLOBS = ['*.log', '*.audit.json'];

export const DEFAULT_PREAMBLE = `# Codebase Context
I am providing my codebase context below in this flattened markdown file.

## Project Structure
(See file paths below)

---
`;

/**
 * Immutable settings for one pack run.
 */
export interface PackConfig {
  readonly extensions: ReadonlySet<string>;
  readonly ignoreNames: ReadonlySet<string>;
  readonly ignoreGlobs: readonly string[];
  /** Gitignore-style patterns applied after the `.gitignore` lines */
  readonly extraPatterns: readonly string[];
  readonly useGitignore: boolean;
  /** File names never packed, wherever they appear (the output artifact's name) */
  readonly reservedNames: ReadonlySet<string>;
  readonly preamble: string;
}

export interface PackConfigInput {
  extensions?: Iterable<string>;
  ignoreNames?: Iterable<string>;
  ignoreGlobs?: Iterable<string>;
  extraPatterns?: Iterable<string>;
  useGitignore?: boolean;
  reservedNames?: Iterable<string>;
  preamble?: string;
}

export function createPackConfig(input: PackConfigInput = {}): PackConfig {
  return Object.freeze({
    extensions: new Set(Array.from(input.extensions ?? DEFAULT_EXTENSIONS, (ext) => ext.toLowerCase())),
    ignoreNames: new Set(input.ignoreNames ?? DEFAULT_IGNORE_NAMES),
    ignoreGlobs: Object.freeze(Array.from(input.ignoreGlobs ?? DEFAULT_IGNORE_GLOBS)),
    extraPatterns: Object.freeze(Array.from(input.extraPatterns ?? [])),
    useGitignore: input.useGitignore ?? true,
    reservedNames: new Set(input.reservedNames ?? [DEFAULT_OUTPUT_FILENAME]),
    preamble: input.preamble ?? DEFAULT_PREAMBLE,
  });
}
