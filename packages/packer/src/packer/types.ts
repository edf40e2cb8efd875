import type { Dirent, Stats } from 'node:fs';
import type { FileHandle } from 'node:fs/promises';
import type { FileReadError } from '@codepack/shared';

/**
 * The filesystem calls the packer makes. `fs/promises` satisfies it; tests swap
 * single methods to simulate failures.
 */
export interface PackerFs {
  stat(path: string): Promise<Stats>;
  readdir(path: string, options: { withFileTypes: true }): Promise<Dirent[]>;
  readFile(path: string, encoding: 'utf8'): Promise<string>;
  open(path: string, flags: string): Promise<FileHandle>;
  unlink(path: string): Promise<void>;
}

export interface PackOptions {
  /** Where the aggregated document is written */
  outputPath: string;
  /** Aborting stops the run before the next directory or file */
  signal?: AbortSignal;
  /** Other files written by the caller (such as the prompt file), skipped by absolute path */
  sideArtifactPaths?: readonly string[];
  /** Correlates emitted events; generated when omitted */
  runId?: string;
}

/** One file's contribution to the artifact. Serialized immediately, never retained. */
export interface PackedFileEntry {
  relativePath: string;
  content: string;
}

export type PackStatus = 'packed' | 'empty';

export interface PackResult {
  /** `empty` when nothing was eligible; no artifact is left behind in that case */
  status: PackStatus;
  runId: string;
  rootPath: string;
  outputPath: string;
  fileCount: number;
  /** Sum of packed content lengths in characters (code points), not bytes */
  totalChars: number;
  /** Root-relative paths in the order they were written */
  files: string[];
  skipped: FileReadError[];
  warnings: string[];
}
