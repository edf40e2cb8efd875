import nodeFs from 'node:fs/promises';
import path from 'node:path';
import { randomUUID } from 'node:crypto';
import type { Dirent } from 'node:fs';
import type { FileHandle } from 'node:fs/promises';
import {
  CancelledError,
  FileReadError,
  PreconditionError,
  errorMessage,
  eventMeta,
  extensionOf,
  logger as defaultLogger,
  relative,
} from '@codepack/shared';
import type { Logger } from '@codepack/shared';
import { createPackConfig } from '../config';
import type { PackConfig } from '../config';
import { loadIgnoreRules, shouldIgnore } from '../ignore';
import type { IgnoreRuleSet } from '../ignore';
import { countCharacters, formatEntry } from './format';
import type { PackOptions, PackResult, PackerFs } from './types';

type EntryKind = 'directory' | 'file' | 'other';

interface WalkContext {
  readonly runId: string;
  readonly root: string;
  readonly outputPath: string;
  readonly sideArtifactPaths: ReadonlySet<string>;
  readonly rules: IgnoreRuleSet;
  readonly handle: FileHandle;
  readonly signal?: AbortSignal;
  fileCount: number;
  totalChars: number;
  readonly files: string[];
  readonly skipped: FileReadError[];
  readonly warnings: string[];
}

/**
 * Walks a project tree and appends every eligible file to a single Markdown artifact.
 *
 * Directories are pruned before descent, so nothing below an ignored directory is
 * visited. Files are written as they are read; the artifact is never buffered whole.
 */
export class TreePacker {
  constructor(
    private readonly config: PackConfig = createPackConfig(),
    private readonly logger: Logger = defaultLogger,
    private readonly fs: PackerFs = nodeFs,
  ) {}

  async pack(rootPath: string, options: PackOptions): Promise<PackResult> {
    const root = path.resolve(rootPath);
    const outputPath = path.resolve(options.outputPath);
    const runId = options.runId ?? randomUUID();

    await this.assertReadableDirectory(root);
    this.throwIfCancelled(options.signal);

    await this.logger.info(`Scanning project at: ${root}...`);

    const { rules, gitignoreFound, warnings } = await loadIgnoreRules(root, this.config, this.fs);
    for (const warning of warnings) {
      await this.logger.warn(`Warning: ${warning}`);
    }
    if (this.config.useGitignore && !gitignoreFound && warnings.length === 0) {
      await this.logger.debug('No .gitignore found; using default ignore rules only.');
    }

    const handle = await this.fs.open(outputPath, 'w');
    const ctx: WalkContext = {
      runId,
      root,
      outputPath,
      sideArtifactPaths: new Set((options.sideArtifactPaths ?? []).map((p) => path.resolve(p))),
      rules,
      handle,
      signal: options.signal,
      fileCount: 0,
      totalChars: 0,
      files: [],
      skipped: [],
      warnings,
    };

    try {
      await handle.write(this.config.preamble);
      await this.logger.log({
        ...eventMeta(runId),
        type: 'PackStarted',
        payload: { rootPath: root, outputPath, patternCount: rules.patterns.length },
      });
      await this.walk(root, ctx);
    } catch (error) {
      if (error instanceof CancelledError) {
        await this.logger.log({
          ...eventMeta(runId),
          type: 'PackCancelled',
          payload: { fileCount: ctx.fileCount },
        });
      }
      throw error;
    } finally {
      await handle.close();
    }

    if (ctx.fileCount === 0) {
      await this.fs.unlink(outputPath);
    }

    await this.logger.log({
      ...eventMeta(runId),
      type: 'PackCompleted',
      payload: {
        fileCount: ctx.fileCount,
        totalChars: ctx.totalChars,
        skippedCount: ctx.skipped.length,
      },
    });

    return {
      status: ctx.fileCount > 0 ? 'packed' : 'empty',
      runId,
      rootPath: root,
      outputPath,
      fileCount: ctx.fileCount,
      totalChars: ctx.totalChars,
      files: ctx.files,
      skipped: ctx.skipped,
      warnings: ctx.warnings,
    };
  }

  private async assertReadableDirectory(root: string): Promise<void> {
    let isDirectory: boolean;
    try {
      isDirectory = (await this.fs.stat(root)).isDirectory();
    } catch (error) {
      throw new PreconditionError(`The path '${root}' is not a valid directory.`, {
        cause: error,
        details: { rootPath: root },
      });
    }
    if (!isDirectory) {
      throw new PreconditionError(`The path '${root}' is not a valid directory.`, {
        details: { rootPath: root },
      });
    }

    try {
      await this.fs.readdir(root, { withFileTypes: true });
    } catch (error) {
      throw new PreconditionError(`The directory '${root}' cannot be read: ${errorMessage(error)}`, {
        cause: error,
        details: { rootPath: root },
      });
    }
  }

  /**
   * Files of a directory are packed before its subdirectories are descended,
   * both in name order.
   */
  private async walk(dir: string, ctx: WalkContext): Promise<void> {
    this.throwIfCancelled(ctx.signal);

    let entries: Dirent[];
    try {
      entries = await this.fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      const relativeDir = relative(ctx.root, dir);
      ctx.warnings.push(`Could not read directory ${relativeDir}: ${errorMessage(error)}`);
      await this.logger.warn(`  Skipped (Read Error): ${relativeDir}/ - ${errorMessage(error)}`);
      return;
    }
    entries.sort((a, b) => a.name.localeCompare(b.name));

    const files: string[] = [];
    const subdirectories: string[] = [];

    for (const entry of entries) {
      const absPath = path.join(dir, entry.name);
      const kind = await this.kindOf(entry, absPath);

      if (kind === 'directory') {
        if (shouldIgnore(absPath, ctx.root, ctx.rules, { isDirectory: true })) {
          await this.logger.debug(`  Pruned: ${relative(ctx.root, absPath)}/`);
        } else {
          subdirectories.push(absPath);
        }
      } else if (kind === 'file') {
        files.push(absPath);
      }
    }

    for (const file of files) {
      await this.packFile(file, ctx);
    }

    for (const subdirectory of subdirectories) {
      await this.walk(subdirectory, ctx);
    }
  }

  private async packFile(absPath: string, ctx: WalkContext): Promise<void> {
    this.throwIfCancelled(ctx.signal);

    const name = path.basename(absPath);
    if (
      this.config.reservedNames.has(name) ||
      absPath === ctx.outputPath ||
      ctx.sideArtifactPaths.has(absPath)
    ) {
      return;
    }
    if (shouldIgnore(absPath, ctx.root, ctx.rules, { isDirectory: false })) {
      return;
    }
    if (!this.config.extensions.has(extensionOf(name))) {
      return;
    }

    const relativePath = relative(ctx.root, absPath);
    let content: string;
    try {
      content = await this.fs.readFile(absPath, 'utf8');
    } catch (error) {
      const failure = new FileReadError(relativePath, errorMessage(error), { cause: error });
      ctx.skipped.push(failure);
      await this.logger.warn(`  Skipped (Read Error): ${relativePath} - ${failure.message}`);
      await this.logger.log({
        ...eventMeta(ctx.runId),
        type: 'FileSkipped',
        payload: { path: relativePath, reason: failure.message },
      });
      return;
    }

    await ctx.handle.write(formatEntry({ relativePath, content }));

    const chars = countCharacters(content);
    ctx.fileCount += 1;
    ctx.totalChars += chars;
    ctx.files.push(relativePath);

    await this.logger.info(`  Packed: ${relativePath}`);
    await this.logger.log({
      ...eventMeta(ctx.runId),
      type: 'FilePacked',
      payload: { path: relativePath, chars },
    });
  }

  /**
   * Symbolic links are resolved: links to files are packed like files, links to
   * directories are never descended.
   */
  private async kindOf(entry: Dirent, absPath: string): Promise<EntryKind> {
    if (entry.isDirectory()) return 'directory';
    if (entry.isFile()) return 'file';
    if (!entry.isSymbolicLink()) return 'other';

    try {
      const target = await this.fs.stat(absPath);
      return target.isFile() ? 'file' : 'other';
    } catch {
      // dangling link
      return 'other';
    }
  }

  private throwIfCancelled(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      throw new CancelledError();
    }
  }
}
