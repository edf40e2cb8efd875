import { describe, it, expect, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import { join } from 'path';
import * as os from 'os';
import { JsonlLogger } from './jsonlLogger';
import { ConsoleLogger } from './consoleLogger';
import type { PackCompleted, PackStarted } from '../types/events';

const started: PackStarted = {
  schemaVersion: 1,
  timestamp: '2023-01-01T00:00:00Z',
  runId: 'run-1',
  type: 'PackStarted',
  payload: { rootPath: '/repo', outputPath: '/out/codebase_context.md', patternCount: 2 },
};

const completed: PackCompleted = {
  schemaVersion: 1,
  timestamp: '2023-01-01T00:00:01Z',
  runId: 'run-1',
  type: 'PackCompleted',
  payload: { fileCount: 3, totalChars: 120, skippedCount: 0 },
};

describe('JsonlLogger', () => {
  let tmpDir: string;

  afterEach(async () => {
    vi.restoreAllMocks();
    if (tmpDir) {
      await fs.rm(tmpDir, { recursive: true, force: true });
    }
  });

  it('logs events to file in JSONL format', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'codepack-logger-test-'));
    const logPath = join(tmpDir, 'events.jsonl');
    const logger = new JsonlLogger(logPath);

    await logger.log(started);

    const content = await fs.readFile(logPath, 'utf8');
    expect(content.trim()).toBe(JSON.stringify(started));
  });

  it('appends multiple events', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'codepack-logger-test-'));
    const logPath = join(tmpDir, 'events.jsonl');
    const logger = new JsonlLogger(logPath);

    await logger.log(started);
    await logger.log(completed);

    const content = await fs.readFile(logPath, 'utf8');
    const lines = content.trim().split('\n');
    expect(lines.length).toBe(2);
    expect(JSON.parse(lines[0])).toEqual(started);
    expect(JSON.parse(lines[1])).toEqual(completed);
  });

  it('delegates human-readable lines to the base logger', () => {
    const base = new ConsoleLogger({ verbose: true });
    const debugSpy = vi.spyOn(base, 'debug');
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});

    const logger = new JsonlLogger('/dev/null', base);
    logger.debug('d');
    logger.warn('w');
    logger.error('e');

    expect(debugSpy).toHaveBeenCalledWith('d');
    expect(warnSpy).toHaveBeenCalledWith('w');
    expect(errorSpy).toHaveBeenCalledWith('e');
  });

  it('does not throw if appending to the file fails', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'codepack-logger-test-'));
    // Use a directory path so appendFile fails deterministically (EISDIR).
    const logPath = tmpDir;
    const logger = new JsonlLogger(logPath);

    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    await expect(logger.log(started)).resolves.toBeUndefined();

    expect(warnSpy).toHaveBeenCalledWith(
      expect.stringContaining(`Failed to write to event log at ${logPath}`),
    );
  });
});
