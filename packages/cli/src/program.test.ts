import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { CollaboratorError } from '@codepack/shared';
import { DEFAULT_PREAMBLE, formatEntry } from '@codepack/packer';
import type { PackerFs } from '@codepack/packer';
import { name, run } from './program';
import { buildInstructionPrompt } from './prompt';
import type { Collaborators } from './collaborators/launcher';

describe('codepack cli', () => {
  let root: string;
  let cwd: string;
  let home: string;
  let collaborators: {
    copyToClipboard: Mock<Collaborators['copyToClipboard']>;
    openUrl: Mock<Collaborators['openUrl']>;
    revealFile: Mock<Collaborators['revealFile']>;
  };
  let logSpy: ReturnType<typeof vi.spyOn>;
  let warnSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'codepack-cli-root-'));
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), 'codepack-cli-cwd-'));
    home = await fs.mkdtemp(path.join(os.tmpdir(), 'codepack-cli-home-'));
    collaborators = {
      copyToClipboard: vi.fn<Collaborators['copyToClipboard']>(async () => {}),
      openUrl: vi.fn<Collaborators['openUrl']>(async () => {}),
      revealFile: vi.fn<Collaborators['revealFile']>(async () => {}),
    };
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'info').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
    await fs.rm(cwd, { recursive: true, force: true });
    await fs.rm(home, { recursive: true, force: true });
  });

  async function createFiles(files: Record<string, string>) {
    for (const [filePath, content] of Object.entries(files)) {
      const fullPath = path.join(root, filePath);
      await fs.mkdir(path.dirname(fullPath), { recursive: true });
      await fs.writeFile(fullPath, content);
    }
  }

  function codepack(...args: string[]) {
    return run(['node', 'codepack', ...args], { collaborators, cwd, env: {}, homeDir: home });
  }

  /** Filesystem whose first read of `a.py` behaves like Ctrl+C mid-run. */
  function interruptingFs(): PackerFs {
    return {
      stat: (p) => fs.stat(p),
      readdir: (p, options) => fs.readdir(p, options),
      readFile: async (p, encoding) => {
        if (path.basename(p) === 'a.py') {
          process.emit('SIGINT');
        }
        return fs.readFile(p, encoding);
      },
      open: (p, flags) => fs.open(p, flags),
      unlink: (p) => fs.unlink(p),
    };
  }

  function jsonOutput(): Record<string, unknown> {
    expect(logSpy).toHaveBeenCalledTimes(1);
    return JSON.parse(String(logSpy.mock.calls[0][0]));
  }

  it('exports name', () => {
    expect(name).toBe('@codepack/cli');
  });

  it('packs the project into the working directory', async () => {
    await createFiles({ 'a.py': 'print(1)', 'node_modules/x.js': 'x' });

    const code = await codepack(root, '--json');

    expect(code).toBe(0);
    expect(jsonOutput()).toMatchObject({
      status: 'packed',
      rootPath: root,
      outputPath: path.join(cwd, 'codebase_context.md'),
      fileCount: 1,
      totalChars: 8,
      files: ['a.py'],
      prompt: { path: path.join(cwd, 'prompt.txt'), status: 'Copied to clipboard!' },
      launch: { url: 'https://gemini.google.com/app', browser: true },
    });
    const artifact = await fs.readFile(path.join(cwd, 'codebase_context.md'), 'utf8');
    expect(artifact).toContain('\n## File: `a.py`\n\n```\nprint(1)\n```\n');
    expect(await fs.readFile(path.join(cwd, 'prompt.txt'), 'utf8')).toBe(
      buildInstructionPrompt('codebase_context.md'),
    );
    expect(collaborators.copyToClipboard).toHaveBeenCalledWith(
      buildInstructionPrompt('codebase_context.md'),
    );
    expect(collaborators.openUrl).toHaveBeenCalledWith('https://gemini.google.com/app');
    expect(collaborators.revealFile).toHaveBeenCalledWith(path.join(cwd, 'codebase_context.md'));
  });

  it('prints the human summary', async () => {
    await createFiles({ 'a.py': 'print(1)' });

    expect(await codepack(root)).toBe(0);

    const text = logSpy.mock.calls.map((c) => String(c[0])).join('\n');
    expect(text).toContain('Context packed into: codebase_context.md');
    expect(text).toContain(' - Files included: 1');
    expect(text).toContain(' - Approximate size: 0.00 MB');
  });

  it('takes the root from --path and from CONTEXT_ROOT', async () => {
    await createFiles({ 'a.py': 'a' });

    expect(await codepack('--path', root, '--json')).toBe(0);
    expect(jsonOutput()).toMatchObject({ rootPath: root, files: ['a.py'] });

    logSpy.mockClear();
    const code = await run(['node', 'codepack', '--json'], {
      collaborators,
      cwd,
      env: { CONTEXT_ROOT: root },
      homeDir: home,
    });
    expect(code).toBe(0);
    expect(jsonOutput()).toMatchObject({ rootPath: root, files: ['a.py'] });
  });

  it('skips the collaborators when asked to', async () => {
    await createFiles({ 'a.py': 'a' });

    expect(await codepack(root, '--json', '--no-open', '--no-clipboard')).toBe(0);

    expect(jsonOutput()).toMatchObject({
      prompt: { status: 'Saved to prompt.txt.' },
      launch: { browser: false },
    });
    expect(collaborators.copyToClipboard).not.toHaveBeenCalled();
    expect(collaborators.openUrl).not.toHaveBeenCalled();
    expect(collaborators.revealFile).not.toHaveBeenCalled();
  });

  it('reports collaborator failures without failing the run', async () => {
    await createFiles({ 'a.py': 'a' });
    collaborators.copyToClipboard.mockRejectedValueOnce(
      new CollaboratorError('clipboard', 'No clipboard utility found (tried pbcopy).'),
    );
    collaborators.openUrl.mockRejectedValueOnce(
      new CollaboratorError('browser', "'xdg-open' was not found in PATH."),
    );

    expect(await codepack(root, '--json')).toBe(0);

    expect(jsonOutput()).toMatchObject({
      prompt: { status: 'Could not copy to clipboard. Saved to prompt.txt.' },
    });
    expect(warnSpy).toHaveBeenCalledWith(
      'Could not copy to clipboard: No clipboard utility found (tried pbcopy).',
    );
    expect(warnSpy).toHaveBeenCalledWith(
      "Could not open browser: 'xdg-open' was not found in PATH.",
    );
    expect(collaborators.revealFile).toHaveBeenCalledTimes(1);
  });

  it('leaves nothing behind when no file matches', async () => {
    await createFiles({ 'image.png': 'png' });

    expect(await codepack(root)).toBe(0);

    expect(logSpy).toHaveBeenCalledWith('No matching files found to pack.');
    await expect(fs.access(path.join(cwd, 'codebase_context.md'))).rejects.toThrow();
    await expect(fs.access(path.join(cwd, 'prompt.txt'))).rejects.toThrow();
    expect(collaborators.copyToClipboard).not.toHaveBeenCalled();
    expect(collaborators.openUrl).not.toHaveBeenCalled();
  });

  it('applies the project config file', async () => {
    await createFiles({
      '.codepack.yaml': "extensions: ['.md']\noutput:\n  filename: context.md\n",
      'a.py': 'a',
      'b.md': 'b',
    });

    expect(await codepack(root, '--json')).toBe(0);

    expect(jsonOutput()).toMatchObject({
      outputPath: path.join(cwd, 'context.md'),
      files: ['b.md'],
    });
  });

  it('appends events to a JSONL file', async () => {
    await createFiles({ 'a.py': 'a' });

    expect(await codepack(root, '--json', '--events', 'events.jsonl')).toBe(0);

    const lines = (await fs.readFile(path.join(cwd, 'events.jsonl'), 'utf8')).trim().split('\n');
    expect(lines.map((line) => JSON.parse(line).type)).toEqual([
      'PackStarted',
      'FilePacked',
      'PackCompleted',
    ]);
  });

  it('packs a nested prompt.txt but not its own prompt file', async () => {
    await createFiles({ 'a.py': 'a', 'src/prompts/prompt.txt': 'system prompt' });
    const inRoot = () =>
      run(['node', 'codepack', '--json'], { collaborators, cwd: root, env: {}, homeDir: home });

    expect(await inRoot()).toBe(0);
    logSpy.mockClear();
    expect(await inRoot()).toBe(0);

    expect(jsonOutput()).toMatchObject({ files: ['a.py', 'src/prompts/prompt.txt'] });
  });

  it('exits with 130 on SIGINT and keeps the partial artifact', async () => {
    await createFiles({ 'a.py': 'print(1)', 'b.py': 'print(2)' });
    const listenersBefore = process.listenerCount('SIGINT');

    const code = await run(['node', 'codepack', root], {
      collaborators,
      packerFs: interruptingFs(),
      cwd,
      env: {},
      homeDir: home,
    });

    expect(code).toBe(130);
    expect(await fs.readFile(path.join(cwd, 'codebase_context.md'), 'utf8')).toBe(
      DEFAULT_PREAMBLE + formatEntry({ relativePath: 'a.py', content: 'print(1)' }),
    );
    expect(errorSpy).toHaveBeenCalledWith('\nOperation cancelled.');
    expect(process.listenerCount('SIGINT')).toBe(listenersBefore);
    expect(collaborators.copyToClipboard).not.toHaveBeenCalled();
    await expect(fs.access(path.join(cwd, 'prompt.txt'))).rejects.toThrow();
  });

  it('reports cancellation as its own JSON shape', async () => {
    await createFiles({ 'a.py': 'print(1)', 'b.py': 'print(2)' });

    const code = await run(['node', 'codepack', root, '--json'], {
      collaborators,
      packerFs: interruptingFs(),
      cwd,
      env: {},
      homeDir: home,
    });

    expect(code).toBe(130);
    expect(jsonOutput()).toEqual({ cancelled: true, message: 'Operation cancelled.' });
  });

  it('prints human errors to stderr with the verbose hint', async () => {
    const missing = path.join(root, 'missing');

    expect(await codepack(missing)).toBe(2);

    expect(errorSpy).toHaveBeenCalledWith(
      `❌ Error: The path '${missing}' is not a valid directory.`,
    );
    expect(errorSpy).toHaveBeenLastCalledWith('\nFor more details, run with the --verbose flag.');
  });

  it('exits with 2 when the root is not a directory', async () => {
    const missing = path.join(root, 'missing');

    expect(await codepack(missing, '--json')).toBe(2);

    expect(jsonOutput()).toEqual({
      error: {
        code: 'PreconditionError',
        message: `The path '${missing}' is not a valid directory.`,
        details: { rootPath: missing },
      },
    });
  });

  it('exits with 2 on an invalid config file', async () => {
    const configPath = path.join(cwd, 'bad.yaml');
    await fs.writeFile(configPath, 'gitignore: maybe\n');

    expect(await codepack(root, '--json', '--config', 'bad.yaml')).toBe(2);

    expect(jsonOutput()).toMatchObject({ error: { code: 'ConfigError' } });
  });

  it('exits with 0 for --version', async () => {
    const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    expect(await codepack('--version')).toBe(0);

    expect(stdout).toHaveBeenCalledWith('0.1.0\n');
  });

  it('exits with 2 on an unknown option', async () => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    expect(await codepack('--bogus')).toBe(2);
  });
});
