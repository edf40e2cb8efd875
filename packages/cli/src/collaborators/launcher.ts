import path from 'path';
import execa from 'execa';
import which from 'which';
import { CollaboratorError, errorMessage } from '@codepack/shared';

export interface RunOptions {
  /** Text written to the command's stdin */
  input?: string;
  /** Detach and return once the process has started */
  background?: boolean;
  /** Pass arguments to Windows without quoting */
  verbatim?: boolean;
}

/** Resolves a command to its full path, or null when it is not installed. */
export type CommandLookup = (command: string) => Promise<string | null>;

export type CommandRunner = (file: string, args: string[], options?: RunOptions) => Promise<void>;

interface Invocation {
  command: string;
  args: string[];
  verbatim?: boolean;
}

/**
 * The desktop integrations used after a successful pack. Every method throws
 * CollaboratorError when the integration is unavailable or fails.
 */
export interface Collaborators {
  copyToClipboard(text: string): Promise<void>;
  openUrl(url: string): Promise<void>;
  revealFile(filePath: string): Promise<void>;
}

export interface SystemCollaboratorsOptions {
  lookup?: CommandLookup;
  runner?: CommandRunner;
  platform?: NodeJS.Platform;
}

const LINUX_CLIPBOARDS: Invocation[] = [
  { command: 'wl-copy', args: [] },
  { command: 'xclip', args: ['-selection', 'clipboard'] },
  { command: 'xsel', args: ['--clipboard', '--input'] },
];

export const lookupCommand: CommandLookup = async (command) => {
  try {
    return await which(command);
  } catch {
    return null;
  }
};

export const runCommand: CommandRunner = async (file, args, options = {}) => {
  if (options.background) {
    const child = execa(file, args, {
      detached: true,
      stdio: 'ignore',
      reject: false,
      windowsVerbatimArguments: options.verbatim,
    });
    await new Promise<void>((resolve, reject) => {
      child.once('spawn', () => resolve());
      child.once('error', reject);
    });
    child.unref();
    return;
  }

  // xclip keeps a forked child holding its output streams, so they are not piped
  await execa(file, args, {
    input: options.input,
    stdout: 'ignore',
    stderr: 'ignore',
    windowsVerbatimArguments: options.verbatim,
  });
};

export class SystemCollaborators implements Collaborators {
  private readonly lookup: CommandLookup;
  private readonly runner: CommandRunner;
  private readonly platform: NodeJS.Platform;

  constructor(options: SystemCollaboratorsOptions = {}) {
    this.lookup = options.lookup ?? lookupCommand;
    this.runner = options.runner ?? runCommand;
    this.platform = options.platform ?? process.platform;
  }

  async copyToClipboard(text: string): Promise<void> {
    const candidates = this.clipboardCandidates();
    for (const candidate of candidates) {
      if ((await this.lookup(candidate.command)) !== null) {
        await this.invoke('clipboard', candidate, { input: text });
        return;
      }
    }
    throw new CollaboratorError(
      'clipboard',
      `No clipboard utility found (tried ${candidates.map((c) => c.command).join(', ')}).`,
    );
  }

  async openUrl(url: string): Promise<void> {
    await this.launch('browser', this.openerFor(url));
  }

  async revealFile(filePath: string): Promise<void> {
    if (this.platform === 'win32') {
      await this.launch('file manager', {
        command: 'explorer',
        args: [`/select,"${filePath}"`],
        verbatim: true,
      });
      return;
    }
    await this.launch('file manager', this.openerFor(path.dirname(filePath)));
  }

  private clipboardCandidates(): Invocation[] {
    switch (this.platform) {
      case 'darwin':
        return [{ command: 'pbcopy', args: [] }];
      case 'win32':
        return [{ command: 'clip', args: [] }];
      default:
        return LINUX_CLIPBOARDS;
    }
  }

  private openerFor(target: string): Invocation {
    switch (this.platform) {
      case 'darwin':
        return { command: 'open', args: [target] };
      case 'win32':
        // `start` takes the first quoted argument as a window title; `&` must be escaped for cmd
        return {
          command: 'cmd',
          args: ['/c', 'start', '""', target.replace(/&/g, '^&')],
          verbatim: true,
        };
      default:
        return { command: 'xdg-open', args: [target] };
    }
  }

  private async launch(collaborator: string, invocation: Invocation): Promise<void> {
    if ((await this.lookup(invocation.command)) === null) {
      throw new CollaboratorError(collaborator, `'${invocation.command}' was not found in PATH.`);
    }
    await this.invoke(collaborator, invocation, { background: true });
  }

  private async invoke(
    collaborator: string,
    invocation: Invocation,
    options: RunOptions,
  ): Promise<void> {
    try {
      await this.runner(invocation.command, invocation.args, {
        ...options,
        verbatim: invocation.verbatim,
      });
    } catch (error) {
      throw new CollaboratorError(
        collaborator,
        `'${invocation.command}' failed: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }
}
