import path from 'path';
import { Command } from 'commander';
import {
  CollaboratorError,
  ConsoleLogger,
  JsonlLogger,
  atomicWrite,
} from '@codepack/shared';
import type { Config, ConfigInput, Logger } from '@codepack/shared';
import { TreePacker, createPackConfig } from '@codepack/packer';
import type { PackResult, PackerFs } from '@codepack/packer';
import { ConfigLoader } from '../config/loader';
import { SystemCollaborators } from '../collaborators/launcher';
import type { Collaborators } from '../collaborators/launcher';
import { OutputRenderer } from '../output/renderer';
import type { PackReport } from '../output/renderer';
import { buildInstructionPrompt } from '../prompt';
import { resolveRootPath } from '../root';

export interface PackCommandOptions {
  path?: string;
  config?: string;
  events?: string;
  open: boolean;
  clipboard: boolean;
  json?: boolean;
  verbose?: boolean;
}

/** Process-level collaborators, replaced in tests. */
export interface PackCommandDeps {
  collaborators?: Collaborators;
  packerFs?: PackerFs;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

export function registerPackCommand(program: Command, deps: PackCommandDeps = {}) {
  program
    .argument('[path]', 'Project root to pack')
    .option('-p, --path <dir>', 'Project root to pack (alternative to the argument)')
    .option('--events <file>', 'Append pack events to a JSONL file')
    .option('--no-open', 'Do not open the browser or the file manager')
    .option('--no-clipboard', 'Do not copy the instruction prompt to the clipboard')
    .action(async (positional: string | undefined, options: PackCommandOptions) => {
      await runPack(positional, options, deps);
    });
}

function flagsFrom(options: PackCommandOptions): ConfigInput {
  const launch: NonNullable<ConfigInput['launch']> = {};
  if (!options.open) {
    launch.browser = false;
    launch.fileManager = false;
  }
  if (!options.clipboard) {
    launch.clipboard = false;
  }
  return Object.keys(launch).length > 0 ? { launch } : {};
}

export async function runPack(
  positional: string | undefined,
  options: PackCommandOptions,
  deps: PackCommandDeps = {},
): Promise<PackResult> {
  const cwd = deps.cwd ?? process.cwd();
  const rootPath = resolveRootPath({ positional, flag: options.path, env: deps.env, cwd });

  const config = ConfigLoader.load({
    configPath: options.config ? path.resolve(cwd, options.config) : undefined,
    flags: flagsFrom(options),
    rootPath,
    homeDir: deps.homeDir,
  });

  const consoleLogger = new ConsoleLogger({ verbose: options.verbose, silent: options.json });
  const logger: Logger = options.events
    ? new JsonlLogger(path.resolve(cwd, options.events), consoleLogger)
    : consoleLogger;

  const packer = new TreePacker(
    createPackConfig({
      extensions: config.extensions,
      extraPatterns: config.exclude,
      useGitignore: config.gitignore,
      reservedNames: [config.output.filename],
    }),
    logger,
    deps.packerFs,
  );

  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once('SIGINT', onInterrupt);

  let result: PackResult;
  try {
    result = await packer.pack(rootPath, {
      outputPath: path.join(cwd, config.output.filename),
      sideArtifactPaths: [path.join(cwd, config.output.promptFilename)],
      signal: controller.signal,
    });
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }

  const renderer = new OutputRenderer(Boolean(options.json));
  const report: PackReport = {
    status: result.status,
    runId: result.runId,
    rootPath: result.rootPath,
    outputPath: result.outputPath,
    fileCount: result.fileCount,
    totalChars: result.totalChars,
    files: result.files,
    skipped: result.skipped.map((e) => ({ path: e.path, reason: e.message })),
    warnings: result.warnings,
    launch: { url: config.launch.url, browser: config.launch.browser },
  };

  if (result.status === 'empty') {
    renderer.render(report);
    return result;
  }

  const collaborators = deps.collaborators ?? new SystemCollaborators();
  report.prompt = await deliverPrompt(config, cwd, collaborators, logger);
  renderer.render(report);
  await launch(config, result.outputPath, collaborators, logger);

  return result;
}

async function deliverPrompt(
  config: Config,
  cwd: string,
  collaborators: Collaborators,
  logger: Logger,
): Promise<{ path: string; status: string }> {
  const prompt = buildInstructionPrompt(config.output.filename);
  const promptPath = path.join(cwd, config.output.promptFilename);
  await atomicWrite(promptPath, prompt);

  if (!config.launch.clipboard) {
    return { path: promptPath, status: `Saved to ${config.output.promptFilename}.` };
  }
  try {
    await collaborators.copyToClipboard(prompt);
    return { path: promptPath, status: 'Copied to clipboard!' };
  } catch (error) {
    if (!(error instanceof CollaboratorError)) throw error;
    await logger.warn(`Could not copy to clipboard: ${error.message}`);
    return {
      path: promptPath,
      status: `Could not copy to clipboard. Saved to ${config.output.promptFilename}.`,
    };
  }
}

async function launch(
  config: Config,
  outputPath: string,
  collaborators: Collaborators,
  logger: Logger,
): Promise<void> {
  if (config.launch.browser) {
    await attempt(logger, 'browser', () => collaborators.openUrl(config.launch.url));
  }
  if (config.launch.fileManager) {
    await attempt(logger, 'file manager', () => collaborators.revealFile(outputPath));
  }
}

async function attempt(logger: Logger, what: string, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    if (!(error instanceof CollaboratorError)) throw error;
    await logger.warn(`Could not open ${what}: ${error.message}`);
  }
}
