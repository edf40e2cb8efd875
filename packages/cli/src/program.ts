import fs from 'fs';
import path from 'path';
import { Command, CommanderError } from 'commander';
import { z } from 'zod';
import { AppError, CancelledError, ConsoleLogger, UsageError, exitCodeFor } from '@codepack/shared';
import { registerPackCommand } from './commands/pack';
import type { PackCommandDeps } from './commands/pack';

export const name = '@codepack/cli';

type GlobalOptions = {
  json?: boolean;
  verbose?: boolean;
};

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw = fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf8');
  return PackageJsonSchema.parse(JSON.parse(raw)).version;
}

export function createProgram(deps: PackCommandDeps = {}): Command {
  const program = new Command();

  program
    .name('codepack')
    .description("Pack a project's source files into a single Markdown context document")
    .version(readVersion())
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .exitOverride();

  registerPackCommand(program, deps);

  return program;
}

function reportError(e: unknown, opts: GlobalOptions): void {
  if (opts.json) {
    if (e instanceof CancelledError) {
      console.log(JSON.stringify({ cancelled: true, message: e.message }));
    } else if (e instanceof AppError) {
      console.log(
        JSON.stringify({
          error: {
            code: e.code,
            message: e.message,
            details: e.details,
          },
        }),
      );
    } else {
      console.log(
        JSON.stringify({
          error: {
            code: 'UnknownError',
            message: e instanceof Error ? e.message : String(e),
          },
        }),
      );
    }
    return;
  }

  const logger = new ConsoleLogger({ verbose: opts.verbose });
  if (e instanceof CancelledError) {
    logger.error(`\n${e.message}`);
    return;
  }

  // Human-readable output
  logger.error(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`);
  if (e instanceof AppError && e.details) {
    logger.error(
      `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
    );
  }
  if (opts.verbose && e instanceof Error && e.stack) {
    logger.error(`\nStack Trace:\n${e.stack}`);
  } else {
    logger.error(`\nFor more details, run with the --verbose flag.`);
  }
}

/**
 * Parses the arguments, runs the pack and returns the process exit code.
 */
export async function run(argv: string[], deps: PackCommandDeps = {}): Promise<number> {
  const program = createProgram(deps);
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (e) {
    if (e instanceof CommanderError) {
      // commander has already printed help, the version or the usage message
      return e.exitCode === 0 ? 0 : exitCodeFor(new UsageError(e.message));
    }
    reportError(e, program.opts<GlobalOptions>());
    return exitCodeFor(e);
  }
}
