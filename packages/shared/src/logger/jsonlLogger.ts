import * as fs from 'fs/promises';
import type { PackEvent } from '../types/events';
import { ConsoleLogger } from './consoleLogger';
import type { Logger } from './types';

/**
 * Appends pack events to a JSONL file.
 * Human-readable lines go to the base logger.
 */
export class JsonlLogger implements Logger {
  constructor(
    private readonly filePath: string,
    private readonly base: Logger = new ConsoleLogger(),
  ) {}

  async log(event: PackEvent): Promise<void> {
    const line = JSON.stringify(event) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // Best-effort: do not fail the run due to logging.
      await this.base.warn(
        `Failed to write to event log at ${this.filePath}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  debug(message: string) {
    return this.base.debug(message);
  }

  info(message: string) {
    return this.base.info(message);
  }

  warn(message: string) {
    return this.base.warn(message);
  }

  error(message: string) {
    return this.base.error(message);
  }
}
