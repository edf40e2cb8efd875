import type { PackEvent } from '../types/events';
import type { ConsoleLoggerOptions, Logger } from './types';

export class ConsoleLogger implements Logger {
  private readonly verbose: boolean;
  private readonly silent: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.silent = options.silent ?? false;
  }

  log(event: PackEvent): void {
    if (this.verbose && !this.silent) {
      console.log(JSON.stringify(event));
    }
  }

  debug(message: string): void {
    if (this.verbose && !this.silent) {
      console.debug(message);
    }
  }

  info(message: string): void {
    if (!this.silent) {
      console.info(message);
    }
  }

  warn(message: string): void {
    console.warn(message);
  }

  error(message: string): void {
    console.error(message);
  }
}
