import { ConsoleLogger } from './consoleLogger';
import { JsonlLogger } from './jsonlLogger';
export type { Logger, MaybePromise, ConsoleLoggerOptions } from './types';

export const logger = new ConsoleLogger();
export { ConsoleLogger, JsonlLogger };
