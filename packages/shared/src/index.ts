export const name = '@codepack/shared';

export * from './types/events';
export * from './logger';
export * from './errors';
export * from './fs/path';
export * from './fs/io';
export * from './config/defaults';
export * from './config/schema';
