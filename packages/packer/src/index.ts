export const name = '@codepack/packer';

export * from './config';
export * from './ignore';
export * from './packer';
