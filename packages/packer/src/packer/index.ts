export * from './types';
export * from './format';
export * from './tree-packer';
