export * from './node';
export * from './function-node';
export * from './value-node';
export * from './registry';
