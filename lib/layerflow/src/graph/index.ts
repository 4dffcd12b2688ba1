export * from './graph';
export * from './graph-node';
