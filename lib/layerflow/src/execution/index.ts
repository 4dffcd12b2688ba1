export * from './node-runner';
export * from './run-node-task';
export * from './in-process-runner';
export * from './worker-pool';
export * from './worker-protocol';
