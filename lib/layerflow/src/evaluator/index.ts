export * from './evaluator';
export * from './sequential-evaluator';
export * from './concurrent-evaluator';
export * from './worker-pool-evaluator';
export * from './run-bounded';
export * from './factory';
