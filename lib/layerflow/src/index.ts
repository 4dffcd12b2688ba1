// Model
export * from './plug';
export * from './node';
export * from './graph';

// Evaluation
export * from './evaluator';
export * from './execution';

// Records
export * from './serialization';
export * from './providers';
export * from './types/records';
export * from './types/node-definition';
export * from './types/evaluator-options';

// Infrastructure
export { HookManager } from './engine/hook-manager';
export type { EventHandlerMap, UnsubscribeFn } from './engine/hook-manager';
export * from './utils/errors';
export * from './utils/json';
export { generateUuid } from './utils/id';
export * from './utils/logging';
