import type { Evaluator } from '../evaluator/evaluator';
import type { NodeRunner } from '../execution/node-runner';
import type { Graph } from '../graph/graph';
import type { Node } from '../node/node';
import type { EvaluationError } from '../utils/errors';
import { ILogger } from './logger';
import { NodeOutputs } from './node-definition';

/**
 * Built-in evaluation strategies
 */
export enum EvaluationMode {
  /** One node at a time, insertion order within each layer */
  SEQUENTIAL = 'sequential',
  /** Bounded concurrent `compute` calls within each layer */
  CONCURRENT = 'concurrent',
  /** Each node evaluated from its record by an isolated worker */
  WORKER_POOL = 'worker-pool',
}

export interface EvaluatorOptions {
  logger?: ILogger;
  /**
   * Evaluate only dirty nodes
   */
  skipClean?: boolean;
}

export interface ConcurrentEvaluatorOptions extends EvaluatorOptions {
  /**
   * In-flight `compute` calls per layer. Defaults to the layer size.
   */
  maxConcurrency?: number;
}

export interface WorkerPoolEvaluatorOptions extends EvaluatorOptions {
  /**
   * Worker count. Defaults to the CPU count minus one, at least one.
   */
  maxWorkers?: number;
  /**
   * Per-node timeout in milliseconds
   */
  taskTimeout?: number;
  /**
   * Absolute path of a module exporting the `NodeTypeRegistry` the
   * workers deserialize nodes with, as `registry` or as default export
   */
  registryModule?: string;
  /**
   * Runs node records instead of the default worker pool
   */
  runner?: NodeRunner;
}

/**
 * Per-run overrides
 */
export interface EvaluationRunOptions {
  skipClean?: boolean;
}

export interface GraphEvaluateOptions extends EvaluationRunOptions {
  mode?: EvaluationMode;
  /**
   * Explicit evaluator; cannot be combined with `mode`
   */
  evaluator?: Evaluator;
  /**
   * When false, values received by connected inputs are cleared after a
   * successful run. Defaults to true.
   */
  dataPersistence?: boolean;
  maxWorkers?: number;
  registryModule?: string;
}

/**
 * Context handed to `evaluateLayer`
 */
export interface LayerContext {
  readonly graph: Graph;
  readonly index: number;
  readonly layerCount: number;
}

export enum EvaluatorEventType {
  RUN_STARTED = 'run-started',
  RUN_FINISHED = 'run-finished',
  LAYER_STARTED = 'layer-started',
  LAYER_FINISHED = 'layer-finished',
  NODE_EVALUATED = 'node-evaluated',
  NODE_FAILED = 'node-failed',
}

export interface EvaluatorEventHandlers {
  [EvaluatorEventType.RUN_STARTED]: (graph: Graph) => void;
  [EvaluatorEventType.RUN_FINISHED]: (graph: Graph) => void;
  [EvaluatorEventType.LAYER_STARTED]: (nodes: readonly Node[], context: LayerContext) => void;
  [EvaluatorEventType.LAYER_FINISHED]: (nodes: readonly Node[], context: LayerContext) => void;
  [EvaluatorEventType.NODE_EVALUATED]: (node: Node, outputs: NodeOutputs) => void;
  [EvaluatorEventType.NODE_FAILED]: (node: Node, error: EvaluationError) => void;
}
