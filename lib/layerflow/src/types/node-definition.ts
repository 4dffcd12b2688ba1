import type { Graph } from '../graph/graph';
import type { Node } from '../node/node';
import type { EvaluationError } from '../utils/errors';
import { ILogger } from './logger';

/**
 * Input values gathered for `compute`, keyed by input name.
 * Composite inputs arrive as a mapping of their sub-plug values.
 */
export type NodeInputs = Readonly<Record<string, unknown>>;

/**
 * Values returned by `compute`, keyed by output name or `parent.key`
 */
export type NodeOutputs = Record<string, unknown>;

export type ComputeResult = NodeOutputs | undefined | Promise<NodeOutputs | undefined>;

/**
 * Anything that can compute outputs from inputs
 */
export interface Computable {
  compute(inputs: NodeInputs): ComputeResult;
}

/**
 * Timing of the last evaluation, in milliseconds
 */
export interface NodeStats {
  readonly evalTime: number;
  readonly startTime: number;
}

export interface NodeOptions {
  /**
   * Display name, unique within a graph. Defaults to the class name.
   */
  name?: string;
  /**
   * Stable identifier, kept across serialization. Generated when omitted.
   */
  identifier?: string;
  metadata?: Record<string, unknown>;
  /**
   * Graph the node joins on construction
   */
  graph?: Graph;
  logger?: ILogger;
}

export enum NodeEventType {
  EVALUATION_STARTED = 'evaluation-started',
  EVALUATION_FINISHED = 'evaluation-finished',
  EVALUATION_OMITTED = 'evaluation-omitted',
  EVALUATION_EXCEPTION = 'evaluation-exception',
}

export interface NodeEventHandlers {
  [NodeEventType.EVALUATION_STARTED]: (node: Node) => void;
  [NodeEventType.EVALUATION_FINISHED]: (node: Node, outputs: NodeOutputs) => void;
  [NodeEventType.EVALUATION_OMITTED]: (node: Node) => void;
  [NodeEventType.EVALUATION_EXCEPTION]: (node: Node, error: EvaluationError) => void;
}
