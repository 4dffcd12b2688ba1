import type { Node } from '../node/node';
import { ConcurrentEvaluatorOptions } from '../types/evaluator-options';
import { Evaluator } from './evaluator';
import { runBounded } from './run-bounded';

/**
 * Runs the `compute` calls of a layer concurrently, at most
 * `maxConcurrency` at a time, and joins the layer before the next one.
 * Meant for asynchronous, I/O-bound nodes.
 */
export class ConcurrentEvaluator extends Evaluator {
  private readonly maxConcurrency?: number;

  constructor(options: ConcurrentEvaluatorOptions = {}) {
    super(options);
    this.maxConcurrency = options.maxConcurrency;
  }

  protected async evaluateLayer(nodes: readonly Node[]): Promise<void> {
    await runBounded(nodes, this.maxConcurrency ?? nodes.length, node => this.evaluateNode(node));
  }
}
