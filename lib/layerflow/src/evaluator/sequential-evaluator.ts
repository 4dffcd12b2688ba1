import type { Node } from '../node/node';
import { Evaluator } from './evaluator';

/**
 * Evaluates the nodes of a layer one at a time, in insertion order
 */
export class SequentialEvaluator extends Evaluator {
  protected async evaluateLayer(nodes: readonly Node[]): Promise<void> {
    for (const node of nodes) {
      await this.evaluateNode(node);
    }
  }
}
