import { Evaluator } from '../evaluator/evaluator';
import { SequentialEvaluator } from '../evaluator/sequential-evaluator';
import { Node } from '../node/node';
import { NodeInputs, NodeOptions, NodeOutputs } from '../types/node-definition';
import { NodeRecord } from '../types/records';
import { Graph } from './graph';

export interface GraphNodeOptions extends NodeOptions {
  /**
   * Evaluator for the inner graph. Sequential by default.
   */
  evaluator?: Evaluator;
}

/**
 * Presents a graph as a node. Its plugs mirror the promoted inputs and
 * outputs of the inner graph; evaluating it evaluates the whole inner graph.
 */
export class GraphNode extends Node {
  private readonly evaluator: Evaluator;

  constructor(
    public readonly subgraph: Graph,
    options: GraphNodeOptions = {}
  ) {
    super({ ...options, name: options.name ?? subgraph.name });
    this.evaluator = options.evaluator ?? new SequentialEvaluator({ logger: options.logger });

    subgraph.inputs.forEach((input, name) => this.addInput(name, input.getValue()));
    subgraph.outputs.forEach((_output, name) => this.addOutput(name));
  }

  override get type(): string {
    return 'GraphNode';
  }

  async compute(inputs: NodeInputs): Promise<NodeOutputs> {
    this.subgraph.inputs.forEach((input, name) => input.setValue(inputs[name]));

    await this.evaluator.evaluate(this.subgraph);

    const outputs: NodeOutputs = {};
    this.subgraph.outputs.forEach((output, name) => {
      outputs[name] = output.getValue();
    });
    return outputs;
  }

  override serialize(): NodeRecord {
    return { ...super.serialize(), graph: this.subgraph.serialize() };
  }
}
