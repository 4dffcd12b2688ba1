import { NodeInputs, NodeOptions, NodeOutputs } from '../types/node-definition';
import { Node } from './node';

export interface ValueNodeOptions extends NodeOptions {
  value?: unknown;
}

/**
 * Forwards its `value` input to its `value` output
 */
export class ValueNode extends Node {
  constructor(options: ValueNodeOptions = {}) {
    super(options);
    this.addInput('value', options.value ?? null);
    this.addOutput('value');
  }

  compute(inputs: NodeInputs): NodeOutputs {
    return { value: inputs.value };
  }
}
