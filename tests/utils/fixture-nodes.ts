import { Node } from '../../lib/layerflow/src/node/node';
import { defineNode } from '../../lib/layerflow/src/node/function-node';
import {
  ComputeResult,
  NodeInputs,
  NodeOptions,
  NodeOutputs,
} from '../../lib/layerflow/src/types/node-definition';

/**
 * Output `x` only, its value is set from outside
 */
export class SourceNode extends Node {
  constructor(options: NodeOptions = {}) {
    super(options);
    this.addOutput('x');
  }

  compute(): ComputeResult {
    return undefined;
  }
}

export class DoubleNode extends Node {
  constructor(options: NodeOptions = {}) {
    super(options);
    this.addInput('y');
    this.addOutput('result');
  }

  compute(inputs: NodeInputs): NodeOutputs {
    return { result: Number(inputs.y) * 2 };
  }
}

export class AddNode extends Node {
  constructor(options: NodeOptions = {}) {
    super(options);
    this.addInput('a', 0);
    this.addInput('b', 0);
    this.addOutput('sum');
  }

  compute(inputs: NodeInputs): NodeOutputs {
    return { sum: Number(inputs.a) + Number(inputs.b) };
  }
}

/**
 * Waits `delay` milliseconds, then forwards `value`
 */
export class DelayNode extends Node {
  constructor(options: NodeOptions = {}) {
    super(options);
    this.addInput('value');
    this.addInput('delay', 0);
    this.addOutput('value');
  }

  async compute(inputs: NodeInputs): Promise<NodeOutputs> {
    await new Promise(resolve => setTimeout(resolve, Number(inputs.delay)));
    return { value: inputs.value };
  }
}

export class GatherNode extends Node {
  constructor(options: NodeOptions = {}) {
    super(options);
    ['a', 'b', 'c', 'd'].forEach(name => this.addInput(name));
    this.addOutput('values');
  }

  compute(inputs: NodeInputs): NodeOutputs {
    return { values: [inputs.a, inputs.b, inputs.c, inputs.d] };
  }
}

/**
 * Forwards the mapping received on its composite `workers` input
 */
export class NamesNode extends Node {
  constructor(options: NodeOptions = {}) {
    super(options);
    this.addInput('workers');
    this.addOutput('names');
  }

  compute(inputs: NodeInputs): NodeOutputs {
    return { names: inputs.workers };
  }
}

/**
 * Splits `text` on the first space into the sub-plugs of `parts`
 */
export class SplitNode extends Node {
  constructor(options: NodeOptions = {}) {
    super(options);
    this.addInput('text', '');
    this.addOutput('parts.first');
    this.addOutput('parts.second');
  }

  compute(inputs: NodeInputs): NodeOutputs {
    const [first, ...rest] = String(inputs.text).split(' ');
    return { 'parts.first': first, 'parts.second': rest.join(' ') };
  }
}

export class FailingNode extends Node {
  constructor(options: NodeOptions = {}) {
    super(options);
    this.addInput('value');
    this.addOutput('value');
  }

  compute(): ComputeResult {
    throw new Error('Test computation error');
  }
}

export class UndeclaredOutputNode extends Node {
  constructor(options: NodeOptions = {}) {
    super(options);
    this.addOutput('declared');
  }

  compute(): NodeOutputs {
    return { declared: 1, missing: 2 };
  }
}

export const Multiply = defineNode(
  'Multiply',
  ({ value, factor = 1 }) => ({ product: Number(value) * Number(factor) }),
  { outputs: ['product'], defaults: { factor: 1 } }
);
