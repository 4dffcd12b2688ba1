import { ComputeResult, NodeInputs, NodeOptions } from '../types/node-definition';
import { GraphError } from '../utils/errors';
import { Node } from './node';

export type ComputeFunction = (inputs: NodeInputs) => ComputeResult;

export interface FunctionNodeOptions extends NodeOptions {
  /**
   * Input names. Derived from the destructured first parameter of the
   * function when omitted.
   */
  inputs?: readonly string[];
  /**
   * Output names, `parent.key` for sub-plugs of a composite output
   */
  outputs?: readonly string[];
  defaults?: Readonly<Record<string, unknown>>;
  /**
   * Registry type name. Defaults to the function name.
   */
  type?: string;
}

/**
 * Names that clash with node construction options
 */
export const RESERVED_INPUT_NAMES: readonly string[] = [
  'func',
  'name',
  'identifier',
  'inputs',
  'outputs',
  'metadata',
  'omit',
  'graph',
];

const DESTRUCTURED_PARAMETER = /^[^(=]*\(\s*\{([^}]*)\}/;

/**
 * Reads input names from a function written as `({ a, b = 1, c: alias }) => ...`
 * @throws GraphError when the names cannot be derived
 */
export function deriveInputNames(func: ComputeFunction): string[] {
  const match = DESTRUCTURED_PARAMETER.exec(func.toString());
  if (!match) {
    if (func.length === 0) {
      return [];
    }
    throw new GraphError(
      `Cannot derive input names of '${func.name || 'anonymous'}': destructure the first parameter or pass 'inputs'`
    );
  }
  return match[1]
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0 && !entry.startsWith('...'))
    .map(entry => entry.split(/[:=]/)[0].trim());
}

/**
 * Node whose computation is a plain function.
 * The function receives the gathered inputs and returns the output mapping.
 */
export class FunctionNode extends Node {
  private readonly func: ComputeFunction;
  private readonly typeName: string;

  constructor(func: ComputeFunction, options: FunctionNodeOptions = {}) {
    super({ ...options, name: options.name ?? (func.name || 'FunctionNode') });
    this.func = func;
    this.typeName = options.type ?? (func.name || 'FunctionNode');

    const inputNames = options.inputs ?? deriveInputNames(func);
    inputNames.forEach(name => {
      if (RESERVED_INPUT_NAMES.includes(name)) {
        throw new GraphError(`Input name '${name}' is reserved`);
      }
      this.addInput(name, options.defaults?.[name] ?? null);
    });
    (options.outputs ?? []).forEach(name => this.addOutput(name));
  }

  override get type(): string {
    return this.typeName;
  }

  compute(inputs: NodeInputs): ComputeResult {
    return this.func(inputs);
  }
}

/**
 * A node type built from a function, ready for registration
 */
export interface NodeDefinition {
  readonly type: string;
  create(options?: NodeOptions): FunctionNode;
}

/**
 * Turns a function into a reusable node type
 *
 * @example
 * const Add = defineNode('Add', ({ a, b }) => ({ sum: Number(a) + Number(b) }), { outputs: ['sum'] });
 * registry.registerDefinition(Add);
 * const node = Add.create({ name: 'add' });
 */
export function defineNode(
  type: string,
  func: ComputeFunction,
  options: Omit<FunctionNodeOptions, keyof NodeOptions | 'type'> = {}
): NodeDefinition {
  const inputs = options.inputs ?? deriveInputNames(func);
  return {
    type,
    create: (nodeOptions: NodeOptions = {}) =>
      new FunctionNode(func, { ...options, inputs, ...nodeOptions, name: nodeOptions.name ?? type, type }),
  };
}
