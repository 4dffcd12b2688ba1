import { createEvaluator } from '../evaluator/factory';
import type { Node } from '../node/node';
import { InputPlugGroup } from '../plug/plug-group';
import { InputPlugBase, OutputPlugBase, SUB_PLUG_SEPARATOR } from '../plug/plug';
import { EvaluationMode, GraphEvaluateOptions } from '../types/evaluator-options';
import { ILogger } from '../types/logger';
import { GraphRecord, PlugRefRecord } from '../types/records';
import { CycleDetectedError, GraphError } from '../utils/errors';
import { LoggerManager } from '../utils/logging';

export interface GraphOptions {
  logger?: ILogger;
}

/**
 * Boundary input of a graph: a single inner input or a group of them
 */
export type GraphInput = InputPlugBase | InputPlugGroup;

function refOf(plug: InputPlugBase | OutputPlugBase): PlugRefRecord {
  return { identifier: plug.node.identifier, plug: plug.name };
}

/**
 * Ordered collection of nodes. Dependency edges are derived from the plug
 * connections between member nodes.
 */
export class Graph {
  private readonly nodeIndex = new Map<string, Node>();
  private readonly promotedInputs = new Map<string, GraphInput>();
  private readonly promotedOutputs = new Map<string, OutputPlugBase>();
  private readonly customLogger?: ILogger;

  constructor(
    public readonly name: string = 'Graph',
    options: GraphOptions = {}
  ) {
    this.customLogger = options.logger;
  }

  private get logger(): ILogger {
    return this.customLogger ?? LoggerManager.getInstance().getLogger();
  }

  /**
   * Member nodes in insertion order
   */
  get nodes(): Node[] {
    return [...this.nodeIndex.values()];
  }

  get size(): number {
    return this.nodeIndex.size;
  }

  /**
   * Adds a node. Adding a member again is a no-op.
   * @throws GraphError if another member already uses the node's name
   */
  addNode(node: Node): this {
    if (this.nodeIndex.get(node.identifier) === node) {
      this.logger.debug(`Node '${node.name}' is already part of graph '${this.name}'`);
      return this;
    }

    const clash = this.nodes.find(member => member.name === node.name);
    if (clash) {
      throw new GraphError(`Graph '${this.name}' already has a node named '${node.name}'`);
    }
    if (this.nodeIndex.has(node.identifier)) {
      throw new GraphError(
        `Graph '${this.name}' already has a node with identifier '${node.identifier}'`
      );
    }

    this.nodeIndex.set(node.identifier, node);
    this.logger.logEvent('graph', 'node-added', { graph: this.name, identifier: node.identifier });
    return this;
  }

  addNodes(...nodes: Node[]): this {
    nodes.forEach(node => this.addNode(node));
    return this;
  }

  /**
   * Removes a node after disconnecting every plug it has
   */
  deleteNode(node: Node): void {
    if (this.nodeIndex.get(node.identifier) !== node) {
      throw new GraphError(`Node '${node.name}' is not part of graph '${this.name}'`);
    }

    node.allInputs().forEach(plug => {
      if (plug.source) {
        plug.source.disconnect(plug);
      }
    });
    node.allOutputs().forEach(plug => {
      plug.connections.forEach(target => plug.disconnect(target));
    });

    [...this.promotedInputs].forEach(([name, input]) => {
      const plugs = input instanceof InputPlugGroup ? input.plugs : [input];
      if (plugs.some(plug => plug.node === node)) {
        this.promotedInputs.delete(name);
      }
    });
    [...this.promotedOutputs].forEach(([name, output]) => {
      if (output.node === node) {
        this.promotedOutputs.delete(name);
      }
    });

    this.nodeIndex.delete(node.identifier);
    this.logger.logEvent('graph', 'node-deleted', { graph: this.name, identifier: node.identifier });
  }

  hasNode(node: Node): boolean {
    return this.nodeIndex.get(node.identifier) === node;
  }

  /**
   * Finds a member by name
   * @throws GraphError if no member has that name
   */
  getNode(name: string): Node {
    const node = this.nodes.find(member => member.name === name);
    if (!node) {
      throw new GraphError(`Graph '${this.name}' has no node named '${name}'`);
    }
    return node;
  }

  getNodeByIdentifier(identifier: string): Node | undefined {
    return this.nodeIndex.get(identifier);
  }

  /**
   * Partitions the members into dependency layers. A node with no upstream
   * member is in layer 0, any other node one layer after its deepest
   * upstream member. Within a layer nodes keep insertion order.
   * @throws CycleDetectedError listing the identifiers on the cycle
   */
  computeLayers(): Node[][] {
    const depth = new Map<string, number>();
    const path: string[] = [];
    const visiting = new Set<string>();

    const visit = (node: Node): number => {
      const known = depth.get(node.identifier);
      if (known !== undefined) {
        return known;
      }
      if (visiting.has(node.identifier)) {
        throw new CycleDetectedError(path.slice(path.indexOf(node.identifier)));
      }

      visiting.add(node.identifier);
      path.push(node.identifier);

      let layer = 0;
      this.memberParents(node).forEach(parent => {
        layer = Math.max(layer, visit(parent) + 1);
      });

      path.pop();
      visiting.delete(node.identifier);
      depth.set(node.identifier, layer);
      return layer;
    };

    const members = this.nodes;
    members.forEach(visit);

    const layers: Node[][] = [];
    members.forEach(node => {
      const layer = depth.get(node.identifier) ?? 0;
      while (layers.length <= layer) {
        layers.push([]);
      }
      layers[layer].push(node);
    });
    return layers;
  }

  /**
   * Layers flattened into one valid evaluation order
   */
  get evaluationSequence(): Node[] {
    return this.computeLayers().flat();
  }

  /**
   * Members without upstream members
   */
  get entryNodes(): Node[] {
    return this.nodes.filter(node => this.memberParents(node).length === 0);
  }

  /**
   * Members without downstream members
   */
  get exitNodes(): Node[] {
    return this.nodes.filter(node => [...node.children].every(child => !this.hasNode(child)));
  }

  get inputs(): ReadonlyMap<string, GraphInput> {
    return this.promotedInputs;
  }

  get outputs(): ReadonlyMap<string, OutputPlugBase> {
    return this.promotedOutputs;
  }

  /**
   * Exposes an inner input, or a group of them, as a boundary input
   * @param name Boundary name, defaults to the plug or group name. Required
   * for a sub-plug, whose own name is a plug path.
   */
  promoteInput(input: GraphInput, name: string = input.name): void {
    this.assertBoundaryName(name);
    const plugs = input instanceof InputPlugGroup ? input.plugs : [input];
    plugs.forEach(plug => this.assertMember(plug.node));

    if (this.promotedInputs.has(name)) {
      throw new GraphError(`Graph '${this.name}' already has an input named '${name}'`);
    }
    const promoted = [...this.promotedInputs.values()].flatMap(existing =>
      existing instanceof InputPlugGroup ? existing.plugs : [existing]
    );
    const twice = plugs.find(plug => promoted.includes(plug));
    if (twice) {
      throw new GraphError(`Input '${twice.path}' is already promoted on graph '${this.name}'`);
    }

    this.promotedInputs.set(name, input);
  }

  /**
   * Exposes an inner output as a boundary output
   */
  promoteOutput(output: OutputPlugBase, name: string = output.name): void {
    this.assertBoundaryName(name);
    this.assertMember(output.node);

    if (this.promotedOutputs.has(name)) {
      throw new GraphError(`Graph '${this.name}' already has an output named '${name}'`);
    }
    if ([...this.promotedOutputs.values()].includes(output)) {
      throw new GraphError(`Output '${output.path}' is already promoted on graph '${this.name}'`);
    }

    this.promotedOutputs.set(name, output);
  }

  /**
   * Evaluates the graph with a built-in mode or an explicit evaluator
   * @throws GraphError if both `mode` and `evaluator` are given
   */
  async evaluate(options: GraphEvaluateOptions = {}): Promise<void> {
    if (options.mode !== undefined && options.evaluator) {
      throw new GraphError('Pass either an evaluation mode or an evaluator, not both');
    }

    const evaluator =
      options.evaluator ??
      createEvaluator(options.mode ?? EvaluationMode.SEQUENTIAL, {
        logger: this.customLogger,
        maxWorkers: options.maxWorkers,
        registryModule: options.registryModule,
      });

    await evaluator.evaluate(this, { skipClean: options.skipClean });

    if (options.dataPersistence === false) {
      this.nodes.forEach(node => {
        node.allInputs().forEach(plug => {
          if (plug.source) {
            plug.restoreValue(null);
          }
        });
      });
    }
  }

  /**
   * Produces the graph record: member node records plus promoted plugs.
   * Edges travel in the input connection references of the node records.
   */
  serialize(): GraphRecord {
    const record: GraphRecord = {
      name: this.name,
      nodes: this.nodes.map(node => node.serialize()),
    };

    if (this.promotedInputs.size > 0) {
      record.inputs = {};
      for (const [name, input] of this.promotedInputs) {
        const plugs = input instanceof InputPlugGroup ? input.plugs : [input];
        record.inputs[name] = plugs.map(refOf);
      }
    }
    if (this.promotedOutputs.size > 0) {
      record.outputs = {};
      for (const [name, output] of this.promotedOutputs) {
        record.outputs[name] = refOf(output);
      }
    }
    return record;
  }

  toString(): string {
    return `Graph '${this.name}' (${this.size} nodes)`;
  }

  private memberParents(node: Node): Node[] {
    return [...node.parents].filter(parent => this.hasNode(parent));
  }

  private assertBoundaryName(name: string): void {
    if (name.length === 0 || name.includes(SUB_PLUG_SEPARATOR)) {
      throw new GraphError(
        `Invalid boundary name '${name}' on graph '${this.name}': names must be non-empty and must not contain '${SUB_PLUG_SEPARATOR}'`
      );
    }
  }

  private assertMember(node: Node): void {
    if (!this.hasNode(node)) {
      throw new GraphError(`Node '${node.name}' is not part of graph '${this.name}'`);
    }
  }
}
