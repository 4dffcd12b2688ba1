import { HookManager } from '../engine/hook-manager';
import { InputPlugGroup } from '../plug/plug-group';
import {
  InputPlug,
  InputPlugBase,
  OutputPlug,
  OutputPlugBase,
  Plug,
  PlugDirection,
  SUB_PLUG_SEPARATOR,
  isValidSubKey,
} from '../plug/plug';
import { ILogger } from '../types/logger';
import {
  ComputeResult,
  Computable,
  NodeEventHandlers,
  NodeEventType,
  NodeInputs,
  NodeOptions,
  NodeOutputs,
  NodeStats,
} from '../types/node-definition';
import { NodeRecord, PlugRecord, PlugRefRecord, SubPlugRecord } from '../types/records';
import {
  EvaluationError,
  GraphError,
  InvalidConnectionError,
  SerializationError,
  isEvaluationError,
} from '../utils/errors';
import { generateUuid } from '../utils/id';
import { isPlainRecord, toJsonObject, toJsonValue } from '../utils/json';
import { LoggerManager } from '../utils/logging';

/**
 * Metadata key marking a node as omitted from evaluation
 */
export const OMIT_METADATA_KEY = 'omit';

function plugRef(plug: Plug): PlugRefRecord {
  return { identifier: plug.node.identifier, plug: plug.name };
}

function serializePlug(plug: InputPlug | OutputPlug, path: string): PlugRecord {
  const subPlugs: Record<string, SubPlugRecord> = {};
  plug.subPlugs.forEach((sub, key) => {
    subPlugs[key] = {
      value: toJsonValue(sub.ownValue, `${path}.sub_plugs.${key}.value`),
      connections: sub.connections.map(plugRef),
    };
  });
  return {
    value: toJsonValue(plug.ownValue, `${path}.value`),
    sub_plugs: subPlugs,
    connections: plug.connections.map(plugRef),
  };
}

/**
 * Unit of computation with named input and output plugs.
 *
 * Subclasses declare their plugs in the constructor with `addInput` and
 * `addOutput` and implement `compute`. Upstream and downstream nodes are
 * always derived from the plug connections.
 */
export abstract class Node implements Computable {
  public readonly identifier: string;
  public readonly name: string;
  public readonly metadata: Record<string, unknown>;
  public readonly events = new HookManager<NodeEventHandlers>();

  private readonly customLogger?: ILogger;
  private readonly inputPlugs = new Map<string, InputPlug>();
  private readonly outputPlugs = new Map<string, OutputPlug>();
  private evaluated = false;
  private lastStats: NodeStats | null = null;

  constructor(options: NodeOptions = {}) {
    this.name = options.name ?? this.constructor.name;
    this.identifier = options.identifier ?? `${this.name}-${generateUuid()}`;
    this.metadata = { ...options.metadata };
    this.customLogger = options.logger;
    options.graph?.addNode(this);
  }

  abstract compute(inputs: NodeInputs): ComputeResult;

  /**
   * Type name resolved by the node type registry on deserialization
   */
  get type(): string {
    return this.constructor.name;
  }

  protected get logger(): ILogger {
    return this.customLogger ?? LoggerManager.getInstance().getLogger();
  }

  get inputs(): ReadonlyMap<string, InputPlug> {
    return this.inputPlugs;
  }

  get outputs(): ReadonlyMap<string, OutputPlug> {
    return this.outputPlugs;
  }

  /**
   * Declares an input plug
   * @param name Plug name, must not contain a dot
   * @param defaultValue Initial value used while the input is unconnected
   */
  addInput(name: string, defaultValue: unknown = null): InputPlug {
    this.assertFreePlugName(name, this.inputPlugs);
    const plug = new InputPlug(name, this, defaultValue);
    this.inputPlugs.set(name, plug);
    return plug;
  }

  /**
   * Declares an output plug. `parent.key` declares a sub-plug of a
   * composite output.
   */
  addOutput(name: string): OutputPlugBase {
    const [rootName, key] = this.splitPath(name);
    let root = this.outputPlugs.get(rootName);
    if (!root) {
      this.assertFreePlugName(rootName, this.outputPlugs);
      root = new OutputPlug(rootName, this);
      this.outputPlugs.set(rootName, root);
    }
    return key === undefined ? root : root.sub(key);
  }

  input(name: string): InputPlug {
    const plug = this.inputPlugs.get(name);
    if (!plug) {
      throw new GraphError(`Node '${this.name}' has no input '${name}'`);
    }
    return plug;
  }

  output(name: string): OutputPlug {
    const plug = this.outputPlugs.get(name);
    if (!plug) {
      throw new GraphError(`Node '${this.name}' has no output '${name}'`);
    }
    return plug;
  }

  /**
   * Resolves `name` or `name.key`, creating the sub-plug on demand
   */
  plug(path: string, direction: 'input'): InputPlugBase;
  plug(path: string, direction: 'output'): OutputPlugBase;
  plug(path: string, direction: PlugDirection): InputPlugBase | OutputPlugBase;
  plug(path: string, direction: PlugDirection): InputPlugBase | OutputPlugBase {
    const [rootName, key] = this.splitPath(path);
    const root = direction === 'input' ? this.input(rootName) : this.output(rootName);
    return key === undefined ? root : root.sub(key);
  }

  /**
   * Every input plug, sub-plugs included, keyed by plug path
   */
  allInputs(): Map<string, InputPlugBase> {
    const result = new Map<string, InputPlugBase>();
    this.inputPlugs.forEach(plug => {
      result.set(plug.name, plug);
      plug.subPlugs.forEach(sub => result.set(sub.name, sub));
    });
    return result;
  }

  allOutputs(): Map<string, OutputPlugBase> {
    const result = new Map<string, OutputPlugBase>();
    this.outputPlugs.forEach(plug => {
      result.set(plug.name, plug);
      plug.subPlugs.forEach(sub => result.set(sub.name, sub));
    });
    return result;
  }

  /**
   * Direct upstream nodes
   */
  get parents(): Set<Node> {
    const result = new Set<Node>();
    this.allInputs().forEach(plug => {
      if (plug.source) {
        result.add(plug.source.node);
      }
    });
    return result;
  }

  /**
   * Direct downstream nodes
   */
  get children(): Set<Node> {
    const result = new Set<Node>();
    this.allOutputs().forEach(plug => {
      plug.connections.forEach(target => result.add(target.node));
    });
    return result;
  }

  /**
   * All transitive upstream nodes, without duplicates
   */
  get upstreamNodes(): Node[] {
    return this.walk(node => node.parents);
  }

  get downstreamNodes(): Node[] {
    return this.walk(node => node.children);
  }

  get isDirty(): boolean {
    return !this.evaluated || [...this.inputPlugs.values()].some(plug => plug.isDirty);
  }

  get omit(): boolean {
    return this.metadata[OMIT_METADATA_KEY] === true;
  }

  set omit(value: boolean) {
    this.metadata[OMIT_METADATA_KEY] = value;
  }

  get stats(): NodeStats | null {
    return this.lastStats;
  }

  /**
   * Connects outputs to inputs of the same name on `target`, or the matching
   * output to a single input plug or input group
   */
  connect(target: Node | InputPlugBase | InputPlugGroup): void {
    if (target instanceof Node) {
      let connected = 0;
      this.outputPlugs.forEach((plug, name) => {
        const input = target.inputs.get(name);
        if (input) {
          plug.connect(input);
          connected++;
        }
      });
      if (connected === 0) {
        throw new InvalidConnectionError(
          `Node '${this.name}' has no output matching an input of '${target.name}'`
        );
      }
      return;
    }

    const rootName = target instanceof InputPlugGroup ? target.name : this.splitPath(target.name)[0];
    const output =
      this.outputPlugs.get(rootName) ??
      (this.outputPlugs.size === 1 ? [...this.outputPlugs.values()][0] : undefined);
    if (!output) {
      throw new InvalidConnectionError(
        `Node '${this.name}' has no output matching '${target.name}'`
      );
    }
    if (target instanceof InputPlugGroup) {
      target.connect(output);
    } else {
      output.connect(target);
    }
  }

  /**
   * Gathers inputs, runs `compute` and writes the returned values into the
   * outputs, which pushes them downstream
   * @returns The outputs written; empty for an omitted node
   * @throws EvaluationError tagged with this node's identifier
   */
  async evaluate(): Promise<NodeOutputs> {
    if (this.omit) {
      this.logger.logEvent('node', 'evaluation-omitted', { identifier: this.identifier });
      this.events.emit(NodeEventType.EVALUATION_OMITTED, this);
      return {};
    }

    const startTime = Date.now();
    const start = performance.now();
    this.events.emit(NodeEventType.EVALUATION_STARTED, this);

    let outputs: NodeOutputs;
    try {
      const result = await this.compute(this.gatherInputs());
      outputs = this.applyOutputs(result ?? {});
    } catch (error) {
      const evaluationError =
        isEvaluationError(error) && error.nodeIdentifier === this.identifier
          ? error
          : EvaluationError.fromCause(this.identifier, error);
      this.logger.error(evaluationError.message);
      this.events.emit(NodeEventType.EVALUATION_EXCEPTION, this, evaluationError);
      throw evaluationError;
    }

    this.finish({ evalTime: performance.now() - start, startTime });
    this.logger.logEvent('node', 'evaluation-finished', {
      identifier: this.identifier,
      evalTime: this.lastStats?.evalTime ?? 0,
    });
    this.events.emit(NodeEventType.EVALUATION_FINISHED, this, outputs);
    return outputs;
  }

  /**
   * Current value of every input, composite inputs as mappings
   */
  gatherInputs(): NodeInputs {
    const inputs: Record<string, unknown> = {};
    this.inputPlugs.forEach((plug, name) => {
      inputs[name] = plug.getValue();
    });
    return inputs;
  }

  /**
   * Produces the node record. Values and metadata must be JSON-compatible.
   * @throws SerializationError naming the offending path
   */
  serialize(): NodeRecord {
    const inputs: Record<string, PlugRecord> = {};
    this.inputPlugs.forEach((plug, name) => {
      inputs[name] = serializePlug(plug, `inputs.${name}`);
    });
    const outputs: Record<string, PlugRecord> = {};
    this.outputPlugs.forEach((plug, name) => {
      outputs[name] = serializePlug(plug, `outputs.${name}`);
    });

    return {
      identifier: this.identifier,
      name: this.name,
      type: this.type,
      metadata: toJsonObject(this.metadata, 'metadata'),
      inputs,
      outputs,
      stats: this.lastStats
        ? { eval_time: this.lastStats.evalTime, start_time: this.lastStats.startTime }
        : null,
    };
  }

  /**
   * Restores metadata and plug values from a record. Plugs in the record
   * must be declared on this node; sub-plugs are created as needed.
   * @throws SerializationError on a plug the node does not declare
   */
  restore(record: NodeRecord): void {
    Object.assign(this.metadata, record.metadata);
    this.restorePlugs(this.inputPlugs, record.inputs, 'inputs');
    this.restorePlugs(this.outputPlugs, record.outputs, 'outputs');
    if (record.stats) {
      this.lastStats = { evalTime: record.stats.eval_time, startTime: record.stats.start_time };
    }
  }

  /**
   * Takes over the outputs of a record evaluated elsewhere, as if this node
   * had been evaluated in process
   */
  mergeEvaluation(record: NodeRecord): NodeOutputs {
    if (record.identifier !== this.identifier) {
      throw new SerializationError(
        `Record '${record.identifier}' cannot be merged into node '${this.identifier}'`,
        'identifier'
      );
    }

    const outputs: NodeOutputs = {};
    Object.entries(record.outputs).forEach(([name, plugRecord]) => {
      const plug = this.outputPlugs.get(name);
      if (!plug) {
        throw new SerializationError(`Node '${this.name}' has no output '${name}'`, `outputs.${name}`);
      }
      const subEntries = Object.entries(plugRecord.sub_plugs);
      if (subEntries.length > 0) {
        subEntries.forEach(([key, sub]) => {
          plug.sub(key).setValue(sub.value);
          outputs[`${name}${SUB_PLUG_SEPARATOR}${key}`] = sub.value;
        });
      } else {
        plug.setValue(plugRecord.value);
        outputs[name] = plugRecord.value;
      }
    });

    const stats = record.stats
      ? { evalTime: record.stats.eval_time, startTime: record.stats.start_time }
      : { evalTime: 0, startTime: Date.now() };
    this.finish(stats);
    this.events.emit(NodeEventType.EVALUATION_FINISHED, this, outputs);
    return outputs;
  }

  toString(): string {
    return `${this.name} (${this.identifier})`;
  }

  private finish(stats: NodeStats): void {
    this.inputPlugs.forEach(plug => plug.markClean());
    this.allOutputs().forEach(plug => plug.markClean());
    this.evaluated = true;
    this.lastStats = stats;
  }

  private applyOutputs(result: unknown): NodeOutputs {
    if (!isPlainRecord(result)) {
      throw new EvaluationError(
        this.identifier,
        `Node '${this.name}' must return a mapping of output values`
      );
    }

    const values: Record<string, unknown> = result;

    // Validate every key before writing any value
    const targets = Object.keys(values).map(key => {
      const [rootName, subKey] = this.splitPath(key);
      const root = this.outputPlugs.get(rootName);
      if (!root) {
        throw new EvaluationError(
          this.identifier,
          `Node '${this.name}' returned undeclared output '${key}'`
        );
      }
      if (subKey !== undefined && !isValidSubKey(subKey)) {
        throw new EvaluationError(
          this.identifier,
          `Node '${this.name}' returned invalid output path '${key}'`
        );
      }
      return { key, root, subKey };
    });

    const outputs: NodeOutputs = {};
    targets.forEach(({ key, root, subKey }) => {
      const plug = subKey === undefined ? root : root.sub(subKey);
      plug.setValue(values[key]);
      outputs[key] = values[key];
    });
    return outputs;
  }

  private restorePlugs(
    plugs: ReadonlyMap<string, InputPlug | OutputPlug>,
    records: Record<string, PlugRecord>,
    section: string
  ): void {
    Object.entries(records).forEach(([name, plugRecord]) => {
      const plug = plugs.get(name);
      if (!plug) {
        throw new SerializationError(
          `Node type '${this.type}' does not declare plug '${name}'`,
          `${section}.${name}`
        );
      }
      Object.entries(plugRecord.sub_plugs).forEach(([key, sub]) => {
        plug.sub(key).restoreValue(sub.value);
      });
      plug.restoreValue(plugRecord.value);
      if (plug instanceof InputPlug && plugRecord.connections.length > 0) {
        plug.restoreWholeConnection();
      }
    });
  }

  private splitPath(path: string): [string, string | undefined] {
    const index = path.indexOf(SUB_PLUG_SEPARATOR);
    if (index < 0) {
      return [path, undefined];
    }
    return [path.slice(0, index), path.slice(index + 1)];
  }

  private assertFreePlugName(name: string, plugs: ReadonlyMap<string, Plug>): void {
    if (name.length === 0 || name.includes(SUB_PLUG_SEPARATOR)) {
      throw new GraphError(`Invalid plug name '${name}' on node '${this.name}'`);
    }
    if (plugs.has(name)) {
      throw new GraphError(`Node '${this.name}' already has a plug named '${name}'`);
    }
  }

  private walk(next: (node: Node) => Set<Node>): Node[] {
    const seen = new Map<string, Node>();
    const stack = [...next(this)];
    while (stack.length > 0) {
      const node = stack.shift();
      if (!node || seen.has(node.identifier)) {
        continue;
      }
      seen.set(node.identifier, node);
      stack.push(...next(node));
    }
    return [...seen.values()];
  }
}
