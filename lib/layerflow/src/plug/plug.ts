import type { Node } from '../node/node';
import {
  GraphError,
  InvalidConnectionError,
  NotConnectedError,
  PlugAlreadyConnectedError,
} from '../utils/errors';
import { isPlainRecord } from '../utils/json';

export type PlugDirection = 'input' | 'output';

/**
 * Separator between a composite plug name and a sub-plug key
 */
export const SUB_PLUG_SEPARATOR = '.';

/**
 * Connection point owned by exactly one node
 */
export abstract class Plug {
  abstract readonly direction: PlugDirection;

  protected value: unknown = null;
  protected dirty = true;

  protected constructor(
    public readonly name: string,
    public readonly node: Node
  ) {}

  /**
   * `node.plug` path used in messages
   */
  get path(): string {
    return `${this.node.name}${SUB_PLUG_SEPARATOR}${this.name}`;
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  markDirty(): void {
    this.dirty = true;
  }

  markClean(): void {
    this.dirty = false;
  }

  /**
   * Plugs on the other side of this plug's connections
   */
  abstract get connections(): readonly Plug[];

  /**
   * Value held by this plug itself, without composite assembly
   * @internal
   */
  get ownValue(): unknown {
    return this.value;
  }

  /**
   * Writes a value read from a record, bypassing propagation and
   * connection checks
   * @internal
   */
  restoreValue(value: unknown): void {
    this.value = value;
  }

  abstract getValue(): unknown;

  abstract setValue(value: unknown): void;

  get isConnected(): boolean {
    return this.connections.length > 0;
  }

  /**
   * Connects to a plug of the opposite direction on another node.
   * `output.connect(input)` and `input.connect(output)` are the same operation.
   */
  connect(other: Plug): void {
    connectPlugs(this, other);
  }

  disconnect(other: Plug): void {
    disconnectPlugs(this, other);
  }

  toString(): string {
    return this.path;
  }
}

/**
 * Common behaviour of output roots and output sub-plugs
 */
export abstract class OutputPlugBase extends Plug {
  readonly direction = 'output';

  private readonly targets = new Set<InputPlugBase>();

  override get connections(): readonly InputPlugBase[] {
    return [...this.targets];
  }

  override getValue(): unknown {
    return this.value;
  }

  /**
   * Sets the value and pushes it into every connected input
   */
  override setValue(value: unknown): void {
    this.value = value;
    this.dirty = true;
    this.propagate();
  }

  /**
   * Pushes the current value into every connected input
   */
  propagate(): void {
    const value = this.getValue();
    this.targets.forEach(target => target.receive(value));
  }

  /** @internal */
  attach(target: InputPlugBase): void {
    this.targets.add(target);
  }

  /** @internal */
  detach(target: InputPlugBase): void {
    this.targets.delete(target);
  }
}

/**
 * Common behaviour of input roots and input sub-plugs
 */
export abstract class InputPlugBase extends Plug {
  readonly direction = 'input';

  private upstream: OutputPlugBase | null = null;

  override get connections(): readonly OutputPlugBase[] {
    return this.upstream ? [this.upstream] : [];
  }

  /**
   * Output plug feeding this input, if any
   */
  get source(): OutputPlugBase | null {
    return this.upstream;
  }

  override getValue(): unknown {
    return this.value;
  }

  /**
   * Authoring-time assignment, only valid for unconnected inputs
   */
  override setValue(value: unknown): void {
    if (this.upstream) {
      throw new InvalidConnectionError(
        `Cannot set value of '${this.path}': it is connected to '${this.upstream.path}'`,
        this.upstream.path,
        this.path
      );
    }
    this.value = value;
    this.dirty = true;
  }

  /**
   * Value pushed by the connected output during propagation
   * @internal
   */
  receive(value: unknown): void {
    this.value = value;
    this.dirty = true;
  }

  /** @internal */
  attach(source: OutputPlugBase): void {
    this.upstream = source;
  }

  /** @internal */
  detach(): void {
    this.upstream = null;
  }
}

export function isValidSubKey(key: string): boolean {
  return key.length > 0 && !key.includes(SUB_PLUG_SEPARATOR);
}

function validateSubKey(parent: Plug, key: string): void {
  if (!isValidSubKey(key)) {
    throw new GraphError(
      `Invalid sub-plug key '${key}' on '${parent.path}': keys must be non-empty and must not contain '${SUB_PLUG_SEPARATOR}'`
    );
  }
}

/**
 * Output root. Becomes composite once a sub-plug has been created on it.
 */
export class OutputPlug extends OutputPlugBase {
  private readonly subs = new Map<string, SubOutputPlug>();

  constructor(name: string, node: Node) {
    super(name, node);
  }

  get subPlugs(): ReadonlyMap<string, SubOutputPlug> {
    return this.subs;
  }

  get isComposite(): boolean {
    return this.subs.size > 0;
  }

  /**
   * Returns the sub-plug for `key`, creating it on first access
   */
  sub(key: string | number): SubOutputPlug {
    const subKey = String(key);
    let plug = this.subs.get(subKey);
    if (!plug) {
      validateSubKey(this, subKey);
      plug = new SubOutputPlug(subKey, this);
      this.subs.set(subKey, plug);
    }
    return plug;
  }

  /**
   * Composite outputs present the mapping of their sub-plug values
   */
  override getValue(): unknown {
    if (!this.isComposite) {
      return this.value;
    }
    const mapping: Record<string, unknown> = {};
    this.subs.forEach((plug, key) => {
      mapping[key] = plug.getValue();
    });
    return mapping;
  }

  /**
   * On a composite output a mapping is spread over the sub-plugs
   */
  override setValue(value: unknown): void {
    if (this.isComposite && isPlainRecord(value)) {
      Object.entries(value).forEach(([key, item]) => this.sub(key).setValue(item));
      return;
    }
    super.setValue(value);
  }
}

export class SubOutputPlug extends OutputPlugBase {
  constructor(
    public readonly key: string,
    public readonly parent: OutputPlug
  ) {
    super(`${parent.name}${SUB_PLUG_SEPARATOR}${key}`, parent.node);
  }

  /**
   * Also pushes the assembled mapping through whole-plug connections of the parent
   */
  override setValue(value: unknown): void {
    super.setValue(value);
    this.parent.propagate();
  }
}

/**
 * Input root. Becomes composite once a sub-plug has been created on it;
 * each sub-plug then takes its own connection.
 */
export class InputPlug extends InputPlugBase {
  private readonly subs = new Map<string, SubInputPlug>();
  private restoredWhole = false;

  constructor(name: string, node: Node, defaultValue: unknown = null) {
    super(name, node);
    this.value = defaultValue;
  }

  get subPlugs(): ReadonlyMap<string, SubInputPlug> {
    return this.subs;
  }

  get isComposite(): boolean {
    return this.subs.size > 0;
  }

  sub(key: string | number): SubInputPlug {
    const subKey = String(key);
    let plug = this.subs.get(subKey);
    if (!plug) {
      validateSubKey(this, subKey);
      plug = new SubInputPlug(subKey, this);
      this.subs.set(subKey, plug);
    }
    return plug;
  }

  /**
   * True while the root is fed by a whole-plug connection, wired or
   * carried over from a record
   */
  get receivesWhole(): boolean {
    return this.source !== null || this.restoredWhole;
  }

  /**
   * Marks the root as connected as a whole before the connection is wired
   * @internal
   */
  restoreWholeConnection(): void {
    this.restoredWhole = true;
  }

  override detach(): void {
    super.detach();
    this.restoredWhole = false;
  }

  /**
   * Received mapping when connected as a whole, assembled sub-plug values
   * when composite, own value otherwise
   */
  override getValue(): unknown {
    if (this.receivesWhole || !this.isComposite) {
      return this.value;
    }
    const mapping: Record<string, unknown> = {};
    this.subs.forEach((plug, key) => {
      mapping[key] = plug.getValue();
    });
    return mapping;
  }

  /**
   * On a composite input a mapping is spread over the sub-plugs
   * @throws GraphError for any other value on a composite input
   */
  override setValue(value: unknown): void {
    if (this.isComposite && !this.receivesWhole) {
      if (!isPlainRecord(value)) {
        throw new GraphError(
          `Cannot set '${this.path}' to a value that is not a mapping: the plug is composite`
        );
      }
      Object.entries(value).forEach(([key, item]) => this.sub(key).setValue(item));
      return;
    }
    super.setValue(value);
  }

  override get isDirty(): boolean {
    return this.dirty || [...this.subs.values()].some(plug => plug.isDirty);
  }

  override markClean(): void {
    super.markClean();
    this.subs.forEach(plug => plug.markClean());
  }
}

export class SubInputPlug extends InputPlugBase {
  constructor(
    public readonly key: string,
    public readonly parent: InputPlug
  ) {
    super(`${parent.name}${SUB_PLUG_SEPARATOR}${key}`, parent.node);
  }
}

function isCompositeRoot(plug: Plug): boolean {
  return (plug instanceof InputPlug || plug instanceof OutputPlug) && plug.isComposite;
}

function orient(a: Plug, b: Plug): [OutputPlugBase, InputPlugBase] {
  if (a instanceof OutputPlugBase && b instanceof InputPlugBase) {
    return [a, b];
  }
  if (a instanceof InputPlugBase && b instanceof OutputPlugBase) {
    return [b, a];
  }
  throw new InvalidConnectionError(
    `Cannot connect ${a.direction} '${a.path}' to ${b.direction} '${b.path}': connections go from an output to an input`,
    a.path,
    b.path
  );
}

/**
 * Finds a connection that already occupies `target`, either on the plug itself,
 * on its parent root, or on one of its sub-plugs
 */
function occupyingSource(target: InputPlugBase): OutputPlugBase | null {
  if (target.source) {
    return target.source;
  }
  if (target instanceof SubInputPlug) {
    return target.parent.source;
  }
  if (target instanceof InputPlug) {
    for (const sub of target.subPlugs.values()) {
      if (sub.source) {
        return sub.source;
      }
    }
  }
  return null;
}

/**
 * Validates and registers a connection on both sides, then pushes the
 * current output value into the input
 */
export function connectPlugs(a: Plug, b: Plug): void {
  const [source, target] = orient(a, b);

  if (source.node === target.node) {
    throw new InvalidConnectionError(
      `Cannot connect '${source.path}' to '${target.path}': both plugs belong to the same node`,
      source.path,
      target.path
    );
  }

  if (isCompositeRoot(source) !== isCompositeRoot(target)) {
    throw new InvalidConnectionError(
      `Cannot connect '${source.path}' to '${target.path}': a composite plug connects only to a composite plug; connect sub-plugs individually`,
      source.path,
      target.path
    );
  }

  if (target.source === source) {
    return;
  }

  const existing = occupyingSource(target);
  if (existing) {
    throw new PlugAlreadyConnectedError(target.path, existing.path);
  }

  source.attach(target);
  target.attach(source);
  target.receive(source.getValue());
  source.markDirty();
}

/**
 * Removes the connection from both sides
 * @throws NotConnectedError if the plugs are not connected
 */
export function disconnectPlugs(a: Plug, b: Plug): void {
  const [source, target] = orient(a, b);

  if (target.source !== source) {
    throw new NotConnectedError(source.path, target.path);
  }

  source.detach(target);
  target.detach();
  source.markDirty();
  target.markDirty();
}
