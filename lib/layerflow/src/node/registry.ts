import { NodeOptions } from '../types/node-definition';
import { NodeRecord } from '../types/records';
import { SerializationError } from '../utils/errors';
import type { NodeDefinition } from './function-node';
import type { Node } from './node';

/**
 * Creates a node of one type. The record is passed on deserialization for
 * types that need more than their plugs restored.
 */
export type NodeFactory = (options: NodeOptions, record?: NodeRecord) => Node;

/**
 * Maps a type name to its factory
 */
export type TypeResolver = (type: string) => NodeFactory | undefined;

export type NodeClass = new (options?: NodeOptions) => Node;

/**
 * Explicit type name to factory registry, populated at process start and
 * consulted on deserialization
 */
export class NodeTypeRegistry {
  private readonly factories = new Map<string, NodeFactory>();

  /**
   * Registers a factory
   * @throws Error if the type is already registered
   */
  register(type: string, factory: NodeFactory): this {
    if (this.factories.has(type)) {
      throw new Error(`Node type '${type}' is already registered`);
    }
    this.factories.set(type, factory);
    return this;
  }

  /**
   * Registers a node class under its class name
   */
  registerNodeClass(nodeClass: NodeClass, type: string = nodeClass.name): this {
    return this.register(type, options => new nodeClass(options));
  }

  registerDefinition(definition: NodeDefinition): this {
    return this.register(definition.type, options => definition.create(options));
  }

  /**
   * Gets factory by type
   * @throws SerializationError if type not registered
   */
  get(type: string): NodeFactory {
    const factory = this.factories.get(type);
    if (!factory) {
      throw new SerializationError(`Unknown node type: ${type}`, 'type');
    }
    return factory;
  }

  has(type: string): boolean {
    return this.factories.has(type);
  }

  types(): string[] {
    return [...this.factories.keys()];
  }

  public get size(): number {
    return this.factories.size;
  }

  clear(): void {
    this.factories.clear();
  }

  /**
   * Resolver view of the registry
   */
  readonly resolve: TypeResolver = type => this.factories.get(type);
}
