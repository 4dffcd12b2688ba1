import { Graph } from '../graph/graph';
import type { Node } from '../node/node';
import { NodeTypeRegistry, TypeResolver } from '../node/registry';
import { InputPlugGroup } from '../plug/plug-group';
import { InputPlugBase, SUB_PLUG_SEPARATOR } from '../plug/plug';
import { GraphRecord, NodeRecord } from '../types/records';
import { GraphError, SerializationError } from '../utils/errors';

/**
 * Upstream reference of one input plug, not yet wired
 */
export interface ConnectionReference {
  /** Input plug path on the deserialized node */
  readonly plug: string;
  /** Identifier of the upstream node */
  readonly identifier: string;
  /** Output plug path on the upstream node */
  readonly upstreamPlug: string;
}

export interface DeserializedNode {
  readonly node: Node;
  readonly connections: ConnectionReference[];
}

export interface ExternalConnection extends ConnectionReference {
  readonly node: Node;
}

export interface RestoredGraph {
  readonly graph: Graph;
  /**
   * References to nodes outside the record, left for the caller to wire
   */
  readonly external: ExternalConnection[];
}

export type NodeLookup = (identifier: string) => Node | undefined;

function resolverOf(resolver: TypeResolver | NodeTypeRegistry): TypeResolver {
  return typeof resolver === 'function' ? resolver : resolver.resolve;
}

/**
 * Rebuilds a node from its record. Metadata and plug values are restored;
 * upstream connections are returned as references, not wired.
 * @throws SerializationError for an unknown type or a plug the type does not declare
 */
export function deserializeNode(
  record: NodeRecord,
  resolver: TypeResolver | NodeTypeRegistry
): DeserializedNode {
  const factory = resolverOf(resolver)(record.type);
  if (!factory) {
    throw new SerializationError(`Unknown node type: ${record.type}`, 'type');
  }

  const node = factory(
    { name: record.name, identifier: record.identifier, metadata: record.metadata },
    record
  );
  if (node.identifier !== record.identifier) {
    throw new SerializationError(
      `Factory for '${record.type}' did not keep identifier '${record.identifier}'`,
      'identifier'
    );
  }
  node.restore(record);

  const connections: ConnectionReference[] = [];
  Object.entries(record.inputs).forEach(([name, plugRecord]) => {
    plugRecord.connections.forEach(ref => {
      connections.push({ plug: name, identifier: ref.identifier, upstreamPlug: ref.plug });
    });
    Object.entries(plugRecord.sub_plugs).forEach(([key, sub]) => {
      sub.connections.forEach(ref => {
        connections.push({
          plug: `${name}${SUB_PLUG_SEPARATOR}${key}`,
          identifier: ref.identifier,
          upstreamPlug: ref.plug,
        });
      });
    });
  });

  return { node, connections };
}

/**
 * Wires connection references against the caller's node store
 * @returns References whose upstream node the lookup did not know
 */
export function resolveConnections(
  node: Node,
  connections: readonly ConnectionReference[],
  lookup: NodeLookup
): ConnectionReference[] {
  const unresolved: ConnectionReference[] = [];
  connections.forEach(reference => {
    const upstream = lookup(reference.identifier);
    if (!upstream) {
      unresolved.push(reference);
      return;
    }
    try {
      upstream.plug(reference.upstreamPlug, 'output').connect(node.plug(reference.plug, 'input'));
    } catch (error) {
      if (error instanceof GraphError) {
        throw new SerializationError(error.message, `inputs.${reference.plug}.connections`);
      }
      throw error;
    }
  });
  return unresolved;
}

/**
 * Rebuilds a graph, its intra-graph edges and its promoted plugs
 */
export function restoreGraph(
  record: GraphRecord,
  resolver: TypeResolver | NodeTypeRegistry
): RestoredGraph {
  const graph = new Graph(record.name);
  const restored = record.nodes.map(nodeRecord => deserializeNode(nodeRecord, resolver));
  restored.forEach(({ node }) => graph.addNode(node));

  const lookup: NodeLookup = identifier => graph.getNodeByIdentifier(identifier);
  const external: ExternalConnection[] = [];
  restored.forEach(({ node, connections }) => {
    resolveConnections(node, connections, lookup).forEach(reference => {
      external.push({ ...reference, node });
    });
  });

  Object.entries(record.inputs ?? {}).forEach(([name, refs]) => {
    const plugs = refs.map((ref, index): InputPlugBase => {
      const node = lookup(ref.identifier);
      if (!node) {
        throw new SerializationError(
          `Promoted input refers to unknown node '${ref.identifier}'`,
          `inputs.${name}[${index}]`
        );
      }
      return node.plug(ref.plug, 'input');
    });
    graph.promoteInput(plugs.length === 1 ? plugs[0] : new InputPlugGroup(name, plugs), name);
  });

  Object.entries(record.outputs ?? {}).forEach(([name, ref]) => {
    const node = lookup(ref.identifier);
    if (!node) {
      throw new SerializationError(
        `Promoted output refers to unknown node '${ref.identifier}'`,
        `outputs.${name}`
      );
    }
    graph.promoteOutput(node.plug(ref.plug, 'output'), name);
  });

  return { graph, external };
}

/**
 * Rebuilds a standalone graph from its record
 */
export function deserializeGraph(
  record: GraphRecord,
  resolver: TypeResolver | NodeTypeRegistry
): Graph {
  return restoreGraph(record, resolver).graph;
}
