import { GraphNode } from '../graph/graph-node';
import { NodeTypeRegistry } from '../node/registry';
import { ValueNode } from '../node/value-node';
import { SerializationError } from '../utils/errors';
import { deserializeGraph } from './serializer';

/**
 * Registry holding the built-in node types: `ValueNode` and `GraphNode`.
 * A `GraphNode` record rebuilds its inner graph with the same registry.
 */
export function createDefaultRegistry(): NodeTypeRegistry {
  const registry = new NodeTypeRegistry();
  registry.registerNodeClass(ValueNode);
  registry.register('GraphNode', (options, record) => {
    if (!record?.graph) {
      throw new SerializationError('GraphNode record carries no graph', 'graph');
    }
    return new GraphNode(deserializeGraph(record.graph, registry), options);
  });
  return registry;
}
