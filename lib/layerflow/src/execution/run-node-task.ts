import type { Node } from '../node/node';
import { NodeTypeRegistry, TypeResolver } from '../node/registry';
import { deserializeNode, resolveConnections } from '../serialization/serializer';
import { NodeRecord } from '../types/records';
import { SerializationError } from '../utils/errors';
import { NodeTask } from './node-runner';

/**
 * Worker side of remote evaluation: rebuilds the node and its upstream
 * nodes, wires them, evaluates the node and serializes the result
 * @throws SerializationError when an upstream record is missing from the task
 * @throws EvaluationError when the node fails
 */
export async function runNodeTask(
  task: NodeTask,
  resolver: TypeResolver | NodeTypeRegistry
): Promise<NodeRecord> {
  const { node, connections } = deserializeNode(task.record, resolver);

  const upstream = new Map<string, Node>();
  task.upstream.forEach(record => {
    const restored = deserializeNode(record, resolver).node;
    upstream.set(restored.identifier, restored);
  });

  const unresolved = resolveConnections(node, connections, identifier => upstream.get(identifier));
  if (unresolved.length > 0) {
    throw new SerializationError(
      `Upstream node '${unresolved[0].identifier}' of '${node.identifier}' is missing from the task`,
      'upstream'
    );
  }

  await node.evaluate();
  return node.serialize();
}
