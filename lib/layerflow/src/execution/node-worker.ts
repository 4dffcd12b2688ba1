import { parentPort, workerData } from 'worker_threads';
import { NodeTypeRegistry } from '../node/registry';
import { getErrorMessage, serializeError } from '../utils/errors';
import { isPlainRecord } from '../utils/json';
import { LoggerManager } from '../utils/logging';
import { runNodeTask } from './run-node-task';
import {
  ReadyMessage,
  RunTaskMessage,
  WorkerReply,
  parseRunTaskMessage,
  parseWorkerInitData,
} from './worker-protocol';

// Entry point of a pool worker: loads the node type registry named in the
// worker data, then evaluates every task record it receives.

type Port = NonNullable<typeof parentPort>;

function loadRegistry(modulePath: string): NodeTypeRegistry {
  const loaded: unknown = require(modulePath);
  if (isPlainRecord(loaded)) {
    const registry = [loaded.registry, loaded.default].find(
      (candidate): candidate is NodeTypeRegistry => candidate instanceof NodeTypeRegistry
    );
    if (registry) {
      return registry;
    }
  }
  throw new Error(
    `Module '${modulePath}' must export a NodeTypeRegistry as 'registry' or as default export`
  );
}

async function handleTask(
  port: Port,
  message: RunTaskMessage,
  registry: NodeTypeRegistry
): Promise<void> {
  let reply: WorkerReply;
  try {
    reply = { id: message.id, type: 'result', record: await runNodeTask(message.task, registry) };
  } catch (error) {
    reply = { id: message.id, type: 'error', error: serializeError(error) };
  }
  port.postMessage(reply);
}

function handleMessage(port: Port, value: unknown, registry: NodeTypeRegistry): void {
  let message: RunTaskMessage | null;
  try {
    message = parseRunTaskMessage(value);
  } catch (error) {
    LoggerManager.error(`[node-worker] Malformed task: ${getErrorMessage(error)}`);
    if (isPlainRecord(value) && typeof value.id === 'string') {
      const reply: WorkerReply = { id: value.id, type: 'error', error: serializeError(error) };
      port.postMessage(reply);
    }
    return;
  }

  if (message) {
    void handleTask(port, message, registry);
  }
}

function start(): void {
  const port = parentPort;
  if (!port) {
    throw new Error('node-worker must run inside a worker thread');
  }

  const initData = parseWorkerInitData(workerData);
  LoggerManager.getInstance().getLogger().setLevel(initData.logLevel);
  const registry = loadRegistry(initData.registryModule);

  port.on('message', (value: unknown) => handleMessage(port, value, registry));

  const ready: ReadyMessage = { type: 'ready' };
  port.postMessage(ready);
}

start();
