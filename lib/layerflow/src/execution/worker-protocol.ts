import { parseNodeRecord } from '../serialization/record-parser';
import { LogLevel } from '../types/logger';
import { NodeRecord } from '../types/records';
import { SerializedError } from '../utils/errors';
import { isPlainRecord } from '../utils/json';
import { NodeTask } from './node-runner';

/**
 * Data every worker starts with
 */
export interface WorkerInitData {
  registryModule: string;
  logLevel: LogLevel;
}

export interface RunTaskMessage {
  id: string;
  type: 'run';
  task: NodeTask;
}

/**
 * Sent once by a worker after its registry has loaded
 */
export interface ReadyMessage {
  type: 'ready';
}

export type WorkerReply =
  | { id: string; type: 'result'; record: NodeRecord }
  | { id: string; type: 'error'; error: SerializedError };

export function parseWorkerInitData(value: unknown): WorkerInitData {
  if (!isPlainRecord(value) || typeof value.registryModule !== 'string') {
    throw new Error('Worker started without a registry module');
  }
  const requested = value.logLevel;
  const logLevel = Object.values(LogLevel).find(level => level === requested);
  return {
    registryModule: value.registryModule,
    logLevel: typeof logLevel === 'number' ? logLevel : LogLevel.INFO,
  };
}

export function isReadyMessage(value: unknown): value is ReadyMessage {
  return isPlainRecord(value) && value.type === 'ready';
}

export function parseRunTaskMessage(value: unknown): RunTaskMessage | null {
  if (!isPlainRecord(value) || value.type !== 'run' || typeof value.id !== 'string') {
    return null;
  }
  const task = value.task;
  if (!isPlainRecord(task) || !Array.isArray(task.upstream)) {
    return null;
  }
  return {
    id: value.id,
    type: 'run',
    task: {
      record: parseNodeRecord(task.record, 'task.record'),
      upstream: task.upstream.map((record: unknown, index) =>
        parseNodeRecord(record, `task.upstream[${index}]`)
      ),
    },
  };
}

export function parseWorkerReply(value: unknown): WorkerReply | null {
  if (!isPlainRecord(value) || typeof value.id !== 'string') {
    return null;
  }
  if (value.type === 'result') {
    return { id: value.id, type: 'result', record: parseNodeRecord(value.record) };
  }
  const error = value.error;
  if (
    value.type === 'error' &&
    isPlainRecord(error) &&
    typeof error.name === 'string' &&
    typeof error.message === 'string'
  ) {
    const cause = error.cause;
    return {
      id: value.id,
      type: 'error',
      error: {
        name: error.name,
        message: error.message,
        nodeIdentifier: typeof error.nodeIdentifier === 'string' ? error.nodeIdentifier : undefined,
        cause:
          isPlainRecord(cause) && typeof cause.name === 'string' && typeof cause.message === 'string'
            ? { name: cause.name, message: cause.message }
            : undefined,
      },
    };
  }
  return null;
}
