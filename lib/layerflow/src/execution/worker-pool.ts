import { Worker } from 'worker_threads';
import * as os from 'os';
import * as path from 'path';
import { ILogger } from '../types/logger';
import { NodeRecord } from '../types/records';
import { WorkerPoolError, deserializeError, getErrorMessage } from '../utils/errors';
import { generateUuid } from '../utils/id';
import { LoggerManager } from '../utils/logging';
import { NodeRunner, NodeTask } from './node-runner';
import {
  RunTaskMessage,
  WorkerInitData,
  WorkerReply,
  isReadyMessage,
  parseWorkerReply,
} from './worker-protocol';

export interface WorkerPoolOptions {
  /**
   * Absolute path of the module exporting the node type registry
   */
  registryModule: string;
  maxWorkers?: number;
  /**
   * Task timeout in milliseconds
   */
  taskTimeout?: number;
  logger?: ILogger;
}

interface PendingTask {
  resolve: (record: NodeRecord) => void;
  reject: (reason: Error) => void;
  timeoutId: NodeJS.Timeout;
  worker: Worker;
}

export const DEFAULT_TASK_TIMEOUT = 30000;

/**
 * Determines optimal number of workers
 */
export function defaultWorkerCount(): number {
  // Leave one core for main thread
  return Math.max(1, os.cpus().length - 1);
}

/**
 * Pool of worker threads evaluating node records.
 *
 * Each worker loads the node type registry once, then turns task records
 * into evaluated records. Nothing is shared with the workers: tasks and
 * results are copied through messages.
 */
export class WorkerPool implements NodeRunner {
  private workers: Worker[] = [];
  private readonly pendingTasks = new Map<string, PendingTask>();
  private readonly readyWorkers = new WeakSet<Worker>();
  private readonly maxWorkers: number;
  private readonly taskTimeoutMs: number;
  private readonly workerFilePath: string;
  private readonly initData: WorkerInitData;
  private readonly logger: ILogger;
  private nextWorker = 0;
  private terminated = false;

  constructor(options: WorkerPoolOptions) {
    this.logger = options.logger ?? LoggerManager.getInstance().getLogger();
    this.maxWorkers = Math.max(1, options.maxWorkers ?? defaultWorkerCount());
    this.taskTimeoutMs =
      options.taskTimeout && options.taskTimeout > 0 ? options.taskTimeout : DEFAULT_TASK_TIMEOUT;
    // Sources spawn the TypeScript entry, builds the compiled one
    this.workerFilePath = path.join(__dirname, `node-worker${path.extname(__filename)}`);
    this.initData = { registryModule: options.registryModule, logLevel: this.logger.getLevel() };

    this.logger.debug(`[WorkerPool] Initializing with ${this.maxWorkers} workers`);
    for (let i = 0; i < this.maxWorkers; i++) {
      this.createWorker();
    }
  }

  get size(): number {
    return this.workers.length;
  }

  get pendingCount(): number {
    return this.pendingTasks.size;
  }

  /**
   * Sends a task to the next worker
   * @throws WorkerPoolError on timeout, worker crash or termination
   * @throws EvaluationError when the node failed inside the worker
   */
  run(task: NodeTask): Promise<NodeRecord> {
    return new Promise((resolve, reject) => {
      const worker = this.pickWorker();
      if (!worker) {
        reject(new WorkerPoolError('No available workers'));
        return;
      }

      const taskId = generateUuid();
      const timeoutId = setTimeout(() => {
        if (this.pendingTasks.delete(taskId)) {
          reject(
            new WorkerPoolError(`Task execution timed out after ${this.taskTimeoutMs}ms`, taskId)
          );
        }
      }, this.taskTimeoutMs);

      this.pendingTasks.set(taskId, { resolve, reject, timeoutId, worker });

      try {
        const message: RunTaskMessage = { id: taskId, type: 'run', task };
        worker.postMessage(message);
      } catch (error) {
        clearTimeout(timeoutId);
        this.pendingTasks.delete(taskId);
        reject(new WorkerPoolError(`Failed to post task: ${getErrorMessage(error)}`, taskId));
      }
    });
  }

  close(): Promise<void> {
    return this.terminate();
  }

  /**
   * Rejects pending tasks and stops every worker
   */
  async terminate(): Promise<void> {
    this.terminated = true;

    for (const [taskId, task] of this.pendingTasks) {
      clearTimeout(task.timeoutId);
      task.reject(new WorkerPoolError('Worker pool terminated', taskId));
    }
    this.pendingTasks.clear();

    const workersToTerminate = this.workers;
    this.workers = [];
    await Promise.allSettled(workersToTerminate.map(worker => worker.terminate()));
    this.logger.debug(`[WorkerPool] Terminated ${workersToTerminate.length} workers`);
  }

  private pickWorker(): Worker | undefined {
    if (this.terminated || this.workers.length === 0) {
      return undefined;
    }
    const worker = this.workers[this.nextWorker % this.workers.length];
    this.nextWorker = (this.nextWorker + 1) % this.workers.length;
    return worker;
  }

  private spawn(): Worker {
    if (path.extname(this.workerFilePath) === '.ts') {
      const bootstrap = [
        `require(${JSON.stringify(require.resolve('tsx/cjs'))});`,
        `require(${JSON.stringify(this.workerFilePath)});`,
      ].join('\n');
      return new Worker(bootstrap, { eval: true, workerData: this.initData });
    }
    return new Worker(this.workerFilePath, { workerData: this.initData });
  }

  private createWorker(): Worker {
    const worker = this.spawn();

    // Idle workers must not keep the process alive
    worker.unref();

    worker.on('message', (message: unknown) => {
      if (isReadyMessage(message)) {
        this.readyWorkers.add(worker);
        return;
      }
      this.handleReply(message);
    });

    worker.on('error', error => {
      this.logger.error(`[WorkerPool] Worker error: ${error.message}`, error);
      this.discardWorker(worker, `Worker crashed: ${error.message}`);
    });

    worker.on('exit', code => {
      if (!this.terminated && this.workers.includes(worker)) {
        this.discardWorker(worker, `Worker exited with code ${code}`);
      }
    });

    this.workers.push(worker);
    return worker;
  }

  private handleReply(message: unknown): void {
    let reply: WorkerReply | null;
    try {
      reply = parseWorkerReply(message);
    } catch (error) {
      this.logger.error(`[WorkerPool] Malformed worker reply: ${getErrorMessage(error)}`);
      return;
    }
    if (!reply) {
      return;
    }

    const pendingTask = this.pendingTasks.get(reply.id);
    if (!pendingTask) {
      return;
    }
    clearTimeout(pendingTask.timeoutId);
    this.pendingTasks.delete(reply.id);

    if (reply.type === 'result') {
      pendingTask.resolve(reply.record);
    } else {
      pendingTask.reject(deserializeError(reply.error));
    }
  }

  /**
   * Rejects the tasks of a dead worker and replaces it. A worker that died
   * before loading its registry is not replaced, the next one would fail too.
   */
  private discardWorker(worker: Worker, reason: string): void {
    for (const [taskId, task] of this.pendingTasks) {
      if (task.worker === worker) {
        clearTimeout(task.timeoutId);
        task.reject(new WorkerPoolError(reason, taskId));
        this.pendingTasks.delete(taskId);
      }
    }

    this.workers = this.workers.filter(w => w !== worker);

    if (!this.terminated && this.readyWorkers.has(worker) && this.workers.length < this.maxWorkers) {
      try {
        this.createWorker();
      } catch (error) {
        this.logger.error(`[WorkerPool] Failed to recreate worker: ${getErrorMessage(error)}`);
      }
    }
  }
}
