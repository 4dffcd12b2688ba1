import { NodeRunner } from '../execution/node-runner';
import { WorkerPool, defaultWorkerCount } from '../execution/worker-pool';
import type { Graph } from '../graph/graph';
import type { Node } from '../node/node';
import { LayerContext, WorkerPoolEvaluatorOptions } from '../types/evaluator-options';
import { NodeEventType } from '../types/node-definition';
import { GraphError } from '../utils/errors';
import { Evaluator } from './evaluator';
import { runBounded } from './run-bounded';

/**
 * Evaluates each node of a layer from its record, away from the in-process
 * node: the node and its direct upstream nodes are serialized, a runner
 * evaluates the copy, and the returned outputs are merged back.
 *
 * The default runner is a worker-thread pool created for the run and
 * terminated after it. An injected runner (a remote farm adapter, or
 * `InProcessNodeRunner`) is used as is and left open.
 *
 * One evaluator may run several graphs at once; each run keeps its own
 * runner. A graph can only be in one run of the same evaluator at a time.
 */
export class WorkerPoolEvaluator extends Evaluator {
  private readonly maxWorkers: number;
  private readonly acquireRunner: () => NodeRunner;
  private readonly ownsRunner: boolean;
  private readonly activeRunners = new Map<Graph, NodeRunner>();

  constructor(options: WorkerPoolEvaluatorOptions = {}) {
    super(options);
    this.maxWorkers = options.maxWorkers ?? defaultWorkerCount();

    const { runner, registryModule } = options;
    if (runner) {
      this.acquireRunner = () => runner;
      this.ownsRunner = false;
    } else if (registryModule) {
      this.acquireRunner = () =>
        new WorkerPool({
          registryModule,
          maxWorkers: this.maxWorkers,
          taskTimeout: options.taskTimeout,
          logger: options.logger,
        });
      this.ownsRunner = true;
    } else {
      throw new GraphError('WorkerPoolEvaluator needs a registryModule or a runner');
    }
  }

  protected override async setUp(graph: Graph): Promise<void> {
    if (this.activeRunners.has(graph)) {
      throw new GraphError(`Graph '${graph.name}' is already being evaluated by this evaluator`);
    }
    this.activeRunners.set(graph, this.acquireRunner());
  }

  protected override async tearDown(graph: Graph): Promise<void> {
    const runner = this.activeRunners.get(graph);
    this.activeRunners.delete(graph);
    if (runner && this.ownsRunner) {
      await runner.close?.();
    }
  }

  protected async evaluateLayer(nodes: readonly Node[], context: LayerContext): Promise<void> {
    const runner = this.activeRunners.get(context.graph);
    if (!runner) {
      throw new GraphError(`Graph '${context.graph.name}' is not being evaluated by this evaluator`);
    }
    await runBounded(nodes, this.maxWorkers, node => this.dispatch(runner, node));
  }

  private async dispatch(runner: NodeRunner, node: Node): Promise<void> {
    node.events.emit(NodeEventType.EVALUATION_STARTED, node);
    try {
      const record = await runner.run({
        record: node.serialize(),
        upstream: [...node.parents].map(parent => parent.serialize()),
      });
      const outputs = node.mergeEvaluation(record);
      this.reportEvaluated(node, outputs);
    } catch (error) {
      const evaluationError = this.reportFailed(node, error);
      this.logger.error(evaluationError.message);
      node.events.emit(NodeEventType.EVALUATION_EXCEPTION, node, evaluationError);
      throw evaluationError;
    }
  }
}
