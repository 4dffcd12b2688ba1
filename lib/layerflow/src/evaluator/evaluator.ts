import { HookManager } from '../engine/hook-manager';
import type { Graph } from '../graph/graph';
import type { Node } from '../node/node';
import {
  EvaluationRunOptions,
  EvaluatorEventHandlers,
  EvaluatorEventType,
  EvaluatorOptions,
  LayerContext,
} from '../types/evaluator-options';
import { ILogger } from '../types/logger';
import { NodeEventType, NodeOutputs } from '../types/node-definition';
import { EvaluationError, isEvaluationError } from '../utils/errors';
import { LoggerManager } from '../utils/logging';

/**
 * Strategy executing a graph layer by layer.
 *
 * The base class owns the layer barrier: a layer is handed to
 * `evaluateLayer` only after the previous one has settled. Subclasses decide
 * how the nodes of one layer run and may hook into the run for tracing
 * without touching the scheduling.
 */
export abstract class Evaluator {
  public readonly events = new HookManager<EvaluatorEventHandlers>();

  protected readonly options: Readonly<EvaluatorOptions>;

  constructor(options: EvaluatorOptions = {}) {
    this.options = { ...options };
  }

  protected get logger(): ILogger {
    return this.options.logger ?? LoggerManager.getInstance().getLogger();
  }

  /**
   * Evaluates every non-omitted node of the graph in layer order
   * @throws CycleDetectedError before any node runs if the graph has a cycle
   * @throws EvaluationError of the first failing node; later layers are not run
   */
  async evaluate(graph: Graph, runOptions: EvaluationRunOptions = {}): Promise<void> {
    const skipClean = runOptions.skipClean ?? this.options.skipClean ?? false;
    const layers = graph.computeLayers();

    this.logger.logEvent('evaluator', 'run-started', {
      evaluator: this.constructor.name,
      graph: graph.name,
      layers: layers.length,
    });
    this.events.emit(EvaluatorEventType.RUN_STARTED, graph);

    await this.setUp(graph);
    try {
      for (let index = 0; index < layers.length; index++) {
        const nodes = this.selectNodes(layers[index], skipClean);
        const context: LayerContext = { graph, index, layerCount: layers.length };

        this.onLayerStarted(nodes, context);
        this.events.emit(EvaluatorEventType.LAYER_STARTED, nodes, context);

        if (nodes.length > 0) {
          await this.evaluateLayer(nodes, context);
        }

        this.onLayerFinished(nodes, context);
        this.events.emit(EvaluatorEventType.LAYER_FINISHED, nodes, context);
      }
    } finally {
      await this.tearDown(graph);
    }

    this.logger.logEvent('evaluator', 'run-finished', {
      evaluator: this.constructor.name,
      graph: graph.name,
    });
    this.events.emit(EvaluatorEventType.RUN_FINISHED, graph);
  }

  /**
   * Runs the nodes of one layer. Must not resolve before every node it
   * started has settled.
   */
  protected abstract evaluateLayer(nodes: readonly Node[], context: LayerContext): Promise<void>;

  /**
   * Evaluates a single node in process and reports the outcome
   */
  protected async evaluateNode(node: Node): Promise<NodeOutputs> {
    try {
      const outputs = await node.evaluate();
      this.reportEvaluated(node, outputs);
      return outputs;
    } catch (error) {
      throw this.reportFailed(node, error);
    }
  }

  protected reportEvaluated(node: Node, outputs: NodeOutputs): void {
    this.onNodeFinished(node, outputs);
    this.events.emit(EvaluatorEventType.NODE_EVALUATED, node, outputs);
  }

  /**
   * Emits the failure and returns the error to rethrow
   */
  protected reportFailed(node: Node, error: unknown): EvaluationError {
    const evaluationError = isEvaluationError(error)
      ? error
      : EvaluationError.fromCause(node.identifier, error);
    this.events.emit(EvaluatorEventType.NODE_FAILED, node, evaluationError);
    return evaluationError;
  }

  /**
   * Called once before the first layer
   */
  protected async setUp(_graph: Graph): Promise<void> {}

  /**
   * Called once after the run, whether it succeeded or not
   */
  protected async tearDown(_graph: Graph): Promise<void> {}

  protected onLayerStarted(_nodes: readonly Node[], _context: LayerContext): void {}

  protected onLayerFinished(_nodes: readonly Node[], _context: LayerContext): void {}

  protected onNodeFinished(_node: Node, _outputs: NodeOutputs): void {}

  /**
   * Drops omitted nodes, and clean nodes when only dirty ones are wanted.
   * Runs at layer time so dirtiness reflects the layers already evaluated.
   */
  private selectNodes(layer: readonly Node[], skipClean: boolean): Node[] {
    return layer.filter(node => {
      if (node.omit) {
        this.logger.logEvent('evaluator', 'node-omitted', { identifier: node.identifier });
        node.events.emit(NodeEventType.EVALUATION_OMITTED, node);
        return false;
      }
      if (skipClean && !node.isDirty) {
        this.logger.logEvent('evaluator', 'node-clean', { identifier: node.identifier });
        return false;
      }
      return true;
    });
  }
}
