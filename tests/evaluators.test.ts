import { ConcurrentEvaluator } from '../lib/layerflow/src/evaluator/concurrent-evaluator';
import { Evaluator } from '../lib/layerflow/src/evaluator/evaluator';
import { createEvaluator } from '../lib/layerflow/src/evaluator/factory';
import { SequentialEvaluator } from '../lib/layerflow/src/evaluator/sequential-evaluator';
import { WorkerPoolEvaluator } from '../lib/layerflow/src/evaluator/worker-pool-evaluator';
import { InProcessNodeRunner } from '../lib/layerflow/src/execution/in-process-runner';
import { Graph } from '../lib/layerflow/src/graph/graph';
import { Node } from '../lib/layerflow/src/node/node';
import { ValueNode } from '../lib/layerflow/src/node/value-node';
import {
  EvaluationMode,
  EvaluatorEventType,
  LayerContext,
} from '../lib/layerflow/src/types/evaluator-options';
import { NodeEventType } from '../lib/layerflow/src/types/node-definition';
import { EvaluationError, GraphError } from '../lib/layerflow/src/utils/errors';
import {
  AddNode,
  DelayNode,
  DoubleNode,
  FailingNode,
  GatherNode,
  Multiply,
  SourceNode,
} from './utils/fixture-nodes';
import { registry } from './utils/fixture-registry';
import { Timeline } from './utils/test-helpers';

function buildPipeline() {
  const graph = new Graph('pipeline');
  const a = new SourceNode({ name: 'A', graph });
  const b = new DoubleNode({ name: 'B', graph });
  const product = Multiply.create({ name: 'product', graph });
  const sum = new AddNode({ name: 'sum', graph });

  a.output('x').setValue(5);
  a.output('x').connect(b.input('y'));
  b.output('result').connect(product.input('value'));
  product.input('factor').setValue(3);
  a.output('x').connect(sum.input('a'));
  b.output('result').connect(sum.input('b'));

  return { graph, a, b, product, sum };
}

function buildFanIn(delays: readonly number[]) {
  const graph = new Graph('fan-in');
  const producers = delays.map(
    (delay, index) =>
      new DelayNode({ name: `p${index}`, graph })
  );
  const gather = new GatherNode({ name: 'gather', graph });
  producers.forEach((producer, index) => {
    producer.input('value').setValue(index + 1);
    producer.input('delay').setValue(delays[index]);
    producer.output('value').connect(gather.input(['a', 'b', 'c', 'd'][index]));
  });
  return { graph, producers, gather };
}

const evaluators: Array<[string, () => Evaluator]> = [
  ['sequential', () => new SequentialEvaluator()],
  ['concurrent', () => new ConcurrentEvaluator({ maxConcurrency: 2 })],
  [
    'record runner',
    () => new WorkerPoolEvaluator({ runner: new InProcessNodeRunner(registry), maxWorkers: 2 }),
  ],
];

describe('Evaluators - results', () => {
  it.each(evaluators)('should evaluate the pipeline with the %s evaluator', async (_label, create) => {
    const { graph, b, product, sum } = buildPipeline();

    await graph.evaluate({ evaluator: create() });

    expect(b.output('result').getValue()).toBe(10);
    expect(product.output('product').getValue()).toBe(30);
    expect(sum.output('sum').getValue()).toBe(15);
    expect(graph.nodes.every(node => !node.isDirty)).toBe(true);
  });

  it('should evaluate sequentially by default', async () => {
    const { graph, sum } = buildPipeline();
    const order: string[] = [];
    graph.nodes.forEach(node =>
      node.events.on(NodeEventType.EVALUATION_FINISHED, finished => order.push(finished.name))
    );

    await graph.evaluate();

    expect(order).toEqual(['A', 'B', 'product', 'sum']);
    expect(sum.output('sum').getValue()).toBe(15);
  });

  it('should build the evaluator of a mode', async () => {
    const { graph, product } = buildPipeline();

    await graph.evaluate({ mode: EvaluationMode.CONCURRENT });

    expect(product.output('product').getValue()).toBe(30);
    expect(createEvaluator(EvaluationMode.SEQUENTIAL)).toBeInstanceOf(SequentialEvaluator);
    expect(createEvaluator(EvaluationMode.CONCURRENT)).toBeInstanceOf(ConcurrentEvaluator);
  });

  it('should reject a mode together with an evaluator', async () => {
    const { graph } = buildPipeline();

    await expect(
      graph.evaluate({ mode: EvaluationMode.SEQUENTIAL, evaluator: new SequentialEvaluator() })
    ).rejects.toThrow(GraphError);
  });

  it('should need a registry module or a runner for the worker pool', () => {
    expect(() => new WorkerPoolEvaluator()).toThrow(
      'WorkerPoolEvaluator needs a registryModule or a runner'
    );
  });
});

describe('Evaluators - overlapping runs', () => {
  it('should run several graphs at once on one record runner evaluator', async () => {
    const first = buildPipeline();
    const second = buildPipeline();
    second.a.output('x').setValue(2);
    const evaluator = new WorkerPoolEvaluator({ runner: new InProcessNodeRunner(registry) });

    await Promise.all([evaluator.evaluate(first.graph), evaluator.evaluate(second.graph)]);

    expect(first.product.output('product').getValue()).toBe(30);
    expect(second.product.output('product').getValue()).toBe(12);
    expect(second.sum.output('sum').getValue()).toBe(6);
  });

  it('should reject a second run of the same graph while the first is going', async () => {
    const { graph, sum } = buildPipeline();
    const evaluator = new WorkerPoolEvaluator({ runner: new InProcessNodeRunner(registry) });

    const running = evaluator.evaluate(graph);
    await expect(evaluator.evaluate(graph)).rejects.toThrow(
      "Graph 'pipeline' is already being evaluated by this evaluator"
    );
    await running;

    expect(sum.output('sum').getValue()).toBe(15);
  });
});

describe('Evaluators - layer barrier', () => {
  it('should start a layer only after every node of the previous one finished', async () => {
    const { graph, producers, gather } = buildFanIn([60, 10, 40, 20]);
    const timeline = new Timeline();
    producers.forEach(producer =>
      producer.events.on(NodeEventType.EVALUATION_FINISHED, node => timeline.mark(`finished ${node.name}`))
    );
    gather.events.on(NodeEventType.EVALUATION_STARTED, () => timeline.mark('started gather'));

    await graph.evaluate({ evaluator: new ConcurrentEvaluator() });

    expect(timeline.entries).toEqual([
      'finished p1',
      'finished p3',
      'finished p2',
      'finished p0',
      'started gather',
    ]);
    expect(gather.output('values').getValue()).toEqual([1, 2, 3, 4]);
  });

  it('should keep insertion order in the sequential evaluator', async () => {
    const { graph, producers } = buildFanIn([30, 0, 10, 0]);
    const timeline = new Timeline();
    producers.forEach(producer =>
      producer.events.on(NodeEventType.EVALUATION_FINISHED, node => timeline.mark(node.name))
    );

    await graph.evaluate({ evaluator: new SequentialEvaluator() });

    expect(timeline.entries).toEqual(['p0', 'p1', 'p2', 'p3']);
  });

  it('should bound the number of nodes in flight', async () => {
    const { graph, producers } = buildFanIn([20, 20, 20, 20]);
    let inFlight = 0;
    let maxInFlight = 0;
    producers.forEach(producer => {
      producer.events.on(NodeEventType.EVALUATION_STARTED, () => {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
      });
      producer.events.on(NodeEventType.EVALUATION_FINISHED, () => {
        inFlight--;
      });
    });

    await graph.evaluate({ evaluator: new ConcurrentEvaluator({ maxConcurrency: 2 }) });

    expect(maxInFlight).toBe(2);
  });
});

describe('Evaluators - failures', () => {
  function buildFailing() {
    const graph = new Graph('failing');
    const source = new SourceNode({ name: 'source', graph });
    const failing = new FailingNode({ name: 'failing', graph });
    const sibling = new DoubleNode({ name: 'sibling', graph });
    const downstream = new DoubleNode({ name: 'downstream', graph });
    source.output('x').setValue(1);
    source.output('x').connect(failing.input('value'));
    source.output('x').connect(sibling.input('y'));
    failing.output('value').connect(downstream.input('y'));
    return { graph, source, failing, sibling, downstream };
  }

  it('should stop the sequential evaluator at the first failing node', async () => {
    const { graph, source, failing, sibling, downstream } = buildFailing();
    const evaluator = new SequentialEvaluator();
    const failed = jest.fn();
    evaluator.events.on(EvaluatorEventType.NODE_FAILED, failed);

    const error = await graph.evaluate({ evaluator }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EvaluationError);
    expect(error instanceof EvaluationError && error.nodeIdentifier).toBe(failing.identifier);
    expect(source.stats).not.toBeNull();
    expect(sibling.stats).toBeNull();
    expect(downstream.stats).toBeNull();
    expect(failed).toHaveBeenCalledWith(failing, error);
  });

  it('should let started nodes settle but run no later layer in the concurrent evaluator', async () => {
    const { graph, failing, sibling, downstream } = buildFailing();

    const error = await graph
      .evaluate({ evaluator: new ConcurrentEvaluator() })
      .catch((e: unknown) => e);

    expect(error instanceof EvaluationError && error.nodeIdentifier).toBe(failing.identifier);
    expect(sibling.output('result').getValue()).toBe(2);
    expect(downstream.stats).toBeNull();
  });

  it('should report the failing node through the record runner', async () => {
    const { graph, failing, downstream } = buildFailing();
    const exception = jest.fn();
    failing.events.on(NodeEventType.EVALUATION_EXCEPTION, exception);

    const error = await graph
      .evaluate({ evaluator: new WorkerPoolEvaluator({ runner: new InProcessNodeRunner(registry) }) })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EvaluationError);
    expect(error instanceof EvaluationError && error.nodeIdentifier).toBe(failing.identifier);
    expect(exception).toHaveBeenCalledTimes(1);
    expect(downstream.stats).toBeNull();
  });
});

describe('Evaluators - selection', () => {
  it('should evaluate only dirty nodes when skipping clean ones', async () => {
    const graph = new Graph('partial');
    const seed = new ValueNode({ name: 'seed', value: 2, graph });
    const doubled = new DoubleNode({ name: 'doubled', graph });
    const untouched = new ValueNode({ name: 'untouched', value: 'same', graph });
    seed.output('value').connect(doubled.input('y'));
    await graph.evaluate();

    const evaluator = new SequentialEvaluator();
    const evaluated: string[] = [];
    evaluator.events.on(EvaluatorEventType.NODE_EVALUATED, node => evaluated.push(node.name));
    seed.input('value').setValue(7);

    await graph.evaluate({ evaluator, skipClean: true });

    expect(evaluated).toEqual(['seed', 'doubled']);
    expect(doubled.output('result').getValue()).toBe(14);
    expect(untouched.isDirty).toBe(false);
  });

  it('should skip omitted nodes and let downstream nodes use the stale value', async () => {
    const graph = new Graph('omitted');
    const seed = new ValueNode({ name: 'seed', value: 2, graph });
    const doubled = new DoubleNode({ name: 'doubled', graph });
    seed.output('value').connect(doubled.input('y'));
    await graph.evaluate();

    seed.input('value').setValue(50);
    seed.omit = true;
    const omitted = jest.fn();
    seed.events.on(NodeEventType.EVALUATION_OMITTED, omitted);

    await graph.evaluate();

    expect(omitted).toHaveBeenCalledWith(seed);
    expect(seed.output('value').getValue()).toBe(2);
    expect(doubled.output('result').getValue()).toBe(4);
  });

  it('should clear values received by connected inputs without data persistence', async () => {
    const { graph, a, b, sum } = buildPipeline();

    await graph.evaluate({ dataPersistence: false });

    expect(b.input('y').getValue()).toBeNull();
    expect(sum.input('a').getValue()).toBeNull();
    expect(b.output('result').getValue()).toBe(10);
    expect(a.output('x').getValue()).toBe(5);
  });
});

describe('Evaluators - extension', () => {
  class ReversedEvaluator extends Evaluator {
    readonly trace: string[] = [];

    protected async evaluateLayer(nodes: readonly Node[]): Promise<void> {
      for (const node of [...nodes].reverse()) {
        await this.evaluateNode(node);
      }
    }

    protected override onLayerStarted(nodes: readonly Node[], context: LayerContext): void {
      this.trace.push(`layer ${context.index + 1}/${context.layerCount}: ${nodes.map(n => n.name).join(',')}`);
    }

    protected override onNodeFinished(node: Node): void {
      this.trace.push(node.name);
    }
  }

  it('should let a subclass choose the order within a layer and trace the run', async () => {
    const { graph } = buildPipeline();
    const evaluator = new ReversedEvaluator();
    const layers: number[] = [];
    evaluator.events.on(EvaluatorEventType.LAYER_FINISHED, (_nodes, context) => layers.push(context.index));

    await graph.evaluate({ evaluator });

    expect(evaluator.trace).toEqual([
      'layer 1/3: A',
      'A',
      'layer 2/3: B',
      'B',
      'layer 3/3: product,sum',
      'sum',
      'product',
    ]);
    expect(layers).toEqual([0, 1, 2]);
  });

  it('should emit run events around the layers', async () => {
    const { graph } = buildPipeline();
    const evaluator = new SequentialEvaluator();
    const events: string[] = [];
    evaluator.events.on(EvaluatorEventType.RUN_STARTED, () => events.push('run-started'));
    evaluator.events.on(EvaluatorEventType.LAYER_STARTED, (_nodes, context) =>
      events.push(`layer-${context.index}`)
    );
    evaluator.events.on(EvaluatorEventType.RUN_FINISHED, () => events.push('run-finished'));

    await evaluator.evaluate(graph);

    expect(events).toEqual(['run-started', 'layer-0', 'layer-1', 'layer-2', 'run-finished']);
  });
});
