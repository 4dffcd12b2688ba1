import { ConcurrentEvaluator } from '../lib/layerflow/src/evaluator/concurrent-evaluator';
import { Graph } from '../lib/layerflow/src/graph/graph';
import { GraphNode } from '../lib/layerflow/src/graph/graph-node';
import { ValueNode } from '../lib/layerflow/src/node/value-node';
import { InputPlugGroup } from '../lib/layerflow/src/plug/plug-group';
import { deserializeNode } from '../lib/layerflow/src/serialization/serializer';
import { AddNode, DoubleNode, NamesNode, SourceNode } from './utils/fixture-nodes';
import { registry } from './utils/fixture-registry';

function buildDoubler(): Graph {
  const inner = new Graph('doubler');
  const entry = new ValueNode({ name: 'entry', graph: inner });
  const double = new DoubleNode({ name: 'double', graph: inner });
  entry.output('value').connect(double.input('y'));
  inner.promoteInput(entry.input('value'));
  inner.promoteOutput(double.output('result'));
  return inner;
}

describe('GraphNode', () => {
  it('should mirror the promoted plugs of the inner graph', () => {
    const node = new GraphNode(buildDoubler());

    expect(node.name).toBe('doubler');
    expect(node.type).toBe('GraphNode');
    expect([...node.inputs.keys()]).toEqual(['value']);
    expect([...node.outputs.keys()]).toEqual(['result']);
  });

  it('should evaluate the inner graph as one node of the outer graph', async () => {
    const outer = new Graph('outer');
    const a = new SourceNode({ name: 'A', graph: outer });
    const doubler = new GraphNode(buildDoubler(), { graph: outer });
    const sum = new AddNode({ name: 'sum', graph: outer });
    a.output('x').setValue(5);
    a.output('x').connect(doubler.input('value'));
    doubler.output('result').connect(sum.input('a'));

    await outer.evaluate();

    expect(doubler.output('result').getValue()).toBe(10);
    expect(sum.output('sum').getValue()).toBe(10);
    expect(outer.computeLayers().map(layer => layer.map(node => node.name))).toEqual([
      ['A'],
      ['doubler'],
      ['sum'],
    ]);
  });

  it('should set every member of a promoted input group', async () => {
    const inner = new Graph('pair');
    const left = new DoubleNode({ name: 'left', graph: inner });
    const right = new DoubleNode({ name: 'right', graph: inner });
    inner.promoteInput(new InputPlugGroup('seed', [left.input('y'), right.input('y')]));
    inner.promoteOutput(left.output('result'), 'left');
    inner.promoteOutput(right.output('result'), 'right');

    const node = new GraphNode(inner, { evaluator: new ConcurrentEvaluator() });
    node.input('seed').setValue(3);

    await expect(node.evaluate()).resolves.toEqual({ left: 6, right: 6 });
  });

  it('should wrap a graph whose promoted input is a sub-plug', async () => {
    const inner = new Graph('inner');
    const names = new NamesNode({ name: 'team', graph: inner });
    names.input('workers').sub(1).setValue('Jane');

    expect(() => inner.promoteInput(names.input('workers').sub(0))).toThrow(
      "Invalid boundary name 'workers.0' on graph 'inner': names must be non-empty and must not contain '.'"
    );
    inner.promoteInput(names.input('workers').sub(0), 'lead');
    inner.promoteOutput(names.output('names'));

    const node = new GraphNode(inner);
    node.input('lead').setValue('John');

    expect([...node.inputs.keys()]).toEqual(['lead']);
    await expect(node.evaluate()).resolves.toEqual({ names: { '0': 'John', '1': 'Jane' } });
  });

  it('should carry the inner graph in its record', async () => {
    const node = new GraphNode(buildDoubler(), { name: 'nested' });
    node.input('value').setValue(7);

    const record = node.serialize();
    expect(record.type).toBe('GraphNode');
    expect(record.graph?.name).toBe('doubler');
    expect(record.graph?.nodes.map(item => item.name)).toEqual(['entry', 'double']);

    const restored = deserializeNode(record, registry).node;
    expect(restored).toBeInstanceOf(GraphNode);
    expect(restored.identifier).toBe(node.identifier);
    await expect(restored.evaluate()).resolves.toEqual({ result: 14 });
  });
});
