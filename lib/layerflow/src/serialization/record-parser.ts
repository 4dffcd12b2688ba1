import {
  GraphRecord,
  NodeRecord,
  NodeStatsRecord,
  PlugRecord,
  PlugRefRecord,
  SubPlugRecord,
} from '../types/records';
import { SerializationError } from '../utils/errors';
import { JsonObject, JsonValue, isPlainRecord, toJsonObject, toJsonValue } from '../utils/json';

function expectObject(value: unknown, path: string): Record<string, unknown> {
  if (!isPlainRecord(value)) {
    throw new SerializationError('Expected an object', path);
  }
  return value;
}

function expectString(value: unknown, path: string): string {
  if (typeof value !== 'string') {
    throw new SerializationError('Expected a string', path);
  }
  return value;
}

function expectNumber(value: unknown, path: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new SerializationError('Expected a finite number', path);
  }
  return value;
}

function expectArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new SerializationError('Expected an array', path);
  }
  return value;
}

function required(source: Record<string, unknown>, key: string, path: string): unknown {
  if (!(key in source)) {
    throw new SerializationError(`Missing required field '${key}'`, path);
  }
  return source[key];
}

function parseValue(source: Record<string, unknown>, path: string): JsonValue {
  return toJsonValue(required(source, 'value', path), `${path}.value`);
}

function parseObjectMap<T>(
  value: unknown,
  path: string,
  parse: (item: unknown, itemPath: string) => T
): Record<string, T> {
  const source = expectObject(value, path);
  const result: Record<string, T> = {};
  for (const [key, item] of Object.entries(source)) {
    result[key] = parse(item, `${path}.${key}`);
  }
  return result;
}

export function parsePlugRef(value: unknown, path: string): PlugRefRecord {
  const source = expectObject(value, path);
  return {
    identifier: expectString(required(source, 'identifier', path), `${path}.identifier`),
    plug: expectString(required(source, 'plug', path), `${path}.plug`),
  };
}

function parseConnections(source: Record<string, unknown>, path: string): PlugRefRecord[] {
  const connectionsPath = `${path}.connections`;
  return expectArray(source.connections ?? [], connectionsPath).map((item, index) =>
    parsePlugRef(item, `${connectionsPath}[${index}]`)
  );
}

function parseSubPlug(value: unknown, path: string): SubPlugRecord {
  const source = expectObject(value, path);
  return {
    value: parseValue(source, path),
    connections: parseConnections(source, path),
  };
}

function parsePlug(value: unknown, path: string): PlugRecord {
  const source = expectObject(value, path);
  return {
    value: parseValue(source, path),
    sub_plugs: parseObjectMap(source.sub_plugs ?? {}, `${path}.sub_plugs`, parseSubPlug),
    connections: parseConnections(source, path),
  };
}

function parseStats(value: unknown, path: string): NodeStatsRecord | null {
  if (value === null || value === undefined) {
    return null;
  }
  const source = expectObject(value, path);
  return {
    eval_time: expectNumber(source.eval_time, `${path}.eval_time`),
    start_time: expectNumber(source.start_time, `${path}.start_time`),
  };
}

function parseMetadata(value: unknown, path: string): JsonObject {
  return toJsonObject(expectObject(value, path), path);
}

/**
 * Validates the shape of a node record received from outside the process
 * @throws SerializationError naming the offending path
 */
export function parseNodeRecord(value: unknown, path = 'record'): NodeRecord {
  const source = expectObject(value, path);
  const record: NodeRecord = {
    identifier: expectString(required(source, 'identifier', path), `${path}.identifier`),
    name: expectString(required(source, 'name', path), `${path}.name`),
    type: expectString(required(source, 'type', path), `${path}.type`),
    metadata: parseMetadata(source.metadata ?? {}, `${path}.metadata`),
    inputs: parseObjectMap(required(source, 'inputs', path), `${path}.inputs`, parsePlug),
    outputs: parseObjectMap(required(source, 'outputs', path), `${path}.outputs`, parsePlug),
    stats: parseStats(source.stats, `${path}.stats`),
  };
  if (source.graph !== undefined) {
    record.graph = parseGraphRecord(source.graph, `${path}.graph`);
  }
  return record;
}

/**
 * Validates the shape of a graph record
 * @throws SerializationError naming the offending path
 */
export function parseGraphRecord(value: unknown, path = 'record'): GraphRecord {
  const source = expectObject(value, path);
  const nodesPath = `${path}.nodes`;
  const record: GraphRecord = {
    name: expectString(required(source, 'name', path), `${path}.name`),
    nodes: expectArray(required(source, 'nodes', path), nodesPath).map((item, index) =>
      parseNodeRecord(item, `${nodesPath}[${index}]`)
    ),
  };
  if (source.inputs !== undefined) {
    record.inputs = parseObjectMap(source.inputs, `${path}.inputs`, (item, itemPath) =>
      expectArray(item, itemPath).map((ref, index) => parsePlugRef(ref, `${itemPath}[${index}]`))
    );
  }
  if (source.outputs !== undefined) {
    record.outputs = parseObjectMap(source.outputs, `${path}.outputs`, parsePlugRef);
  }
  return record;
}
