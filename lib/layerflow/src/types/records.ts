import { JsonObject, JsonValue } from '../utils/json';

/**
 * Reference to a plug of another node: owning node identifier plus plug path
 * (`name` or `parent.key`)
 */
export interface PlugRefRecord {
  identifier: string;
  plug: string;
}

export interface SubPlugRecord {
  value: JsonValue;
  connections: PlugRefRecord[];
}

export interface PlugRecord {
  value: JsonValue;
  sub_plugs: Record<string, SubPlugRecord>;
  /**
   * Upstream references for inputs, downstream references for outputs.
   * Only input references are used to rebuild edges.
   */
  connections: PlugRefRecord[];
}

export interface NodeStatsRecord {
  eval_time: number;
  start_time: number;
}

/**
 * Serialized node. Extensible by adding keys, never by renaming.
 */
export interface NodeRecord {
  identifier: string;
  name: string;
  type: string;
  metadata: JsonObject;
  inputs: Record<string, PlugRecord>;
  outputs: Record<string, PlugRecord>;
  stats?: NodeStatsRecord | null;
  /**
   * Inner graph of a node wrapping a graph
   */
  graph?: GraphRecord;
}

/**
 * Serialized graph. Edges are carried by the input connection references
 * of the node records.
 */
export interface GraphRecord {
  name: string;
  nodes: NodeRecord[];
  /**
   * Promoted inputs: boundary name to the inner plugs it feeds
   */
  inputs?: Record<string, PlugRefRecord[]>;
  /**
   * Promoted outputs: boundary name to the inner plug it reads
   */
  outputs?: Record<string, PlugRefRecord>;
}
