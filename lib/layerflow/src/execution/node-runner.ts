import { NodeRecord } from '../types/records';

/**
 * Everything a runner needs to evaluate one node away from the
 * orchestrating process: the node's record and the records of its direct
 * upstream nodes, which carry the output values its inputs read
 */
export interface NodeTask {
  readonly record: NodeRecord;
  readonly upstream: readonly NodeRecord[];
}

/**
 * Evaluates node records, in worker threads, in process, or on a remote
 * farm. Returns the record of the evaluated node.
 */
export interface NodeRunner {
  run(task: NodeTask): Promise<NodeRecord>;
  /**
   * Releases workers or connections held by the runner
   */
  close?(): Promise<void>;
}
