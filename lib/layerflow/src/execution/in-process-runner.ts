import { NodeTypeRegistry, TypeResolver } from '../node/registry';
import { MemoryRecordStore } from '../providers/memory/record-store';
import { IRecordStore } from '../providers/interfaces/record-store';
import { NodeRecord } from '../types/records';
import { SerializationError } from '../utils/errors';
import { NodeRunner, NodeTask } from './node-runner';
import { runNodeTask } from './run-node-task';

/**
 * Runs node records in the calling process, through a record store shared
 * by both sides the way a remote farm shares its database: the task records
 * are published, loaded back, evaluated, and the result is published and
 * read back by the orchestrator.
 */
export class InProcessNodeRunner implements NodeRunner {
  constructor(
    private readonly resolver: TypeResolver | NodeTypeRegistry,
    private readonly store: IRecordStore = new MemoryRecordStore()
  ) {}

  async run(task: NodeTask): Promise<NodeRecord> {
    await Promise.all(
      [task.record, ...task.upstream].map(record => this.store.save(record.identifier, record))
    );

    const record = await this.fetch(task.record.identifier);
    const upstream = await Promise.all(task.upstream.map(item => this.fetch(item.identifier)));
    const result = await runNodeTask({ record, upstream }, this.resolver);

    await this.store.save(result.identifier, result);
    return this.fetch(result.identifier);
  }

  private async fetch(identifier: string): Promise<NodeRecord> {
    const record = await this.store.load(identifier);
    if (!record) {
      throw new SerializationError(`No record stored for '${identifier}'`, 'identifier');
    }
    return record;
  }
}
