import { GraphError } from '../utils/errors';
import { InputPlugBase, OutputPlugBase } from './plug';

/**
 * Several inputs exposed as one boundary input of a graph.
 * Connecting or setting the group applies to every member.
 */
export class InputPlugGroup {
  private readonly members: InputPlugBase[];

  constructor(
    public readonly name: string,
    plugs: readonly InputPlugBase[]
  ) {
    if (plugs.length === 0) {
      throw new GraphError(`Input group '${name}' needs at least one plug`);
    }
    this.members = [...plugs];
  }

  get plugs(): readonly InputPlugBase[] {
    return this.members;
  }

  /**
   * Value of the first member
   */
  getValue(): unknown {
    return this.members[0]?.getValue() ?? null;
  }

  setValue(value: unknown): void {
    this.members.forEach(plug => plug.setValue(value));
  }

  connect(output: OutputPlugBase): void {
    this.members.forEach(plug => output.connect(plug));
  }

  disconnect(output: OutputPlugBase): void {
    this.members.forEach(plug => output.disconnect(plug));
  }
}
