/**
 * Helper functions for tests
 */

/**
 * Records the order in which named steps happen
 */
export class Timeline {
  private readonly steps: string[] = [];

  mark(step: string): void {
    this.steps.push(step);
  }

  get entries(): readonly string[] {
    return this.steps;
  }
}
