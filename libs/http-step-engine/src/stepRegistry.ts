import type { Step } from './step';

/** What a worker needs from a registry. Safe to share between workers. */
export interface ReadonlyStepRegistry {
  lookup(name: string): Step | undefined;
  contains(name: string): boolean;
  count(): number;
  names(): string[];
}

/**
 * Name → step mapping. Filled during setup, read afterwards.
 *
 * Registering a name twice replaces the earlier step, so setup code can be
 * re-run without tracking what was already added.
 */
export class StepRegistry implements ReadonlyStepRegistry {
  private readonly steps = new Map<string, Step>();

  constructor(steps: Iterable<Step> = []) {
    this.insertMany(steps);
  }

  insert(step: Step): this {
    this.steps.set(step.name, step);
    return this;
  }

  insertMany(steps: Iterable<Step>): this {
    for (const step of steps) {
      this.insert(step);
    }
    return this;
  }

  lookup(name: string): Step | undefined {
    return this.steps.get(name);
  }

  contains(name: string): boolean {
    return this.steps.has(name);
  }

  count(): number {
    return this.steps.size;
  }

  names(): string[] {
    return Array.from(this.steps.keys());
  }
}
