import type { DeferredEntry } from '../errors.js';

/**
 * Ordered record of the non-throwing outcomes reported during a test:
 * warnings at any depth, and every outcome inside a Multiple block.
 */
export class OutcomeAccumulator {
  private readonly list: DeferredEntry[] = [];

  record(entry: DeferredEntry): void {
    this.list.push(entry);
  }

  get entries(): readonly DeferredEntry[] {
    return this.list;
  }

  get size(): number {
    return this.list.length;
  }

  /** Entries recorded at or after `mark`, a previous `size`. */
  since(mark: number): DeferredEntry[] {
    return this.list.slice(mark);
  }

  get hasWarnings(): boolean {
    return this.list.some((e) => e.kind === 'warning');
  }
}
