interface ComparisonFrame {
  readonly x: unknown;
  readonly y: unknown;
  readonly parent: ComparisonFrame | undefined;
}

/**
 * The pairs of objects on the current path of a recursive equality check.
 *
 * Each push returns a new state sharing its parent's frames, so sibling
 * branches of the comparison never see each other's pairs.
 */
export class ComparisonState {
  static readonly initial = new ComparisonState(true, undefined);

  readonly isTopLevel: boolean;
  private readonly top: ComparisonFrame | undefined;

  private constructor(isTopLevel: boolean, top: ComparisonFrame | undefined) {
    this.isTopLevel = isTopLevel;
    this.top = top;
  }

  push(x: unknown, y: unknown): ComparisonState {
    return new ComparisonState(false, { x, y, parent: this.top });
  }

  /** True if this exact (x, y) pair, by identity, is already being compared. */
  didCompare(x: unknown, y: unknown): boolean {
    for (let frame = this.top; frame; frame = frame.parent) {
      if (frame.x === x && frame.y === y) return true;
    }
    return false;
  }

  get depth(): number {
    let n = 0;
    for (let frame = this.top; frame; frame = frame.parent) n++;
    return n;
  }
}
