import type { Constraint } from './constraint.js';
import type { MessageWriter } from './message-writer.js';

/**
 * Outcome of applying one constraint to one actual value.
 */
export class ConstraintResult {
  constructor(
    readonly constraint: Constraint,
    readonly actualValue: unknown,
    readonly isSuccess: boolean
  ) {}

  get name(): string {
    return this.constraint.displayName;
  }

  get description(): string {
    return this.constraint.description;
  }

  writeMessageTo(writer: MessageWriter): void {
    writer.writeExpected(this.description);
    this.writeActualValueTo(writer);
    this.writeAdditionalLinesTo(writer);
  }

  writeActualValueTo(writer: MessageWriter): void {
    writer.writeActual(this.actualValue);
  }

  /** Extra detail below the Expected / But was pair. None by default. */
  writeAdditionalLinesTo(_writer: MessageWriter): void {}
}
