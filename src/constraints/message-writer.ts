import { defaultValueFormatter, type ValueFormatter } from '../format/value.js';

const EXPECTED = '  Expected: ';
const ACTUAL = '  But was:  ';
const INDENT = '  ';

/**
 * Accumulates the lines of a failure message.
 */
export class MessageWriter {
  private readonly lines: string[] = [];

  constructor(
    readonly formatValue: ValueFormatter = defaultValueFormatter,
    message?: string
  ) {
    if (message) this.lines.push(message);
  }

  writeExpected(description: string): void {
    this.lines.push(EXPECTED + description);
  }

  writeActual(value: unknown): void {
    this.lines.push(ACTUAL + this.formatValue(value));
  }

  writeLine(text: string): void {
    this.lines.push(INDENT + text);
  }

  toString(): string {
    return this.lines.join('\n');
  }
}
