import { defaultValueFormatter } from '../format/value.js';
import { Constraint } from './constraint.js';
import { ConstraintResult } from './result.js';

/**
 * Parse a pattern string into a RegExp.
 * Supports /pattern/flags syntax for flags (e.g., /hello/i for case insensitive)
 */
export function parsePattern(pattern: string): RegExp {
  const match = pattern.match(/^\/(.+)\/([dgimsuy]*)$/);
  if (match) {
    return new RegExp(match[1], match[2]);
  }
  return new RegExp(pattern);
}

/**
 * Base for constraints on string actual values. Non-string actual values fail.
 */
export abstract class StringConstraint extends Constraint {
  protected caseInsensitive = false;
  protected abstract readonly descriptionText: string;

  constructor(readonly expected: string) {
    super();
  }

  get ignoreCase(): this {
    this.caseInsensitive = true;
    return this.modified();
  }

  protected describe(): string {
    const text = `${this.descriptionText} ${defaultValueFormatter(this.expected)}`;
    return this.caseInsensitive ? `${text}, ignoring case` : text;
  }

  protected abstract matches(actual: string): boolean;

  applyTo(actual: unknown): ConstraintResult {
    return new ConstraintResult(this, actual, typeof actual === 'string' && this.matches(actual));
  }

  protected fold(text: string): string {
    return this.caseInsensitive ? text.toLowerCase() : text;
  }
}

export class StartsWithConstraint extends StringConstraint {
  protected readonly descriptionText = 'String starting with';

  protected matches(actual: string): boolean {
    return this.fold(actual).startsWith(this.fold(this.expected));
  }
}

export class EndsWithConstraint extends StringConstraint {
  protected readonly descriptionText = 'String ending with';

  protected matches(actual: string): boolean {
    return this.fold(actual).endsWith(this.fold(this.expected));
  }
}

export class SubstringConstraint extends StringConstraint {
  protected readonly descriptionText = 'String containing';

  protected matches(actual: string): boolean {
    return this.fold(actual).includes(this.fold(this.expected));
  }
}

export class RegexConstraint extends StringConstraint {
  protected readonly descriptionText = 'String matching';
  private readonly regex: RegExp;

  constructor(pattern: string | RegExp) {
    super(typeof pattern === 'string' ? pattern : pattern.source);
    this.regex = typeof pattern === 'string' ? parsePattern(pattern) : pattern;
  }

  protected describe(): string {
    const text = `${this.descriptionText} ${this.regex}`;
    return this.caseInsensitive ? `${text}, ignoring case` : text;
  }

  protected matches(actual: string): boolean {
    const regex =
      this.caseInsensitive && !this.regex.flags.includes('i')
        ? new RegExp(this.regex.source, `${this.regex.flags}i`)
        : this.regex;
    regex.lastIndex = 0;
    return regex.test(actual);
  }
}
