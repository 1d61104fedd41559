import { posix } from 'node:path';
import { defaultValueFormatter } from '../format/value.js';
import { Constraint } from './constraint.js';
import { ConstraintResult } from './result.js';

/**
 * Base for path constraints. Both separators are accepted and `.` / `..`
 * segments are resolved before comparing. Case sensitivity follows the host
 * platform unless overridden.
 */
export abstract class PathConstraint extends Constraint {
  protected caseInsensitive = process.platform === 'win32';
  protected abstract readonly descriptionText: string;

  constructor(readonly expected: string) {
    super();
  }

  get ignoreCase(): this {
    this.caseInsensitive = true;
    return this.modified();
  }

  get respectCase(): this {
    this.caseInsensitive = false;
    return this.modified();
  }

  protected describe(): string {
    return `${this.descriptionText} ${defaultValueFormatter(this.expected)}`;
  }

  protected canonicalize(path: string): string {
    let normalized = posix.normalize(path.replace(/\\/g, '/'));
    if (normalized.length > 1 && normalized.endsWith('/')) {
      normalized = normalized.slice(0, -1);
    }
    return this.caseInsensitive ? normalized.toLowerCase() : normalized;
  }

  protected abstract matches(actual: string): boolean;

  applyTo(actual: unknown): ConstraintResult {
    return new ConstraintResult(this, actual, typeof actual === 'string' && this.matches(actual));
  }
}

export class SamePathConstraint extends PathConstraint {
  protected readonly descriptionText = 'Path matching';

  protected matches(actual: string): boolean {
    return this.canonicalize(this.expected) === this.canonicalize(actual);
  }
}

export class SubPathConstraint extends PathConstraint {
  protected readonly descriptionText = 'Subpath of';

  protected matches(actual: string): boolean {
    const parent = this.canonicalize(this.expected);
    const child = this.canonicalize(actual);
    const prefix = parent.endsWith('/') ? parent : `${parent}/`;
    return child !== parent && child.startsWith(prefix);
  }
}
