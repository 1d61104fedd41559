import { isEnumerable } from '../equality/comparers/enumerable.js';
import { ConfigurationError } from '../errors.js';
import { getAttributes, isAttributeType, type AttributeType } from '../metadata/attributes.js';
import { Constraint, type EvaluationEnvironment } from './constraint.js';
import type { MessageWriter } from './message-writer.js';
import { ConstraintResult } from './result.js';

/**
 * Wraps a base constraint and prepends text to its description without
 * changing how success is decided.
 */
export abstract class PrefixConstraint extends Constraint {
  constructor(
    readonly baseConstraint: Constraint,
    protected readonly descriptionPrefix: string
  ) {
    super();
  }

  protected describe(): string {
    return `${this.descriptionPrefix} ${this.baseConstraint.description}`;
  }
}

export class NotConstraint extends PrefixConstraint {
  constructor(baseConstraint: Constraint) {
    super(baseConstraint, 'not');
  }

  applyTo(actual: unknown, env?: EvaluationEnvironment): ConstraintResult {
    const baseResult = this.baseConstraint.applyTo(actual, env);
    return new ConstraintResult(this, baseResult.actualValue, !baseResult.isSuccess);
  }
}

function requireCollection(actual: unknown, constraint: Constraint): unknown[] {
  if (typeof actual === 'string' || !isEnumerable(actual)) {
    throw new ConfigurationError(
      `${constraint.displayName} requires a collection as the actual value, got ${typeof actual}`
    );
  }
  return Array.from(actual);
}

class ItemResult extends ConstraintResult {
  constructor(
    constraint: Constraint,
    actual: unknown,
    isSuccess: boolean,
    private readonly index: number,
    private readonly item: unknown,
    private readonly label: string
  ) {
    super(constraint, actual, isSuccess);
  }

  writeAdditionalLinesTo(writer: MessageWriter): void {
    if (!this.isSuccess && this.index >= 0) {
      writer.writeLine(`${this.label} at index [${this.index}]: ${writer.formatValue(this.item)}`);
    }
  }
}

export class AllItemsConstraint extends PrefixConstraint {
  constructor(baseConstraint: Constraint) {
    super(baseConstraint, 'all items');
  }

  applyTo(actual: unknown, env?: EvaluationEnvironment): ConstraintResult {
    const items = requireCollection(actual, this);
    const index = items.findIndex((item) => !this.baseConstraint.applyTo(item, env).isSuccess);
    return new ItemResult(this, actual, index < 0, index, items[index], 'First non-matching item');
  }
}

export class SomeItemsConstraint extends PrefixConstraint {
  constructor(baseConstraint: Constraint) {
    super(baseConstraint, 'some item');
  }

  applyTo(actual: unknown, env?: EvaluationEnvironment): ConstraintResult {
    const items = requireCollection(actual, this);
    const matched = items.some((item) => this.baseConstraint.applyTo(item, env).isSuccess);
    return new ConstraintResult(this, actual, matched);
  }
}

export class NoItemConstraint extends PrefixConstraint {
  constructor(baseConstraint: Constraint) {
    super(baseConstraint, 'no item');
  }

  applyTo(actual: unknown, env?: EvaluationEnvironment): ConstraintResult {
    const items = requireCollection(actual, this);
    const index = items.findIndex((item) => this.baseConstraint.applyTo(item, env).isSuccess);
    return new ItemResult(this, actual, index < 0, index, items[index], 'First matching item');
  }
}

/** Primitives are boxed so `length` on a string is found; null and undefined have no properties. */
function propertyHolder(actual: unknown, name: string): object | undefined {
  if (actual === null || actual === undefined) return undefined;
  const holder: object = Object(actual);
  return name in holder ? holder : undefined;
}

/**
 * Applies the base constraint to a named property of the actual value.
 */
export class PropertyConstraint extends PrefixConstraint {
  constructor(
    readonly propertyName: string,
    baseConstraint: Constraint
  ) {
    super(baseConstraint, `property ${propertyName}`);
  }

  applyTo(actual: unknown, env?: EvaluationEnvironment): ConstraintResult {
    const holder = propertyHolder(actual, this.propertyName);
    if (!holder) {
      throw new ConfigurationError(`Property ${this.propertyName} was not found on ${describeActual(actual)}`);
    }
    const value: unknown = Reflect.get(holder, this.propertyName);
    const baseResult = this.baseConstraint.applyTo(value, env);
    return new ConstraintResult(this, value, baseResult.isSuccess);
  }
}

export class PropertyExistsConstraint extends Constraint {
  constructor(readonly propertyName: string) {
    super();
  }

  protected describe(): string {
    return `property ${this.propertyName}`;
  }

  applyTo(actual: unknown): ConstraintResult {
    return new ConstraintResult(this, actual, propertyHolder(actual, this.propertyName) !== undefined);
  }
}

export function requireAttributeType(type: unknown): AttributeType {
  if (!isAttributeType(type)) {
    const name = typeof type === 'function' ? type.name : String(type);
    throw new ConfigurationError(`Type ${name} is not an attribute`);
  }
  return type;
}

/**
 * Checks that an attribute is present on the actual value and that the first
 * one found satisfies the base constraint.
 */
export class AttributeConstraint extends PrefixConstraint {
  readonly attributeType: AttributeType;

  constructor(type: AttributeType, baseConstraint: Constraint) {
    const checked = requireAttributeType(type);
    super(baseConstraint, `attribute ${checked.name}`);
    this.attributeType = checked;
  }

  applyTo(actual: unknown, env?: EvaluationEnvironment): ConstraintResult {
    if ((typeof actual !== 'object' && typeof actual !== 'function') || actual === null) {
      throw new ConfigurationError(`Attributes cannot be read from ${describeActual(actual)}`);
    }
    const [found] = getAttributes(actual, this.attributeType);
    if (!found) {
      throw new ConfigurationError(`Attribute ${this.attributeType.name} was not found`);
    }
    const baseResult = this.baseConstraint.applyTo(found, env);
    return new ConstraintResult(this, found, baseResult.isSuccess);
  }
}

export class AttributeExistsConstraint extends Constraint {
  readonly attributeType: AttributeType;

  constructor(type: AttributeType) {
    super();
    this.attributeType = requireAttributeType(type);
  }

  protected describe(): string {
    return `type with attribute ${this.attributeType.name}`;
  }

  applyTo(actual: unknown): ConstraintResult {
    const present =
      (typeof actual === 'object' || typeof actual === 'function') &&
      actual !== null &&
      getAttributes(actual, this.attributeType).length > 0;
    return new ConstraintResult(this, actual, present);
  }
}

function describeActual(actual: unknown): string {
  if (actual === null) return 'null';
  if (typeof actual === 'object') return `an instance of ${actual.constructor?.name ?? 'Object'}`;
  return `a value of type ${typeof actual}`;
}
