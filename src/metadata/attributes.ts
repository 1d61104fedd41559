/**
 * Declarative metadata attached to classes, functions or objects.
 *
 * Subclass `Attribute` for each kind of annotation and attach instances with
 * `annotate`. Lookups on an instance also see attributes of its class chain.
 */
export abstract class Attribute {}

export type AttributeType<T extends Attribute = Attribute> = abstract new (...args: never[]) => T;

const registry = new WeakMap<object, Attribute[]>();

export function annotate<T extends object>(target: T, ...attributes: Attribute[]): T {
  const existing = registry.get(target) ?? [];
  registry.set(target, [...existing, ...attributes]);
  return target;
}

export function isAttributeType(type: unknown): type is AttributeType {
  return typeof type === 'function' && type.prototype instanceof Attribute;
}

/**
 * Attributes of `type` (or a subclass) on `target`, its own first, then those
 * inherited through its prototype or class chain.
 */
export function getAttributes<T extends Attribute>(target: object, type: AttributeType<T>): T[] {
  const found: T[] = [];
  for (const holder of holders(target)) {
    for (const attribute of registry.get(holder) ?? []) {
      if (attribute instanceof type) found.push(attribute);
    }
  }
  return found;
}

function* holders(target: object): Generator<object> {
  const visited = new Set<object>();
  const queue: object[] = [target];
  while (queue.length > 0) {
    const next = queue.shift();
    if (next === undefined || visited.has(next)) continue;
    visited.add(next);
    yield next;

    if (typeof next === 'function') {
      // A class inherits from its parent class.
      const parent = Object.getPrototypeOf(next);
      if (typeof parent === 'function' && parent !== Function.prototype) queue.push(parent);
    } else {
      const ctor = Reflect.get(next, 'constructor');
      if (typeof ctor === 'function' && ctor !== Object) queue.push(ctor);
    }
  }
}
