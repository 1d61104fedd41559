import { isEnumerable } from '../equality/comparers/enumerable.js';
import { Tuple } from '../equality/tuple.js';

export type ValueFormatter = (value: unknown) => string;

/** Wraps the current formatter; call `next` for values you don't handle. */
export type ValueFormatterFactory = (next: ValueFormatter) => ValueFormatter;

export interface FormatOptions {
  maxStringLength?: number;
  maxItems?: number;
  maxDepth?: number;
}

const DEFAULTS: Required<FormatOptions> = {
  maxStringLength: 100,
  maxItems: 10,
  maxDepth: 3,
};

/**
 * Build a display formatter for values shown in failure messages
 */
export function createValueFormatter(options: FormatOptions = {}): ValueFormatter {
  const opts = { ...DEFAULTS, ...options };
  return (value) => formatValue(value, opts, 0, new Set());
}

export const defaultValueFormatter: ValueFormatter = createValueFormatter();

/**
 * Truncate long text for display
 */
export function clip(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

function formatValue(
  value: unknown,
  opts: Required<FormatOptions>,
  depth: number,
  seen: Set<object>
): string {
  switch (typeof value) {
    case 'string':
      return `"${clip(value, opts.maxStringLength)}"`;
    case 'bigint':
      return `${value}n`;
    case 'function':
      return value.name ? `[Function ${value.name}]` : '[Function]';
    case 'symbol':
      return value.toString();
    case 'object':
      break;
    default:
      return Object.is(value, -0) ? '-0' : String(value);
  }

  if (value === null) return 'null';
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }
  if (value instanceof RegExp) return value.toString();
  if (value instanceof Error) return `${value.name}: ${value.message}`;

  if (seen.has(value)) return '[Circular]';
  if (depth >= opts.maxDepth) {
    return Array.isArray(value) ? '[Array]' : `[${value.constructor?.name ?? 'Object'}]`;
  }

  seen.add(value);
  try {
    const inner = (v: unknown) => formatValue(v, opts, depth + 1, seen);

    if (value instanceof Tuple) {
      return `(${value.items.map(inner).join(', ')})`;
    }
    if (Array.isArray(value)) {
      return `[${formatItems(value, inner, opts.maxItems)}]`;
    }
    if (value instanceof Set) {
      return `Set {${formatItems(Array.from(value), inner, opts.maxItems)}}`;
    }
    if (value instanceof Map) {
      const entries = Array.from(value, ([k, v]) => `${inner(k)} => ${inner(v)}`);
      return `Map {${formatItems(entries, (e) => String(e), opts.maxItems)}}`;
    }
    if (ArrayBuffer.isView(value) && isEnumerable(value)) {
      return `${value.constructor.name} [${formatItems(Array.from(value), inner, opts.maxItems)}]`;
    }

    const props = Object.keys(value).map((key) => `${key}: ${inner(Reflect.get(value, key))}`);
    const body = props.length > 0 ? `{ ${formatItems(props, (p) => String(p), opts.maxItems)} }` : '{}';
    const proto = Object.getPrototypeOf(value);
    const name = proto === Object.prototype || proto === null ? '' : value.constructor?.name;
    return name ? `${name} ${body}` : body;
  } finally {
    seen.delete(value);
  }
}

function formatItems(items: unknown[], format: ValueFormatter, maxItems: number): string {
  const shown = items.slice(0, maxItems).map(format);
  if (items.length > maxItems) shown.push('...');
  return shown.join(', ');
}
