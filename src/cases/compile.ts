import { NullConstraint } from '../constraints/basic.js';
import { AndConstraint, OrConstraint } from '../constraints/binary.js';
import { AnyOfConstraint, CollectionContainsConstraint, EmptyConstraint } from '../constraints/collection.js';
import {
  GreaterThanConstraint,
  GreaterThanOrEqualConstraint,
  LessThanConstraint,
  LessThanOrEqualConstraint,
  RangeConstraint,
} from '../constraints/comparison.js';
import type { Constraint } from '../constraints/constraint.js';
import { EqualConstraint } from '../constraints/equal.js';
import { SamePathConstraint, SubPathConstraint } from '../constraints/path.js';
import {
  AllItemsConstraint,
  NoItemConstraint,
  NotConstraint,
  PropertyConstraint,
  PropertyExistsConstraint,
  SomeItemsConstraint,
} from '../constraints/prefix.js';
import { EndsWithConstraint, RegexConstraint, StartsWithConstraint, SubstringConstraint } from '../constraints/string.js';
import { ConfigurationError } from '../errors.js';
import type { ConstraintNode, EqualToNode } from '../types/index.js';

function compileEqual(node: EqualToNode): EqualConstraint {
  let constraint = new EqualConstraint(node.equal_to);

  if (node.within !== undefined) {
    constraint = constraint.within(node.within);
    switch (node.mode) {
      case undefined:
      case 'linear':
        break;
      case 'percent':
        constraint = constraint.percent;
        break;
      case 'ulps':
        constraint = constraint.ulps;
        break;
      case 'ms':
        constraint = constraint.milliseconds;
        break;
      case 'seconds':
        constraint = constraint.seconds;
        break;
      case 'minutes':
        constraint = constraint.minutes;
        break;
      case 'hours':
        constraint = constraint.hours;
        break;
      case 'days':
        constraint = constraint.days;
        break;
    }
  } else if (node.mode !== undefined) {
    throw new ConfigurationError(`equal_to: mode "${node.mode}" needs a "within" amount`);
  }

  if (node.ignore_case) constraint = constraint.ignoreCase;
  if (node.unordered) constraint = constraint.unordered;
  if (node.as_collection) constraint = constraint.asCollection;
  return constraint;
}

function withCase<T extends { ignoreCase: T }>(constraint: T, ignoreCase: boolean | undefined): T {
  return ignoreCase ? constraint.ignoreCase : constraint;
}

/**
 * Build the constraint tree a declarative node describes. `and` and `or`
 * lists fold from the left.
 */
export function compileConstraint(node: ConstraintNode): Constraint {
  if ('equal_to' in node) return compileEqual(node);
  if ('greater_than' in node) return new GreaterThanConstraint(node.greater_than);
  if ('greater_than_or_equal' in node) return new GreaterThanOrEqualConstraint(node.greater_than_or_equal);
  if ('less_than' in node) return new LessThanConstraint(node.less_than);
  if ('less_than_or_equal' in node) return new LessThanOrEqualConstraint(node.less_than_or_equal);
  if ('in_range' in node) return new RangeConstraint(node.in_range[0], node.in_range[1]);
  if ('starts_with' in node) return withCase(new StartsWithConstraint(node.starts_with), node.ignore_case);
  if ('ends_with' in node) return withCase(new EndsWithConstraint(node.ends_with), node.ignore_case);
  if ('contains' in node) return withCase(new SubstringConstraint(node.contains), node.ignore_case);
  if ('matches' in node) return new RegexConstraint(node.matches);
  if ('same_path' in node) return withCase(new SamePathConstraint(node.same_path), node.ignore_case);
  if ('sub_path_of' in node) return withCase(new SubPathConstraint(node.sub_path_of), node.ignore_case);
  if ('has_member' in node) return new CollectionContainsConstraint(node.has_member);
  if ('one_of' in node) return new AnyOfConstraint(node.one_of);
  if ('empty' in node) return new EmptyConstraint();
  if ('null' in node) return new NullConstraint();
  if ('not' in node) return new NotConstraint(compileConstraint(node.not));
  if ('and' in node) return fold(node.and, (l, r) => new AndConstraint(l, r));
  if ('or' in node) return fold(node.or, (l, r) => new OrConstraint(l, r));
  if ('all_items' in node) return new AllItemsConstraint(compileConstraint(node.all_items));
  if ('some_items' in node) return new SomeItemsConstraint(compileConstraint(node.some_items));
  if ('no_items' in node) return new NoItemConstraint(compileConstraint(node.no_items));
  if ('property' in node) {
    return node.satisfies
      ? new PropertyConstraint(node.property, compileConstraint(node.satisfies))
      : new PropertyExistsConstraint(node.property);
  }
  throw new ConfigurationError(`Unrecognised constraint node: ${JSON.stringify(node)}`);
}

function fold(
  nodes: ConstraintNode[],
  combine: (left: Constraint, right: Constraint) => Constraint
): Constraint {
  const [first, ...rest] = nodes;
  if (!first) {
    throw new ConfigurationError('A combined constraint needs at least one operand');
  }
  return rest.reduce((left, node) => combine(left, compileConstraint(node)), compileConstraint(first));
}
