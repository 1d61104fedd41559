export * from './errors.js';
export { Tolerance, type ToleranceMode, type ToleranceRange } from './tolerance/tolerance.js';
export { ComparisonState } from './equality/comparison-state.js';
export {
  abstain,
  decided,
  type ChainComparer,
  type ChainOutcome,
  type ExternalComparer,
  type FailurePoint,
  type OrderingComparer,
} from './equality/chain.js';
export { EqualityComparer, ComparisonAdapter, type EqualityComparerOptions } from './equality/equality-comparer.js';
export { Tuple, tuple } from './equality/tuple.js';
export {
  structuralEquals,
  type EqualityComparison,
  type StructurallyEquatable,
} from './equality/comparers/structural.js';
export type { Equatable } from './equality/comparers/equatable.js';
export {
  createValueFormatter,
  defaultValueFormatter,
  type FormatOptions,
  type ValueFormatter,
  type ValueFormatterFactory,
} from './format/value.js';
export { Attribute, annotate, getAttributes, type AttributeType } from './metadata/attributes.js';

export { Constraint, type EvaluationEnvironment, type Resolvable } from './constraints/constraint.js';
export { ConstraintResult } from './constraints/result.js';
export { MessageWriter } from './constraints/message-writer.js';
export * from './constraints/basic.js';
export * from './constraints/binary.js';
export * from './constraints/collection.js';
export * from './constraints/comparison.js';
export * from './constraints/equal.js';
export * from './constraints/path.js';
export * from './constraints/prefix.js';
export * from './constraints/string.js';
export * from './constraints/operators.js';
export { ConstraintBuilder } from './constraints/builder.js';
export { ConstraintExpression } from './constraints/expression.js';
export { Is, Has, Does, Contains } from './constraints/syntax.js';

export { ExecutionContext } from './context/execution-context.js';
export { NullListener, type TestListener } from './context/listener.js';
export { OutcomeAccumulator } from './context/outcomes.js';
export { Asserter } from './assert/asserter.js';
export { Assert } from './assert/assert.js';

export { createLogger, nullLogger, type Logger, type LogLevel } from './logging/logger.js';
export { runTest, TestRegistry, type RunTestOptions, type TestBody } from './runner/index.js';
export type { TestInfo, TestResult, TestStatus } from './types/index.js';
