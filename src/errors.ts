/**
 * Error and outcome-signal classes.
 *
 * Everything the library throws extends TenetError and carries a typed code.
 * Assertion failures, configuration errors and the non-failure outcome signals
 * (pass, ignore, inconclusive) are distinct classes so callers can tell an
 * unwinding test body apart from a broken one.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const TenetErrorCode = {
  // Assertion outcomes
  ASSERTION_FAILED: 'ASSERTION_FAILED',
  MULTIPLE_FAILURES: 'MULTIPLE_FAILURES',

  // Signals that end a test body without failing it
  PASSED: 'PASSED',
  IGNORED: 'IGNORED',
  INCONCLUSIVE: 'INCONCLUSIVE',

  // Malformed constraints, tolerances, config and case files
  CONFIGURATION: 'CONFIGURATION',
} as const;

export type TenetErrorCode = (typeof TenetErrorCode)[keyof typeof TenetErrorCode];

// ============================================================================
// Base Class
// ============================================================================

export class TenetError extends Error {
  readonly code: TenetErrorCode;

  constructor(code: TenetErrorCode, message: string) {
    super(message);
    this.name = 'TenetError';
    this.code = code;
  }
}

// ============================================================================
// Failures
// ============================================================================

export interface AssertionErrorDetails {
  expected?: string;
  actual?: unknown;
}

export class AssertionError extends TenetError {
  readonly expected: string | undefined;
  readonly actual: unknown;

  constructor(message: string, details: AssertionErrorDetails = {}) {
    super(TenetErrorCode.ASSERTION_FAILED, message);
    this.name = 'AssertionError';
    this.expected = details.expected;
    this.actual = details.actual;
  }
}

/** One outcome recorded while a Multiple block was active. */
export interface DeferredEntry {
  kind: 'failure' | 'warning' | 'pass' | 'ignore' | 'inconclusive';
  message: string;
}

export class MultipleAssertError extends TenetError {
  readonly entries: readonly DeferredEntry[];

  constructor(entries: readonly DeferredEntry[]) {
    super(TenetErrorCode.MULTIPLE_FAILURES, formatDeferredEntries(entries));
    this.name = 'MultipleAssertError';
    this.entries = entries;
  }
}

function formatDeferredEntries(entries: readonly DeferredEntry[]): string {
  const failures = entries.filter((e) => e.kind === 'failure').length;
  const lines = [`Multiple failures or warnings in test (${failures} failed):`];
  entries.forEach((entry, i) => {
    const [first = '', ...rest] = entry.message.split('\n');
    lines.push(`  ${i + 1}) [${entry.kind}] ${first}`);
    for (const line of rest) {
      lines.push(`     ${line}`);
    }
  });
  return lines.join('\n');
}

export class ConfigurationError extends TenetError {
  constructor(message: string) {
    super(TenetErrorCode.CONFIGURATION, message);
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Outcome Signals
// ============================================================================

export class SuccessSignal extends TenetError {
  constructor(message: string) {
    super(TenetErrorCode.PASSED, message);
    this.name = 'SuccessSignal';
  }
}

export class IgnoreSignal extends TenetError {
  constructor(message: string) {
    super(TenetErrorCode.IGNORED, message);
    this.name = 'IgnoreSignal';
  }
}

export class InconclusiveSignal extends TenetError {
  constructor(message: string) {
    super(TenetErrorCode.INCONCLUSIVE, message);
    this.name = 'InconclusiveSignal';
  }
}

export type OutcomeSignal = SuccessSignal | IgnoreSignal | InconclusiveSignal;

export function isOutcomeSignal(err: unknown): err is OutcomeSignal {
  return (
    err instanceof SuccessSignal ||
    err instanceof IgnoreSignal ||
    err instanceof InconclusiveSignal
  );
}
