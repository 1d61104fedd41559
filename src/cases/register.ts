import type { Asserter } from '../assert/asserter.js';
import { createValueFormatter } from '../format/value.js';
import { mergeCaseSettings } from '../runner/merge.js';
import type { TestRegistry } from '../runner/registry.js';
import type { TestBody } from '../runner/test.js';
import type { Case, CaseFile, ProjectConfig } from '../types/index.js';
import { compileConstraint } from './compile.js';

/**
 * The body that checks one declarative case. Constraints are compiled when
 * the body runs, so a malformed node marks only its own case as an error.
 */
export function caseBody(testCase: Case): TestBody {
  const nodes = Array.isArray(testCase.expect) ? testCase.expect : [testCase.expect];

  return (assert: Asserter) => {
    if (testCase.skip) {
      assert.ignore(typeof testCase.skip === 'string' ? testCase.skip : 'Case skipped');
    }

    const constraints = nodes.map(compileConstraint);
    const check = () => {
      for (const constraint of constraints) {
        assert.that(testCase.actual, constraint, testCase.message);
      }
    };

    if (testCase.multiple) {
      assert.multiple(check);
    } else {
      check();
    }
  };
}

/**
 * Register every case of a file under `<file name> > <case name>`
 */
export function registerCaseFile(
  registry: TestRegistry,
  caseFile: CaseFile,
  config?: ProjectConfig
): string[] {
  return caseFile.cases.map((testCase) => {
    const id = `${caseFile.name} > ${testCase.name}`;
    const settings = mergeCaseSettings(config, caseFile, testCase);
    registry.register({
      id,
      name: testCase.name,
      body: caseBody(testCase),
      setup: (context) => {
        context.defaultFloatingPointTolerance = settings.tolerance;
        context.currentValueFormatter = createValueFormatter(settings.format);
      },
    });
    return id;
  });
}
