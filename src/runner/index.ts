export { runTest, type RunTestOptions, type TestBody } from "./test.js";
export { TestRegistry, type RegisteredTest, type RunAllOptions } from "./registry.js";
export { mergeCaseSettings, toTolerance, type CaseSettings } from "./merge.js";
