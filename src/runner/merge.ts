import type { FormatOptions } from "../format/value.js";
import { Tolerance } from "../tolerance/tolerance.js";
import type { Case, CaseFile, FormatSetting, ProjectConfig, ToleranceSetting } from "../types/index.js";

export interface CaseSettings {
  tolerance: Tolerance;
  format: FormatOptions;
}

/**
 * Build a Tolerance from its config form
 */
export function toTolerance(setting: ToleranceSetting): Tolerance {
  switch (setting.mode) {
    case "percent":
      return Tolerance.percent(setting.amount);
    case "ulps":
      return Tolerance.ulps(setting.amount);
    default:
      return Tolerance.linear(setting.amount);
  }
}

/**
 * Merge the default tolerance (the most specific level wins)
 */
function mergeTolerance(...levels: (ToleranceSetting | undefined)[]): Tolerance {
  let merged: ToleranceSetting | undefined;
  for (const level of levels) {
    if (level !== undefined) {
      merged = level;
    }
  }
  return merged ? toTolerance(merged) : Tolerance.default;
}

/**
 * Merge format settings (scalars override field by field)
 */
function mergeFormat(...levels: (FormatSetting | undefined)[]): FormatOptions {
  const merged: FormatOptions = {};
  for (const level of levels) {
    if (level?.max_string_length !== undefined) {
      merged.maxStringLength = level.max_string_length;
    }
    if (level?.max_items !== undefined) {
      merged.maxItems = level.max_items;
    }
  }
  return merged;
}

/**
 * Merge settings from config -> case file -> case
 * - Scalars: Higher level overrides lower
 * - A tolerance block replaces the inherited one as a whole
 */
export function mergeCaseSettings(
  config: ProjectConfig | undefined,
  file: CaseFile | undefined,
  testCase: Case | undefined
): CaseSettings {
  return {
    tolerance: mergeTolerance(config?.tolerance, file?.tolerance, testCase?.tolerance),
    format: mergeFormat(config?.format, file?.format),
  };
}
