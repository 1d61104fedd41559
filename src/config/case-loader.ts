import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { ConfigurationError } from '../errors.js';
import { CaseFileSchema, type CaseFile } from '../types/index.js';
import { readYamlFile } from './loader.js';

export interface LoadCaseFileResult {
  caseFile: CaseFile;
  filePath: string;
}

/**
 * Load and validate a single case file
 */
export function loadCaseFile(filePath: string, cwd: string = process.cwd()): LoadCaseFileResult {
  const absolute = resolve(cwd, filePath);
  if (!existsSync(absolute)) {
    throw new ConfigurationError(`Case file not found: ${absolute}`);
  }

  return {
    caseFile: readYamlFile(absolute, CaseFileSchema, 'case file'),
    filePath: absolute,
  };
}
