import { readFileSync, existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import yaml from 'js-yaml';
import type { ZodType, ZodTypeDef } from 'zod';
import { ConfigurationError } from '../errors.js';
import { ProjectConfigSchema, type ProjectConfig } from '../types/index.js';

export const CONFIG_FILENAME = 'tenet.config.yaml';

/**
 * Find config file by walking up from cwd
 */
function findConfigFile(startDir: string): string | null {
  let dir = startDir;
  while (true) {
    const configPath = resolve(dir, CONFIG_FILENAME);
    if (existsSync(configPath)) {
      return configPath;
    }
    const parentDir = dirname(dir);
    if (parentDir === dir) {
      return null;
    }
    dir = parentDir;
  }
}

/**
 * Read a YAML file and validate it, listing every schema issue on failure
 */
export function readYamlFile<T>(
  filePath: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  label: string
): T {
  const content = readFileSync(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Invalid ${label} ${filePath}: ${reason}`);
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new ConfigurationError(`Invalid ${label} ${filePath}:\n${errors}`);
  }
  return result.data;
}

export interface LoadConfigOptions {
  configPath?: string;
  cwd?: string;
}

export interface LoadConfigResult {
  config: ProjectConfig;
  /** Null when no config file was found and defaults apply. */
  configPath: string | null;
}

/**
 * Load and validate project config. Without a config file every setting
 * takes its default.
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadConfigResult {
  const cwd = options.cwd ?? process.cwd();

  if (options.configPath !== undefined) {
    const configPath = resolve(cwd, options.configPath);
    if (!existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`);
    }
    return { config: readYamlFile(configPath, ProjectConfigSchema, 'config file'), configPath };
  }

  const configPath = findConfigFile(cwd);
  if (!configPath) {
    return { config: ProjectConfigSchema.parse({}), configPath: null };
  }

  return {
    config: readYamlFile(configPath, ProjectConfigSchema, 'config file'),
    configPath,
  };
}
