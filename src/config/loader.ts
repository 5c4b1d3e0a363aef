/**
 * Configuration loader for crate-graph.
 *
 * Loads config from a YAML file with support for:
 * - Environment variable substitution (${VAR_NAME}, ${VAR_NAME:-default})
 * - Default values
 * - Validation
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { createLogger, setLogLevel } from '../core/logger.js';
import type { CrateGraphConfig } from './types.js';
import { DEFAULT_CONFIG } from './types.js';

const log = createLogger('config');

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: CRATE_GRAPH_CONFIG or './crate-graph.yaml') */
  configPath?: string;
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends Error {
  readonly code = 'CONFIG_INVALID';

  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

/**
 * Substitute environment variables in a string.
 */
function substituteEnvVars(value: string): string {
  return value.replace(ENV_VAR_PATTERN, (_match, varName: string, defaultValue: string | undefined) => {
    const envValue = process.env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    log.warn({ variable: varName }, 'Environment variable is not set and has no default');
    return '';
  });
}

/**
 * Recursively substitute environment variables in parsed YAML.
 */
function substituteEnvVarsRecursive(value: unknown): unknown {
  if (typeof value === 'string') {
    return substituteEnvVars(value);
  }
  if (Array.isArray(value)) {
    return value.map(substituteEnvVarsRecursive);
  }
  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = substituteEnvVarsRecursive(item);
    }
    return result;
  }
  return value;
}

// Substituted values arrive as strings
const booleanish = z.preprocess(
  (value) => (value === 'true' ? true : value === 'false' ? false : value),
  z.boolean()
);

const configSchema = z
  .object({
    namespace: z
      .object({
        baseUri: z.string().url(),
        prefix: z.string().regex(/^[A-Za-z][A-Za-z0-9_.-]*$/, 'must be a valid prefix name'),
      })
      .partial()
      .strict(),
    jsonld: z
      .object({
        prefixes: z.record(z.string().url()),
        vocab: z.string().url(),
      })
      .partial()
      .strict(),
    registry: z
      .object({
        duplicatePolicy: z.enum(['overwrite', 'reject']),
      })
      .partial()
      .strict(),
    graph: z
      .object({
        requireKnownClasses: booleanish,
      })
      .partial()
      .strict(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
  })
  .partial()
  .strict();

type PartialConfig = z.infer<typeof configSchema>;

/**
 * Validate a substituted config object.
 *
 * @throws ConfigValidationError naming the first offending path
 */
export function validateConfig(config: unknown): PartialConfig {
  const result = configSchema.safeParse(config);
  if (result.success) {
    return result.data;
  }
  const issue = result.error.issues[0];
  const path = issue?.path.join('.') ?? '';
  let value: unknown = config;
  for (const segment of issue?.path ?? []) {
    value = value !== null && typeof value === 'object' ? Reflect.get(value, segment) : undefined;
  }
  throw new ConfigValidationError(issue?.message ?? 'invalid configuration', path, value);
}

/**
 * Merge a validated partial config over the defaults.
 */
function applyDefaults(partial: PartialConfig): CrateGraphConfig {
  const config: CrateGraphConfig = {
    namespace: { ...DEFAULT_CONFIG.namespace, ...partial.namespace },
    jsonld: {
      ...DEFAULT_CONFIG.jsonld,
      ...partial.jsonld,
      prefixes: { ...DEFAULT_CONFIG.jsonld.prefixes, ...partial.jsonld?.prefixes },
    },
    registry: { ...DEFAULT_CONFIG.registry, ...partial.registry },
    graph: { ...DEFAULT_CONFIG.graph, ...partial.graph },
    logLevel: partial.logLevel ?? DEFAULT_CONFIG.logLevel,
  };
  return config;
}

/**
 * Parse configuration from YAML text.
 *
 * @param content - YAML source; an empty document yields the defaults
 */
export function parseConfig(content: string): CrateGraphConfig {
  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new ConfigValidationError(
      `invalid YAML: ${err instanceof Error ? err.message : String(err)}`,
      '',
      content
    );
  }
  if (parsed === null || parsed === undefined) {
    return applyDefaults({});
  }
  return applyDefaults(validateConfig(substituteEnvVarsRecursive(parsed)));
}

/**
 * Load configuration from a YAML file.
 *
 * @returns Loaded and validated configuration, or the defaults when
 *   the file does not exist
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CrateGraphConfig> {
  const configPath = options.configPath ?? process.env['CRATE_GRAPH_CONFIG'] ?? './crate-graph.yaml';
  const absolutePath = resolve(configPath);

  if (!existsSync(absolutePath)) {
    log.warn({ path: absolutePath }, 'Config file not found, using defaults');
    return applyDefaults({});
  }

  const content = await readFile(absolutePath, 'utf-8');
  const config = parseConfig(content);
  setLogLevel(config.logLevel);
  log.debug({ path: absolutePath }, 'Loaded configuration');
  return config;
}
