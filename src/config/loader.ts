/**
 * Configuration Loader
 *
 * Loads configuration from YAML files with environment-specific overrides and
 * exposes it through an explicitly constructed provider instead of a global.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { ServingConfigSchema, type ServingConfigShape } from '../types/schemas/config.js';
import { ConfigurationError, asError } from '../api/errors.js';
import { READINESS, TELEMETRY, SERVING, METRICS } from './defaults.js';

export type Environment = 'production' | 'development' | 'test';

/**
 * Configuration Schema (matches serving.yaml structure)
 */
export type ServingConfig = ServingConfigShape;

/**
 * Built-in defaults, used as the merge base for every file
 */
export const DEFAULT_SERVING_CONFIG: ServingConfig = {
  readiness: {
    wait_retries: READINESS.WAIT_RETRIES,
    wait_interval_ms: READINESS.WAIT_INTERVAL_MS,
  },
  telemetry: {
    sample_rate: TELEMETRY.SAMPLE_RATE,
    batch_size: TELEMETRY.BATCH_SIZE,
    shard_by_endpoint: TELEMETRY.SHARD_BY_ENDPOINT,
    verbose: TELEMETRY.VERBOSE,
  },
  registry: {
    default_function_tag: SERVING.DEFAULT_FUNCTION_TAG,
  },
  metrics: {
    enabled: METRICS.ENABLED,
    service_name: METRICS.SERVICE_NAME,
    prometheus_port: METRICS.PROMETHEUS_PORT,
    prevent_server_start: METRICS.PREVENT_SERVER_START,
  },
  logging: {
    level: 'info',
  },
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge plain objects; arrays and scalars from source replace target
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const output: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = output[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  // Walk up until we find package.json or reach root
  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

export function defaultConfigPath(): string {
  return join(findPackageRoot(), 'config', 'serving.yaml');
}

function resolveEnvironment(environment?: Environment): Environment {
  if (environment) {
    return environment;
  }
  const env = process.env.NODE_ENV;
  return env === 'production' || env === 'test' ? env : 'development';
}

/**
 * Load configuration from YAML file
 *
 * The file is merged over DEFAULT_SERVING_CONFIG, then the matching
 * `environments.<env>` section is merged over the result.
 */
export function loadConfig(configPath?: string, environment?: Environment): ServingConfig {
  const finalPath = configPath ?? defaultConfigPath();

  let fileContents: string;
  try {
    fileContents = readFileSync(finalPath, 'utf8');
  } catch (error) {
    const err = asError(error);
    if ('code' in err && err.code === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${finalPath}`, err);
    }
    throw new ConfigurationError(`Failed to read configuration: ${err.message}`, err);
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(fileContents);
  } catch (error) {
    const err = asError(error);
    throw new ConfigurationError(`Failed to parse configuration: ${err.message}`, err);
  }

  const raw: Record<string, unknown> = isPlainObject(parsed) ? parsed : {};
  const { environments, ...base } = raw;

  let merged = deepMerge({ ...DEFAULT_SERVING_CONFIG }, base);
  const envOverrides = isPlainObject(environments)
    ? environments[resolveEnvironment(environment)]
    : undefined;
  if (isPlainObject(envOverrides)) {
    merged = deepMerge(merged, envOverrides);
  }

  return validateConfig(merged);
}

/**
 * Validate configuration values
 */
export function validateConfig(config: unknown): ServingConfig {
  const parseResult = ServingConfigSchema.safeParse(config);
  if (!parseResult.success) {
    const errors = parseResult.error.issues.map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${field} ${issue.message}`;
    });

    throw new ConfigurationError(`Configuration validation failed:\n${errors.join('\n')}`);
  }
  return parseResult.data;
}

export interface ServingConfigProviderOptions {
  configPath?: string;
  environment?: Environment;
  /** Skip the file and serve this config (tests, embedded use) */
  config?: ServingConfig;
}

/**
 * Injected configuration holder.
 *
 * Loads lazily on first get(); refresh() re-reads the file so callers decide
 * when configuration changes take effect.
 */
export class ServingConfigProvider {
  private readonly options: ServingConfigProviderOptions;
  private current: ServingConfig | null;

  constructor(options: ServingConfigProviderOptions = {}) {
    this.options = options;
    this.current = options.config ? validateConfig(options.config) : null;
  }

  public get(): ServingConfig {
    if (!this.current) {
      this.current = this.load();
    }
    return this.current;
  }

  public refresh(): ServingConfig {
    this.current = this.options.config ? validateConfig(this.options.config) : this.load();
    return this.current;
  }

  private load(): ServingConfig {
    const path = this.options.configPath ?? defaultConfigPath();
    if (!this.options.configPath && !existsSync(path)) {
      return DEFAULT_SERVING_CONFIG;
    }
    return loadConfig(path, this.options.environment);
  }
}
