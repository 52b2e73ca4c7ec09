/**
 * Serving Configuration Schemas
 *
 * Zod schemas for validating serving.yaml configuration.
 *
 * @module schemas/config
 */

import { z } from 'zod';
import { LogLevelSchema, NonEmptyString, PositiveInteger } from './common.js';

/**
 * Readiness wait budget for background triggers
 */
export const ReadinessConfigSchema = z.object({
  wait_retries: z.number().int().min(0, 'must be >= 0'),
  wait_interval_ms: PositiveInteger,
});

/**
 * Telemetry push configuration
 */
export const TelemetryConfigSchema = z.object({
  sample_rate: PositiveInteger,
  batch_size: PositiveInteger,
  shard_by_endpoint: z.boolean(),
  verbose: z.boolean(),
});

export const RegistryConfigSchema = z.object({
  default_function_tag: NonEmptyString,
});

/**
 * OpenTelemetry metrics configuration
 */
export const MetricsConfigSchema = z.object({
  enabled: z.boolean(),
  service_name: z
    .string()
    .min(1, 'Service name cannot be empty')
    .max(100, 'Service name cannot exceed 100 characters')
    .regex(
      /^[a-zA-Z0-9_-]+$/,
      'Service name must contain only alphanumeric characters, hyphens, and underscores'
    ),
  prometheus_port: z
    .number()
    .int('Prometheus port must be an integer')
    .min(1024, 'Prometheus port must be >= 1024')
    .max(65535, 'Prometheus port must be <= 65535'),
  /** Register the Prometheus reader without opening its HTTP endpoint */
  prevent_server_start: z.boolean(),
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema,
});

/**
 * Complete serving configuration (after environment merge)
 */
export const ServingConfigSchema = z.object({
  readiness: ReadinessConfigSchema,
  telemetry: TelemetryConfigSchema,
  registry: RegistryConfigSchema,
  metrics: MetricsConfigSchema,
  logging: LoggingConfigSchema,
});

export type ServingConfigShape = z.infer<typeof ServingConfigSchema>;
