/**
 * Telemetry bridge adapter
 *
 * Connects the ServingTelemetryHooks interface (used by ModelServer) to the
 * TelemetryManager (OpenTelemetry implementation). This allows the server to
 * use simple callbacks while the telemetry system records structured metrics.
 *
 * @module telemetry/bridge
 */

import type { Logger } from 'pino';
import { TelemetryPushFailure, type DispatcherError } from '../api/errors.js';
import type { ServingTelemetryHooks } from './hooks.js';
import { TelemetryManager, type TelemetryConfig, type ServingMetrics } from './otel.js';

/**
 * Creates telemetry hooks that bridge to OpenTelemetry metrics.
 *
 * @example
 * ```typescript
 * const { hooks, manager } = await createTelemetryBridge({ enabled: true }, logger);
 * const server = createModelServer(capability, options, { telemetry: hooks });
 *
 * // Cleanup on shutdown
 * await manager.shutdown();
 * ```
 */
export async function createTelemetryBridge(
  config: TelemetryConfig,
  logger?: Logger
): Promise<{ hooks: ServingTelemetryHooks; manager: TelemetryManager }> {
  const manager = new TelemetryManager({ ...config, logger });

  if (config.enabled) {
    await manager.start();
  }

  const hooks = createHooksFromManager(manager, config.enabled, logger);

  return { hooks, manager };
}

/**
 * Creates ServingTelemetryHooks implementation from a TelemetryManager.
 *
 * @internal
 */
function createHooksFromManager(
  manager: TelemetryManager,
  enabled: boolean,
  logger?: Logger
): ServingTelemetryHooks {
  if (!enabled) {
    return {};
  }

  // Metric recording must never break request handling
  const record = (name: string, fn: (metrics: ServingMetrics) => void): void => {
    try {
      fn(manager.metrics);
    } catch (error) {
      logger?.debug({ metric: name, err: error }, 'Failed to record metric');
    }
  };

  return {
    onModelLoaded: (model: string, durationMs: number) => {
      record('modelsLoaded', (metrics) => {
        metrics.modelsLoaded.add(1, { model });
        metrics.modelLoadDuration.record(durationMs, { model });
      });
    },

    onModelLoadFailed: (model: string, error: DispatcherError) => {
      record('modelLoadFailures', (metrics) => {
        metrics.modelLoadFailures.add(1, { model, code: error.code });
      });
    },

    onRequestServed: (model: string, operation: string, durationMs: number) => {
      record('requestsServed', (metrics) => {
        metrics.requestsServed.add(1, { model, operation });
        metrics.requestDuration.record(durationMs, { model, operation });
      });
    },

    onInferenceError: (model: string, operation: string, error: DispatcherError) => {
      record('inferenceErrors', (metrics) => {
        metrics.inferenceErrors.add(1, { model, operation, code: error.code });
      });
    },

    onReadinessRejected: (model: string, operation: string) => {
      record('readinessRejections', (metrics) => {
        metrics.readinessRejections.add(1, { model, operation });
      });
    },

    onTelemetryPushed: (model: string, records: number) => {
      record('telemetryRecordsPushed', (metrics) => {
        metrics.telemetryRecordsPushed.add(records, { model });
      });
    },

    onTelemetryPushFailed: (model: string, error: DispatcherError) => {
      record('telemetryPushFailures', (metrics) => {
        const records = error instanceof TelemetryPushFailure ? error.records : 1;
        metrics.telemetryPushFailures.add(records, { model, code: error.code });
      });
    },

    onRegistryFailure: (model: string, error: DispatcherError) => {
      record('registryFailures', (metrics) => {
        metrics.registryFailures.add(1, { model, code: error.code });
      });
    },
  };
}

/**
 * Get metrics from a telemetry manager (for testing/debugging).
 */
export function getMetrics(manager: TelemetryManager): ServingMetrics | undefined {
  return manager.isStarted() ? manager.metrics : undefined;
}
