/**
 * OpenTelemetry infrastructure for model-dispatcher.
 *
 * Provides metrics collection, Prometheus exporter, and standardized
 * instrumentation for model loading, request dispatch, telemetry pushes
 * and endpoint registry failures.
 *
 * @module telemetry/otel
 */

import { metrics, type Meter, type Counter, type Histogram } from '@opentelemetry/api';
import { MeterProvider } from '@opentelemetry/sdk-metrics';
import { PrometheusExporter } from '@opentelemetry/exporter-prometheus';
import type { Logger } from 'pino';
import { METRICS } from '../config/defaults.js';

/**
 * Configuration options for OpenTelemetry metrics.
 */
export interface TelemetryConfig {
  /**
   * Enable metrics collection (default: false).
   */
  enabled: boolean;
  /**
   * Service name for metrics (default: 'model-dispatcher').
   */
  serviceName?: string;
  /**
   * Prometheus exporter port (default: 9464).
   */
  prometheusPort?: number;
  /**
   * Register the exporter without opening its HTTP endpoint.
   */
  preventServerStart?: boolean;
  /**
   * Optional logger for telemetry events.
   */
  logger?: Logger;
}

interface NormalizedTelemetryConfig {
  enabled: boolean;
  serviceName: string;
  prometheusPort: number;
  preventServerStart: boolean;
  logger: Logger | undefined;
}

/**
 * Standard metrics exported by model-dispatcher.
 */
export interface ServingMetrics {
  // Model lifecycle
  modelsLoaded: Counter;
  modelLoadFailures: Counter;
  modelLoadDuration: Histogram;

  // Request dispatch
  requestsServed: Counter;
  requestDuration: Histogram;
  inferenceErrors: Counter;
  readinessRejections: Counter;

  // Telemetry stream
  telemetryRecordsPushed: Counter;
  telemetryPushFailures: Counter;

  // Endpoint registry
  registryFailures: Counter;
}

/**
 * OpenTelemetry telemetry manager for model-dispatcher.
 *
 * @example
 * ```typescript
 * const telemetry = new TelemetryManager({ enabled: true, prometheusPort: 9464 });
 * await telemetry.start();
 *
 * telemetry.metrics.requestsServed.add(1, { model: 'churn', operation: 'infer' });
 *
 * await telemetry.shutdown();
 * ```
 */
export class TelemetryManager {
  private readonly config: NormalizedTelemetryConfig;
  private meterProvider: MeterProvider | null = null;
  private prometheusExporter: PrometheusExporter | null = null;
  private meter: Meter | null = null;
  private _metrics: ServingMetrics | null = null;
  private started = false;

  constructor(config: TelemetryConfig) {
    this.config = {
      enabled: config.enabled,
      serviceName: config.serviceName || METRICS.SERVICE_NAME,
      prometheusPort: config.prometheusPort ?? METRICS.PROMETHEUS_PORT,
      preventServerStart: config.preventServerStart ?? false,
      logger: config.logger,
    };
  }

  /**
   * Get the initialized metrics. Throws if not started.
   */
  public get metrics(): ServingMetrics {
    if (!this._metrics) {
      throw new Error('TelemetryManager not started. Call start() first.');
    }
    return this._metrics;
  }

  /**
   * Initialize the OpenTelemetry metrics provider and create metrics.
   *
   * @throws {Error} if telemetry is disabled.
   */
  public async start(): Promise<void> {
    if (!this.config.enabled) {
      throw new Error('Telemetry is disabled. Set enabled:true in config.');
    }

    if (this.started) {
      this.config.logger?.warn('TelemetryManager already started');
      return;
    }

    try {
      // Prometheus exporter acts as its own pull reader
      this.prometheusExporter = new PrometheusExporter({
        port: this.config.prometheusPort,
        preventServerStart: this.config.preventServerStart,
      });

      this.meterProvider = new MeterProvider({
        readers: [this.prometheusExporter],
      });

      metrics.setGlobalMeterProvider(this.meterProvider);
      this.meter = this.meterProvider.getMeter(this.config.serviceName, '0.1.0');
      this._metrics = this.createMetrics(this.meter);
      this.started = true;

      this.config.logger?.info(
        {
          serviceName: this.config.serviceName,
          prometheusPort: this.config.prometheusPort,
          serverStarted: !this.config.preventServerStart,
        },
        'OpenTelemetry metrics started'
      );
    } catch (error) {
      this.config.logger?.error({ err: error }, 'Failed to start telemetry');
      throw error;
    }
  }

  /**
   * Shutdown the telemetry manager and flush all metrics.
   */
  public async shutdown(): Promise<void> {
    if (!this.started) {
      return;
    }

    try {
      await this.meterProvider?.shutdown();
      await this.prometheusExporter?.shutdown();

      this.started = false;
      this._metrics = null;
      this.meter = null;
      this.meterProvider = null;
      this.prometheusExporter = null;
      metrics.disable();

      this.config.logger?.info('OpenTelemetry metrics shut down');
    } catch (error) {
      this.config.logger?.error({ err: error }, 'Failed to shutdown telemetry');
      throw error;
    }
  }

  public isStarted(): boolean {
    return this.started;
  }

  private createMetrics(meter: Meter): ServingMetrics {
    return {
      modelsLoaded: meter.createCounter('model_dispatcher_models_loaded_total', {
        description: 'Total number of models loaded',
        unit: '1',
      }),
      modelLoadFailures: meter.createCounter('model_dispatcher_model_load_failures_total', {
        description: 'Total number of failed model loads',
        unit: '1',
      }),
      modelLoadDuration: meter.createHistogram('model_dispatcher_model_load_duration_ms', {
        description: 'Time taken to load a model',
        unit: 'ms',
      }),

      requestsServed: meter.createCounter('model_dispatcher_requests_served_total', {
        description: 'Total number of inference/explain requests served',
        unit: '1',
      }),
      requestDuration: meter.createHistogram('model_dispatcher_request_duration_ms', {
        description: 'Time taken to serve an inference/explain request',
        unit: 'ms',
      }),
      inferenceErrors: meter.createCounter('model_dispatcher_inference_errors_total', {
        description: 'Total number of predict/explain failures',
        unit: '1',
      }),
      readinessRejections: meter.createCounter('model_dispatcher_readiness_rejections_total', {
        description: 'Requests rejected because the model was not ready',
        unit: '1',
      }),

      telemetryRecordsPushed: meter.createCounter('model_dispatcher_telemetry_records_pushed_total', {
        description: 'Telemetry records accepted by the output sink',
        unit: '1',
      }),
      telemetryPushFailures: meter.createCounter('model_dispatcher_telemetry_push_failures_total', {
        description: 'Telemetry records dropped after a sink failure',
        unit: '1',
      }),

      registryFailures: meter.createCounter('model_dispatcher_registry_failures_total', {
        description: 'Endpoint registry lookups/writes that failed softly',
        unit: '1',
      }),
    };
  }
}

/**
 * Create a telemetry manager with the given configuration.
 */
export function createTelemetry(config: TelemetryConfig): TelemetryManager {
  return new TelemetryManager(config);
}
