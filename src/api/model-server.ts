import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import type { ModelServerEvents } from './events.js';
import {
  InferenceError,
  NotReadyError,
  RequestValidationError,
  asError,
  zodErrorToValidationError,
} from './errors.js';
import { CONTEXT_PARAMS } from '../config/defaults.js';
import { ServingConfigProvider, type ServingConfig } from '../config/loader.js';
import { expandDictInputs } from '../core/input-expansion.js';
import { ModelIdentityResolver, type ModelIdentity } from '../core/model-identity.js';
import { ModelLoader, type LoadMode, type LoadOutcome } from '../core/model-loader.js';
import {
  OperationRouter,
  type OperationHandlers,
  type RoutedRequest,
} from '../core/operation-router.js';
import { ReadinessGate, type ReadinessState } from '../core/readiness-gate.js';
import { EndpointRegistrar } from '../services/endpoint-registrar.js';
import { createTelemetryBridge } from '../telemetry/bridge.js';
import { runHook, type ServingTelemetryHooks } from '../telemetry/hooks.js';
import { TelemetryPusher } from '../telemetry/log-pusher.js';
import type { TelemetryManager } from '../telemetry/otel.js';
import type { HostingContext } from '../types/context.js';
import {
  isRecord,
  type InferenceRequest,
  type InferenceResponse,
  type ModelMetadata,
  type ServingEvent,
  type StatusResponse,
} from '../types/event.js';
import type { ArtifactResolver, CustomOperation, ModelCapability } from '../types/model.js';
import type { EndpointRegistry } from '../types/registry.js';
import { InferenceRequestSchema } from '../types/schemas/request.js';
import { formatMicros, systemClock, type MicrosClock } from '../utils/clock.js';
import { updateResultBody } from '../utils/event-path.js';
import { componentLogger, createRootLogger } from '../utils/logger-helpers.js';

export interface ModelServerOptions {
  /** `name` or `name:version` */
  name: string;
  /** Model artifact path, resolved through the artifact resolver */
  modelPath?: string;
  /** Request protocol; `v2` requires an `inputs` list (default v2) */
  protocol?: string;
  /** Dotted path of the request inside the event body */
  inputPath?: string;
  /** Dotted path the response is written to inside the event body */
  resultPath?: string;
  /** Partition telemetry by endpoint uid (default from config) */
  shardByEndpoint?: boolean;
  /** Custom operations, keyed by operation name */
  operations?: Record<string, CustomOperation>;
  /** Server params, read first by getParam() */
  params?: Record<string, unknown>;
  /** The model object is already in memory; the server starts ready */
  preloaded?: boolean;
  context: HostingContext;
}

export interface ModelServerDependencies {
  logger?: Logger;
  config?: ServingConfigProvider;
  registry?: EndpointRegistry;
  /** Shared registrar; built from `registry` when omitted */
  registrar?: EndpointRegistrar;
  artifacts?: ArtifactResolver;
  /** Metric hooks; when omitted and `metrics.enabled` is set, built from config */
  telemetry?: ServingTelemetryHooks;
  clock?: MicrosClock;
}

type PredictOperation = Parameters<OperationHandlers['inference']>[1];

/**
 * Class name of a class-based capability; undefined for plain objects
 */
function classNameOf(capability: ModelCapability): string | undefined {
  const prototype: unknown = Object.getPrototypeOf(capability);
  if (prototype === null || prototype === Object.prototype) {
    return undefined;
  }
  return capability.constructor.name || undefined;
}

/**
 * A capability result carrying `outputs` is unwrapped into the envelope
 */
function unwrapOutputs(result: unknown): unknown {
  return isRecord(result) && 'outputs' in result ? result.outputs : result;
}

/**
 * Request dispatcher in front of one model capability.
 *
 * Classifies each event into an operation, applies the readiness policy,
 * runs the capability hooks, builds the response envelope and pushes
 * best-effort telemetry. Inference failures always reach the caller;
 * registry and telemetry failures never do.
 *
 * Events:
 * - 'model:loaded' - Emitted when the load hook completed
 * - 'model:failed' - Emitted when the load hook raised
 * - 'endpoint:reconciled' - Emitted after monitoring initialization
 * - 'request:served' - Emitted for each inference/explain response
 */
export class ModelServer extends EventEmitter<ModelServerEvents> {
  public readonly name: string;

  private readonly capability: ModelCapability;
  private readonly options: ModelServerOptions;
  private readonly config: ServingConfig;
  private readonly logger: Logger;
  private readonly hooks: ServingTelemetryHooks;
  private readonly clock: MicrosClock;
  private readonly className: string;
  private readonly ownsHooks: boolean;

  private readonly gate: ReadinessGate;
  private readonly loader: ModelLoader;
  private readonly router: OperationRouter;
  private readonly identity: ModelIdentityResolver;
  private readonly registrar?: EndpointRegistrar;

  private readonly params: Record<string, unknown>;
  private readonly metrics: Record<string, unknown> = {};
  private artifactParamsMerged = false;
  private endpointUid: string | undefined;
  private pusher: TelemetryPusher | null = null;
  private metricsStart: Promise<void> | null = null;
  private telemetryManager: TelemetryManager | null = null;

  /**
   * @param capability - The model hooks (load/predict and optional overrides).
   * @param options - Naming, addressing and hosting context.
   * @param dependencies - Optional collaborators (logger, config, registry, telemetry hooks).
   */
  constructor(
    capability: ModelCapability,
    options: ModelServerOptions,
    dependencies: ModelServerDependencies = {}
  ) {
    super();

    this.capability = capability;
    this.options = options;
    this.config = (dependencies.config ?? new ServingConfigProvider()).get();
    this.logger = dependencies.logger ?? createRootLogger(this.config.logging.level);
    this.hooks = { ...dependencies.telemetry };
    this.ownsHooks = dependencies.telemetry === undefined;
    this.clock = dependencies.clock ?? systemClock;
    this.params = { ...options.params };

    this.identity = new ModelIdentityResolver({
      name: options.name,
      modelPath: options.modelPath,
      protocol: options.protocol,
      artifacts: dependencies.artifacts,
      logger: this.logger,
    });
    this.name = this.identity.name;
    this.className = capability.className ?? classNameOf(capability) ?? this.name;

    this.gate = new ReadinessGate({
      modelName: this.name,
      budget: {
        retries: this.config.readiness.wait_retries,
        intervalMs: this.config.readiness.wait_interval_ms,
      },
      ready: options.preloaded,
      logger: componentLogger(this.logger, 'readiness'),
    });

    this.loader = new ModelLoader({
      modelName: this.name,
      gate: this.gate,
      load: () => capability.load(),
      onSettled: (outcome) => this.onLoadSettled(outcome),
      logger: this.logger,
    });

    this.router = new OperationRouter({
      operations: options.operations,
      inputPath: options.inputPath,
      logger: componentLogger(this.logger, 'router'),
    });

    this.registrar =
      dependencies.registrar ??
      (dependencies.registry
        ? new EndpointRegistrar(dependencies.registry, {
            logger: componentLogger(this.logger, 'registrar'),
            hooks: this.hooks,
          })
        : undefined);
  }

  /**
   * Load the model and initialize monitoring.
   *
   * @param mode - `sync` awaits the load; `async` schedules it and returns at once.
   * @throws {LoadError} in sync mode when the load hook fails.
   */
  public async postInit(mode: LoadMode = 'sync'): Promise<void> {
    if (!this.metricsStart) {
      this.metricsStart = this.startMetrics();
    }
    await this.metricsStart;
    await this.loader.runLoad(mode);
  }

  /**
   * Stop the metrics exporter started from config, if any.
   */
  public async shutdown(): Promise<void> {
    const manager = this.telemetryManager;
    this.telemetryManager = null;
    if (manager) {
      await manager.shutdown();
    }
  }

  /**
   * Metrics manager started from `config.metrics`; null when hooks were injected
   * or metrics are disabled.
   */
  public getTelemetryManager(): TelemetryManager | null {
    return this.telemetryManager;
  }

  /**
   * Resolves once the load and monitoring initialization have completed.
   * Undefined before postInit().
   */
  public whenSettled(): Promise<LoadOutcome> | undefined {
    return this.loader.whenSettled();
  }

  /**
   * Dispatch one event. The event is mutated in place and returned.
   *
   * @throws {InvalidOperationError} for unknown operation/method pairs.
   * @throws {NotReadyError} when the readiness policy rejects the event.
   * @throws {RequestValidationError | InvalidArgumentError} for malformed requests.
   * @throws {InferenceError} when predict/explain fails.
   */
  public async handle(event: ServingEvent): Promise<ServingEvent> {
    const startMicros = this.clock();
    return this.router.dispatch(event, {
      inference: (request, operation) => this.handleInference(request, operation, startMicros),
      explain: (request) => this.handleExplain(request, startMicros),
      health: (request) => this.handleHealth(request),
      metadata: (request) => this.handleMetadata(request),
      custom: (request, operation) => this.handleCustom(request, operation),
    });
  }

  /**
   * Get a param by key: server params first, then the hosting context.
   */
  public getParam(key: string, defaultValue?: unknown): unknown {
    if (key in this.params) {
      return this.params[key];
    }
    return this.options.context.getParam?.(key) ?? defaultValue;
  }

  /**
   * Set a real-time metric attached to every telemetry record.
   */
  public setMetric(name: string, value: unknown): void {
    this.metrics[name] = value;
  }

  /**
   * Resolved name/version/labels; computed once and shared by concurrent callers.
   */
  public async getIdentity(): Promise<ModelIdentity> {
    const identity = await this.identity.resolve();
    if (!this.artifactParamsMerged) {
      this.artifactParamsMerged = true;
      if (identity.spec) {
        Object.assign(this.params, identity.spec.parameters);
      }
    }
    return identity;
  }

  public getEndpointUid(): string | undefined {
    return this.endpointUid;
  }

  public isReady(): boolean {
    return this.gate.isReady();
  }

  public getReadinessState(): ReadinessState {
    return this.gate.getState();
  }

  private async handleInference(
    routed: RoutedRequest,
    operation: PredictOperation,
    startMicros: number
  ): Promise<ServingEvent> {
    await this.checkReadiness(routed.event, operation);
    const identity = await this.getIdentity();

    let request = this.toRequest(routed.body);
    if (operation === 'predict_dict' || operation === 'infer_dict') {
      request = expandDictInputs(
        request,
        identity.spec?.inputs.map((feature) => feature.name)
      );
    }
    request = this.prepare(request, operation);

    let result: unknown;
    try {
      result = await this.capability.predict(request);
    } catch (error) {
      throw this.inferenceFailure(request, routed, startMicros, error);
    }

    let response: InferenceResponse = {
      id: routed.eventId,
      model_name: this.name,
      outputs: unwrapOutputs(result),
      timestamp: formatMicros(startMicros),
      model_version: identity.version,
    };
    if (this.capability.postprocess) {
      response = this.capability.postprocess(response);
    }

    return this.complete(routed, request, response, startMicros);
  }

  private async handleExplain(routed: RoutedRequest, startMicros: number): Promise<ServingEvent> {
    await this.checkReadiness(routed.event, 'explain');
    const identity = await this.getIdentity();
    const request = this.prepare(this.toRequest(routed.body), 'explain');

    let result: unknown;
    try {
      if (!this.capability.explain) {
        throw new Error(`model ${this.name} does not implement explain`);
      }
      result = await this.capability.explain(request);
    } catch (error) {
      throw this.inferenceFailure(request, routed, startMicros, error);
    }

    const response: InferenceResponse = {
      id: routed.eventId,
      model_name: this.name,
      outputs: unwrapOutputs(result),
      model_version: identity.version,
    };

    return this.complete(routed, request, response, startMicros);
  }

  private handleHealth(routed: RoutedRequest): ServingEvent {
    const { event, eventId } = routed;
    event.terminated = true;

    const response: StatusResponse = this.gate.isReady()
      ? { statusCode: 200, body: `Model ${this.name} is ready (event_id = ${eventId})` }
      : { statusCode: 408, body: 'model not ready' };
    event.body = response;
    return event;
  }

  private async handleMetadata(routed: RoutedRequest): Promise<ServingEvent> {
    const { event } = routed;
    event.terminated = true;

    const identity = await this.getIdentity();
    const metadata: ModelMetadata = {
      name: this.name,
      version: identity.version,
      inputs: identity.spec?.inputs ?? [],
      outputs: identity.spec?.outputs ?? [],
    };
    event.body = updateResultBody(this.options.resultPath, routed.originalBody, metadata);
    return event;
  }

  private async handleCustom(routed: RoutedRequest, operation: CustomOperation): Promise<ServingEvent> {
    const { event } = routed;
    if (operation.requiresReady) {
      await this.checkReadiness(event, routed.operation);
    }

    const result = await operation.handler(event);
    event.body = updateResultBody(this.options.resultPath, routed.originalBody, result);
    event.terminated = true;
    return event;
  }

  private async checkReadiness(event: ServingEvent, operation: string): Promise<void> {
    try {
      await this.gate.check(event);
    } catch (error) {
      if (error instanceof NotReadyError) {
        runHook(this.logger, 'onReadinessRejected', () =>
          this.hooks.onReadinessRejected?.(this.name, operation)
        );
      }
      throw error;
    }
  }

  private toRequest(body: unknown): InferenceRequest {
    if (!isRecord(body)) {
      throw new RequestValidationError('Expected the request body to be a mapping', {
        received: Array.isArray(body) ? 'array' : typeof body,
      });
    }
    return { ...body };
  }

  /**
   * preprocess → validate, with identity/protocol defaults
   */
  private prepare(request: InferenceRequest, operation: string): InferenceRequest {
    const preprocessed = this.capability.preprocess
      ? this.capability.preprocess(request, operation)
      : request;

    if (this.capability.validate) {
      return this.capability.validate(preprocessed, operation);
    }
    if (this.identity.protocol === 'v2') {
      const result = InferenceRequestSchema.safeParse(preprocessed);
      if (!result.success) {
        throw zodErrorToValidationError(result.error);
      }
    }
    return preprocessed;
  }

  private inferenceFailure(
    request: InferenceRequest,
    routed: RoutedRequest,
    startMicros: number,
    error: unknown
  ): InferenceError {
    const cause = asError(error);
    request.id = routed.eventId;

    this.pusher?.push({
      startMicros,
      request,
      operation: routed.operation,
      error: cause,
      partitionKey: this.partitionKey(),
    });

    const failure = new InferenceError(routed.operation, routed.eventId, cause);
    this.logger.warn({ model: this.name, id: routed.eventId, operation: routed.operation, err: cause }, failure.message);
    runHook(this.logger, 'onInferenceError', () =>
      this.hooks.onInferenceError?.(this.name, routed.operation, failure)
    );
    return failure;
  }

  private complete(
    routed: RoutedRequest,
    request: InferenceRequest,
    response: InferenceResponse,
    startMicros: number
  ): ServingEvent {
    const { event, operation, eventId } = routed;
    this.track(request, response, operation, eventId, startMicros);

    event.body = updateResultBody(this.options.resultPath, routed.originalBody, response);

    const durationMs = (this.clock() - startMicros) / 1000;
    this.emit('request:served', {
      id: eventId,
      model: this.name,
      operation,
      durationMs,
      timestamp: Date.now(),
    });
    runHook(this.logger, 'onRequestServed', () =>
      this.hooks.onRequestServed?.(this.name, operation, durationMs)
    );
    return event;
  }

  private track(
    request: InferenceRequest,
    response: InferenceResponse,
    operation: string,
    eventId: string,
    startMicros: number
  ): void {
    if (!this.pusher) {
      return;
    }

    const partitionKey = this.partitionKey();
    const logged = this.capability.loggedResults?.(request, response, operation);
    if (!logged || (logged.inputs === undefined && logged.outputs === undefined)) {
      this.pusher.push({ startMicros, request, response, operation, partitionKey });
      return;
    }

    this.pusher.push({
      startMicros,
      request: { id: eventId, inputs: logged.inputs ?? [] },
      response: { outputs: logged.outputs ?? [] },
      operation,
      partitionKey,
    });
  }

  private partitionKey(): string | undefined {
    const shard = this.options.shardByEndpoint ?? this.config.telemetry.shard_by_endpoint;
    return shard ? this.endpointUid : undefined;
  }

  /**
   * Build metric hooks from `config.metrics` when none were injected. The hooks
   * object is shared with the registrar and pusher, so it is filled in place.
   */
  private async startMetrics(): Promise<void> {
    const { metrics } = this.config;
    if (!this.ownsHooks || !metrics.enabled) {
      return;
    }

    try {
      const bridge = await createTelemetryBridge(
        {
          enabled: true,
          serviceName: metrics.service_name,
          prometheusPort: metrics.prometheus_port,
          preventServerStart: metrics.prevent_server_start,
        },
        componentLogger(this.logger, 'metrics')
      );
      this.telemetryManager = bridge.manager;
      Object.assign(this.hooks, bridge.hooks);
    } catch (error) {
      this.logger.warn({ model: this.name, err: error }, 'Failed to start metrics, serving without them');
    }
  }

  private async onLoadSettled(outcome: LoadOutcome): Promise<void> {
    if (outcome.status === 'ready') {
      if (!outcome.skipped) {
        runHook(this.logger, 'onModelLoaded', () =>
          this.hooks.onModelLoaded?.(this.name, outcome.durationMs)
        );
      }
      this.emit('model:loaded', {
        model: this.name,
        durationMs: outcome.durationMs,
        skipped: outcome.skipped,
        timestamp: Date.now(),
      });
    } else {
      runHook(this.logger, 'onModelLoadFailed', () =>
        this.hooks.onModelLoadFailed?.(this.name, outcome.error)
      );
      this.emit('model:failed', { model: this.name, error: outcome.error, timestamp: Date.now() });
    }

    await this.initializeMonitoring();
  }

  /**
   * Endpoint reconciliation, then the telemetry pusher. Skipped in mock mode
   * unless monitoring is forced on.
   */
  private async initializeMonitoring(): Promise<void> {
    const { context } = this.options;
    if (context.isMock && !context.monitoringMock) {
      this.logger.debug({ model: this.name }, 'Mock mode, skipping monitoring initialization');
      return;
    }

    const identity = await this.getIdentity();
    this.endpointUid = await this.reconcileEndpoint(identity);
    this.emit('endpoint:reconciled', {
      identity,
      endpointUid: this.endpointUid,
      timestamp: Date.now(),
    });

    this.pusher = this.createPusher(identity);
    this.logger.info(
      {
        model: this.name,
        version: identity.version,
        endpointUid: this.endpointUid,
        telemetry: this.pusher !== null,
      },
      'Model monitoring initialized'
    );
  }

  private reconcileEndpoint(identity: ModelIdentity): Promise<string | undefined> {
    if (!this.registrar) {
      return Promise.resolve(undefined);
    }

    const { context } = this.options;
    const { spec } = identity;
    return this.registrar.reconcile({
      project: context.function.project,
      endpointName: this.name,
      functionName: context.function.name,
      functionUid: context.function.uid ?? null,
      functionTag: context.function.tag ?? this.config.registry.default_function_tag,
      modelName: spec?.key ?? null,
      modelUid: spec?.uid ?? null,
      modelTag: spec?.tag ?? null,
      modelDbKey: spec?.dbKey ?? null,
      labels: { ...identity.labels },
      modelClass: this.className,
      trackModels: context.trackModels,
    });
  }

  private createPusher(identity: ModelIdentity): TelemetryPusher | null {
    const { context } = this.options;
    const { stream } = context;
    if (!stream.enabled || !stream.outputSink) {
      return null;
    }

    const telemetry = this.config.telemetry;
    const hasLabels = Object.keys(identity.labels).length > 0;
    return new TelemetryPusher({
      sink: stream.outputSink,
      header: {
        class: this.className,
        worker: context.workerId,
        model: this.name,
        version: identity.version,
        host: stream.hostname,
        function_uri: stream.functionUri,
        endpoint_id: this.endpointUid ?? null,
        ...(hasLabels && { labels: { ...identity.labels } }),
      },
      sampleRate: this.contextNumber(CONTEXT_PARAMS.STREAM_SAMPLE, telemetry.sample_rate),
      batchSize: this.contextNumber(CONTEXT_PARAMS.STREAM_BATCH, telemetry.batch_size),
      verbose: context.verbose ?? telemetry.verbose,
      metrics: () => this.metrics,
      clock: this.clock,
      hooks: this.hooks,
      logger: componentLogger(this.logger, 'telemetry'),
    });
  }

  private contextNumber(key: string, fallback: number): number {
    const raw = this.options.context.getParam?.(key);
    if (raw === undefined || raw === null) {
      return fallback;
    }
    const value = Number(raw);
    return Number.isFinite(value) ? value : fallback;
  }
}

/**
 * Create a model server around a capability.
 *
 * @example
 * ```typescript
 * const server = createModelServer(
 *   { load: async () => {}, predict: (request) => ({ outputs: [7] }) },
 *   { name: 'my', context }
 * );
 * await server.postInit('sync');
 * const event = await server.handle({ id: 'e1', path: '/infer', method: 'POST', body: { inputs: [[1, 2, 3]] } });
 * ```
 */
export function createModelServer(
  capability: ModelCapability,
  options: ModelServerOptions,
  dependencies: ModelServerDependencies = {}
): ModelServer {
  return new ModelServer(capability, options, dependencies);
}
