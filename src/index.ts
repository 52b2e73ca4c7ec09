export { ModelServer, createModelServer } from './api/model-server.js';
export type { ModelServerOptions, ModelServerDependencies } from './api/model-server.js';
export type {
  ModelServerEvents,
  ModelServerEventName,
  ModelServerEventHandler,
  ModelLoadedEvent,
  ModelFailedEvent,
  EndpointReconciledEvent,
  RequestServedEvent,
} from './api/events.js';
export * from './api/errors.js';

// Core components
export { ReadinessGate } from './core/readiness-gate.js';
export type {
  ReadinessState,
  ReadinessKind,
  ReadinessGateOptions,
  WaitBudget,
} from './core/readiness-gate.js';
export { ModelLoader } from './core/model-loader.js';
export type { LoadMode, LoadOutcome, ModelLoaderOptions } from './core/model-loader.js';
export { OperationRouter, classifyOperation, INFERENCE_OPERATIONS } from './core/operation-router.js';
export type {
  Route,
  RoutedRequest,
  OperationHandlers,
  Classification,
  OperationRouterOptions,
} from './core/operation-router.js';
export { ModelIdentityResolver, parseModelName } from './core/model-identity.js';
export type { ModelIdentity, ModelIdentityOptions } from './core/model-identity.js';
export { expandDictInputs } from './core/input-expansion.js';

// Endpoint registry
export { EndpointRegistrar, buildEndpointRecord, diffEndpoint } from './services/endpoint-registrar.js';
export type { EndpointIdentity, EndpointRegistrarConfig } from './services/endpoint-registrar.js';

// Telemetry
export { TelemetryPusher } from './telemetry/log-pusher.js';
export type { TelemetryPusherOptions, PushEntry, PusherStats } from './telemetry/log-pusher.js';
export { MemoryOutputSink } from './telemetry/sinks/memory-sink.js';
export type { SinkWrite } from './telemetry/sinks/memory-sink.js';
export { NatsOutputSink, PARTITION_KEY_HEADER } from './telemetry/sinks/nats-sink.js';
export type { NatsPublisher } from './telemetry/sinks/nats-sink.js';
export { TelemetryManager, createTelemetry } from './telemetry/otel.js';
export type { TelemetryConfig, ServingMetrics } from './telemetry/otel.js';
export { createTelemetryBridge, getMetrics } from './telemetry/bridge.js';
export type { ServingTelemetryHooks, HookName } from './telemetry/hooks.js';

// Configuration
export {
  ServingConfigProvider,
  loadConfig,
  validateConfig,
  DEFAULT_SERVING_CONFIG,
} from './config/loader.js';
export type { ServingConfig, Environment, ServingConfigProviderOptions } from './config/loader.js';

// Utilities
export { extractInputData, updateResultBody } from './utils/event-path.js';
export { formatMicros, systemClock, type MicrosClock } from './utils/clock.js';

// Types and schemas
export * from './types/index.js';
export * from './types/schemas/index.js';
