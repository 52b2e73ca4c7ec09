/**
 * Model Server Event System
 *
 * Defines event types and payloads for the ModelServer class.
 */

import type { DispatcherError } from './errors.js';
import type { ModelIdentity } from '../core/model-identity.js';

/**
 * Event payload when the model finished loading
 */
export interface ModelLoadedEvent {
  model: string;
  durationMs: number;
  /** Model was supplied up front or already ready */
  skipped: boolean;
  timestamp: number;
}

/**
 * Event payload when the load hook raised
 */
export interface ModelFailedEvent {
  model: string;
  error: DispatcherError;
  timestamp: number;
}

/**
 * Event payload once monitoring initialization reconciled the endpoint
 */
export interface EndpointReconciledEvent {
  identity: ModelIdentity;
  /** Undefined when no record exists or the registry failed softly */
  endpointUid: string | undefined;
  timestamp: number;
}

/**
 * Event payload for each served inference/explain request
 */
export interface RequestServedEvent {
  id: string;
  model: string;
  operation: string;
  durationMs: number;
  timestamp: number;
}

/**
 * Map of all model server events
 */
export interface ModelServerEvents {
  'model:loaded': (event: ModelLoadedEvent) => void;
  'model:failed': (event: ModelFailedEvent) => void;
  'endpoint:reconciled': (event: EndpointReconciledEvent) => void;
  'request:served': (event: RequestServedEvent) => void;
}

/**
 * Type-safe event emitter helpers
 */
export type ModelServerEventName = keyof ModelServerEvents;
export type ModelServerEventHandler<T extends ModelServerEventName> = ModelServerEvents[T];
