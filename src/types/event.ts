/**
 * Serving event types
 *
 * An event is the unit of work handed to ModelServer.handle() by the hosting
 * runtime. Handlers mutate it in place and return it.
 */

/**
 * Source that produced the event. An empty kind or `http` is interactive;
 * anything else (stream, cron, batch...) is treated as a background source.
 */
export interface EventTrigger {
  kind: string;
}

export interface ServingEvent<TBody = unknown> {
  id: string;
  path: string;
  method: string;
  body: TBody;
  trigger?: EventTrigger;
  /** Set by terminal handlers (health, metadata, custom ops) */
  terminated?: boolean;
}

/**
 * Raw status response written by the health-check operation.
 */
export interface StatusResponse {
  statusCode: number;
  body: string;
}

/**
 * Response envelope for predict/infer/explain.
 */
export interface InferenceResponse {
  id: string;
  model_name: string;
  outputs: unknown;
  /** ISO-8601 with microsecond precision (predict/infer only) */
  timestamp?: string;
  model_version?: string;
}

export interface ModelMetadata {
  name: string;
  version: string;
  inputs: FeatureSchema[];
  outputs: FeatureSchema[];
}

/**
 * Named feature declared by the model artifact.
 */
export interface FeatureSchema {
  name: string;
  valueType?: string;
}

/**
 * Request payload after input-path extraction. Protocol v2 requests carry an
 * `inputs` list; anything else passes through unvalidated.
 */
export type InferenceRequest = Record<string, unknown> & {
  id?: string;
  inputs?: unknown;
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isInteractiveTrigger(trigger: EventTrigger | undefined): boolean {
  return !trigger || trigger.kind === '' || trigger.kind === 'http';
}
