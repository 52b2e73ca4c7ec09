/**
 * Model capability contract
 *
 * The dispatcher treats the model as an opaque capability supplied by the
 * hosting code. Only load/predict are mandatory; every other hook falls back
 * to an identity default inside the router.
 */

import type { FeatureSchema, InferenceRequest, InferenceResponse, ServingEvent } from './event.js';

export type InferenceOperation = 'predict' | 'infer' | 'predict_dict' | 'infer_dict' | 'explain';

export interface ModelCapability {
  /** Reported as the telemetry `class` and the endpoint `model_class` */
  readonly className?: string;

  load(): Promise<void> | void;
  predict(request: InferenceRequest): Promise<unknown> | unknown;
  explain?(request: InferenceRequest): Promise<unknown> | unknown;

  preprocess?(request: InferenceRequest, operation: string): InferenceRequest;
  validate?(request: InferenceRequest, operation: string): InferenceRequest;
  postprocess?(response: InferenceResponse): InferenceResponse;

  /**
   * Choose which inputs/outputs are tracked by telemetry. Returning
   * undefined for both keeps the request/response as served.
   */
  loggedResults?(
    request: InferenceRequest,
    response: InferenceResponse,
    operation: string
  ): { inputs?: unknown[]; outputs?: unknown[] } | undefined;
}

/**
 * Model artifact metadata, as returned by the artifact resolver.
 */
export interface ModelSpec {
  /** Artifact key (used as the endpoint's model_name) */
  key: string;
  uid?: string;
  dbKey?: string;
  tag?: string;
  labels: Record<string, string>;
  inputs: FeatureSchema[];
  outputs: FeatureSchema[];
  parameters: Record<string, unknown>;
}

/**
 * Resolves a model path (e.g. `store://models/proj/key:tag`) into its spec.
 */
export interface ArtifactResolver {
  getModelSpec(modelPath: string): Promise<ModelSpec | undefined>;
}

/**
 * Custom operation registered on the server (`/<name>` or `operation: name`).
 */
export interface CustomOperation {
  handler(event: ServingEvent): Promise<unknown> | unknown;
  /** Apply the readiness policy before invoking the handler (default false) */
  requiresReady?: boolean;
}
