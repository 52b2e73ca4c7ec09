/**
 * Telemetry hooks
 *
 * Lightweight callbacks the dispatcher fires at interesting points. The
 * metrics bridge implements them on top of OpenTelemetry; hosts may supply
 * their own. A hook that throws is logged and never reaches the request path.
 */

import type { Logger } from 'pino';
import type { DispatcherError } from '../api/errors.js';

export interface ServingTelemetryHooks {
  onModelLoaded?(model: string, durationMs: number): void;
  onModelLoadFailed?(model: string, error: DispatcherError): void;
  onRequestServed?(model: string, operation: string, durationMs: number): void;
  onInferenceError?(model: string, operation: string, error: DispatcherError): void;
  onReadinessRejected?(model: string, operation: string): void;
  onTelemetryPushed?(model: string, records: number): void;
  onTelemetryPushFailed?(model: string, error: DispatcherError): void;
  onRegistryFailure?(model: string, error: DispatcherError): void;
}

export type HookName = keyof ServingTelemetryHooks;

/**
 * Run a hook call, logging (not propagating) anything it throws
 *
 * @example
 * runHook(logger, 'onRequestServed', () => hooks?.onRequestServed?.(model, op, durationMs));
 */
export function runHook(logger: Logger | undefined, name: HookName, call: () => void): void {
  try {
    call();
  } catch (error) {
    logger?.warn({ hook: name, err: error }, 'Telemetry hook failed');
  }
}
