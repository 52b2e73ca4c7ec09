/**
 * Dispatcher error utilities.
 *
 * Provides a consistent error type for every failure the dispatcher can
 * surface, plus helpers to convert lower-level errors (zod issues, errors
 * thrown by model code or collaborators) into DispatcherError instances that
 * callers can reason about.
 */

import type { ZodError } from 'zod';

/**
 * Error codes surfaced to dispatcher consumers.
 *
 * Client errors (InvalidOperation, RequestValidation, InvalidArgument) are
 * surfaced as-is. NotReady is recoverable by retrying after a backoff, while
 * LoadFailed is fatal for the process. RegistryUnavailable and
 * TelemetryPushFailed never reach the request path.
 */
export type DispatcherErrorCode =
  | 'NotReady'
  | 'LoadFailed'
  | 'InvalidOperation'
  | 'RequestValidation'
  | 'InvalidArgument'
  | 'InferenceFailed'
  | 'EndpointNotFound'
  | 'RegistryUnavailable'
  | 'TelemetryPushFailed'
  | 'ConfigurationError'
  | 'UnknownError';

/**
 * Plain error shape (for JSON responses/telemetry).
 */
export interface DispatcherErrorShape {
  code: DispatcherErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Base error raised by the dispatcher.
 */
export class DispatcherError extends Error implements DispatcherErrorShape {
  public readonly code: DispatcherErrorCode;
  public readonly details?: Record<string, unknown>;
  public override readonly cause?: Error;

  constructor(
    code: DispatcherErrorCode,
    message: string,
    details?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message);
    this.name = 'DispatcherError';
    this.code = code;
    this.details = details;
    this.cause = cause;
    if (cause?.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }

  /**
   * Serialize error into plain shape (for JSON responses/telemetry).
   */
  public toObject(): DispatcherErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Model has not finished loading (or failed to load).
 */
export class NotReadyError extends DispatcherError {
  public readonly modelName: string;
  public readonly reason?: string;

  constructor(modelName: string, reason?: string) {
    const suffix = reason ? `: ${reason}` : '';
    super('NotReady', `model ${modelName} is not ready yet${suffix}`, {
      modelName,
      ...(reason !== undefined && { reason }),
    });
    this.name = 'NotReadyError';
    this.modelName = modelName;
    this.reason = reason;
  }
}

/**
 * The capability's load() hook raised. Fatal until the process restarts.
 */
export class LoadError extends DispatcherError {
  constructor(modelName: string, cause: Error) {
    super('LoadFailed', `failed to load model ${modelName}`, { modelName }, cause);
    this.name = 'LoadError';
  }
}

export class InvalidOperationError extends DispatcherError {
  public readonly operation: string;
  public readonly method: string;

  constructor(operation: string, method: string) {
    super('InvalidOperation', `illegal model operation ${operation}, method=${method}`, {
      operation,
      method,
    });
    this.name = 'InvalidOperationError';
    this.operation = operation;
    this.method = method;
  }
}

export class RequestValidationError extends DispatcherError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('RequestValidation', message, details);
    this.name = 'RequestValidationError';
  }
}

export class InvalidArgumentError extends DispatcherError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('InvalidArgument', message, details);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Wraps anything thrown by the capability's predict()/explain().
 */
export class InferenceError extends DispatcherError {
  public readonly requestId: string;
  public readonly operation: string;

  constructor(operation: string, requestId: string, cause: Error) {
    super(
      'InferenceFailed',
      `${operation} failed for request ${requestId}: ${cause.message}`,
      { operation, requestId },
      cause
    );
    this.name = 'InferenceError';
    this.requestId = requestId;
    this.operation = operation;
  }
}

/**
 * Raised by registry clients when no endpoint record matches a lookup.
 */
export class EndpointNotFoundError extends DispatcherError {
  constructor(project: string, name: string) {
    super('EndpointNotFound', `model endpoint ${project}/${name} not found`, { project, name });
    this.name = 'EndpointNotFoundError';
  }
}

/**
 * Registry lookup/create/patch failed. Logged by the registrar, never thrown
 * to the request path.
 */
export class RegistrySoftFailure extends DispatcherError {
  public readonly stage: 'lookup' | 'create' | 'patch';

  constructor(stage: 'lookup' | 'create' | 'patch', cause: Error) {
    super('RegistryUnavailable', `endpoint registry ${stage} failed: ${cause.message}`, { stage }, cause);
    this.name = 'RegistrySoftFailure';
    this.stage = stage;
  }
}

/**
 * Output sink rejected a telemetry record. Logged and dropped.
 */
export class TelemetryPushFailure extends DispatcherError {
  public readonly records: number;

  constructor(records: number, cause: Error) {
    super('TelemetryPushFailed', `telemetry push failed: ${cause.message}`, { records }, cause);
    this.name = 'TelemetryPushFailure';
    this.records = records;
  }
}

export class ConfigurationError extends DispatcherError {
  constructor(message: string, cause?: Error) {
    super('ConfigurationError', message, undefined, cause);
    this.name = 'ConfigurationError';
  }
}

/**
 * Check if error is a dispatcher error
 */
export function isDispatcherError(error: unknown): error is DispatcherError {
  return error instanceof DispatcherError;
}

/**
 * Normalize a thrown value into an Error instance.
 */
export function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Map unknown errors into DispatcherError instances.
 *
 * @param error - Error thrown by model code or a collaborator
 * @param fallbackCode - Code to use when we cannot infer a specific one
 */
export function toDispatcherError(
  error: unknown,
  fallbackCode: DispatcherErrorCode = 'UnknownError'
): DispatcherError {
  if (isDispatcherError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new DispatcherError(fallbackCode, error.message, undefined, error);
  }

  return new DispatcherError(fallbackCode, 'Unknown dispatcher error');
}

/**
 * Convert Zod validation error to RequestValidationError
 *
 * Extracts the first issue as the message and keeps the full issue list in
 * the error details.
 *
 * @example
 * ```typescript
 * const result = InferenceRequestSchema.safeParse({});
 * if (!result.success) {
 *   throw zodErrorToValidationError(result.error);
 * }
 * // Throws: "Validation error on field 'inputs': Expected key \"inputs\" in request body"
 * ```
 */
export function zodErrorToValidationError(error: ZodError): RequestValidationError {
  const firstIssue = error.issues[0];
  const field = firstIssue && firstIssue.path.length > 0 ? firstIssue.path.join('.') : 'root';
  const message = `Validation error on field '${field}': ${firstIssue?.message ?? 'invalid request'}`;

  return new RequestValidationError(message, {
    field,
    issues: error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
      code: issue.code,
    })),
  });
}
