/**
 * Operation Router
 *
 * Classifies an inbound event into an operation and dispatches it to the
 * matching handler.
 *
 * Classification order:
 * 1. `operation` field of a mapping body
 * 2. last non-empty segment of the event path
 * 3. `infer` when the method is not GET
 *
 * Dispatch table (unmatched combinations raise InvalidOperationError):
 *
 * | operation                              | method | route     |
 * |----------------------------------------|--------|-----------|
 * | predict, infer, predict_dict, infer_dict | any  | inference |
 * | explain                                | any    | explain   |
 * | ready                                  | GET    | health    |
 * | '' (empty)                             | GET    | metadata  |
 * | registered custom operation            | any    | custom    |
 */

import type { Logger } from 'pino';
import { InvalidOperationError } from '../api/errors.js';
import { extractInputData } from '../utils/event-path.js';
import { isRecord, type ServingEvent } from '../types/event.js';
import type { CustomOperation, InferenceOperation } from '../types/model.js';

export const INFERENCE_OPERATIONS: ReadonlySet<string> = new Set<InferenceOperation>([
  'predict',
  'infer',
  'predict_dict',
  'infer_dict',
]);

const READ_ONLY_METHOD = 'GET';

export interface Classification {
  operation: string;
  eventId: string;
}

export type Route =
  | { kind: 'inference'; operation: Exclude<InferenceOperation, 'explain'> }
  | { kind: 'explain' }
  | { kind: 'health' }
  | { kind: 'metadata' }
  | { kind: 'custom'; name: string; operation: CustomOperation };

/**
 * Everything a handler needs about the routed event
 */
export interface RoutedRequest {
  event: ServingEvent;
  /** Body as received, before input-path extraction */
  originalBody: unknown;
  /** Body after input-path extraction */
  body: unknown;
  operation: string;
  eventId: string;
}

export interface OperationHandlers {
  inference(request: RoutedRequest, operation: Exclude<InferenceOperation, 'explain'>): Promise<ServingEvent>;
  explain(request: RoutedRequest): Promise<ServingEvent>;
  health(request: RoutedRequest): ServingEvent;
  metadata(request: RoutedRequest): Promise<ServingEvent>;
  custom(request: RoutedRequest, operation: CustomOperation): Promise<ServingEvent>;
}

function isInferenceOperation(operation: string): operation is Exclude<InferenceOperation, 'explain'> {
  return INFERENCE_OPERATIONS.has(operation);
}

function trailingSegment(path: string): string {
  const segments = path.split('/').filter((segment) => segment.length > 0);
  return segments[segments.length - 1] ?? '';
}

/**
 * Derive the operation name and effective request id
 */
export function classifyOperation(
  event: Pick<ServingEvent, 'id' | 'path' | 'method'>,
  body: unknown
): Classification {
  let operation = '';
  let eventId = event.id;

  if (isRecord(body)) {
    if (typeof body.operation === 'string') {
      operation = body.operation;
    }
    if (typeof body.id === 'string' && body.id.length > 0) {
      eventId = body.id;
    }
  }

  if (!operation) {
    operation = trailingSegment(event.path ?? '');
  }
  if (!operation && event.method !== READ_ONLY_METHOD) {
    operation = 'infer';
  }

  return { operation, eventId };
}

export interface OperationRouterOptions {
  operations?: Record<string, CustomOperation>;
  inputPath?: string;
  logger?: Logger;
}

export class OperationRouter {
  private readonly operations: ReadonlyMap<string, CustomOperation>;
  private readonly inputPath?: string;
  private readonly logger?: Logger;

  constructor(options: OperationRouterOptions = {}) {
    this.operations = new Map(Object.entries(options.operations ?? {}));
    this.inputPath = options.inputPath;
    this.logger = options.logger;
  }

  public hasOperation(name: string): boolean {
    return this.operations.has(name);
  }

  /**
   * Map an operation/method pair onto a route.
   *
   * @throws {InvalidOperationError} when nothing matches
   */
  public resolve(operation: string, method: string): Route {
    if (isInferenceOperation(operation)) {
      return { kind: 'inference', operation };
    }
    if (operation === 'explain') {
      return { kind: 'explain' };
    }
    if (operation === 'ready' && method === READ_ONLY_METHOD) {
      return { kind: 'health' };
    }
    if (operation === '' && method === READ_ONLY_METHOD) {
      return { kind: 'metadata' };
    }

    const custom = this.operations.get(operation);
    if (custom) {
      return { kind: 'custom', name: operation, operation: custom };
    }

    throw new InvalidOperationError(operation, method);
  }

  /**
   * Classify the event and hand it to the matching handler
   */
  public async dispatch(event: ServingEvent, handlers: OperationHandlers): Promise<ServingEvent> {
    const originalBody = event.body;
    const body = extractInputData(this.inputPath, originalBody);
    const { operation, eventId } = classifyOperation(event, body);
    const route = this.resolve(operation, event.method);

    this.logger?.debug({ id: eventId, operation, route: route.kind }, 'Dispatching event');

    const request: RoutedRequest = { event, originalBody, body, operation, eventId };
    switch (route.kind) {
      case 'inference':
        return handlers.inference(request, route.operation);
      case 'explain':
        return handlers.explain(request);
      case 'health':
        return handlers.health(request);
      case 'metadata':
        return handlers.metadata(request);
      case 'custom':
        return handlers.custom(request, route.operation);
    }
  }
}
