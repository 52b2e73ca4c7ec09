/**
 * Telemetry record shapes pushed to the output sink
 */

export interface TelemetryHeader {
  class: string;
  worker: number | string;
  model: string;
  version: string;
  host: string;
  function_uri: string;
  endpoint_id: string | null;
  labels?: Record<string, string>;
}

export interface ServedRecord extends TelemetryHeader {
  request: unknown;
  op: string;
  resp: unknown;
  when: string;
  microsec: number;
  metrics?: Record<string, unknown>;
}

export type BatchRow = [
  request: unknown,
  op: string,
  resp: unknown,
  when: string,
  microsec: number,
  metrics: Record<string, unknown>,
];

export const BATCH_HEADERS = ['request', 'op', 'resp', 'when', 'microsec', 'metrics'] as const;

export interface BatchRecord extends TelemetryHeader {
  headers: typeof BATCH_HEADERS;
  values: BatchRow[];
}

export interface ErrorRecord extends TelemetryHeader {
  request: unknown;
  op: string;
  when: string;
  error: string;
}

export type TelemetryRecord = ServedRecord | BatchRecord | ErrorRecord;

/**
 * Destination of telemetry records (stream, queue, in-memory buffer...).
 */
export interface OutputSink {
  push(records: TelemetryRecord[], partitionKey?: string): void | Promise<void>;
}
