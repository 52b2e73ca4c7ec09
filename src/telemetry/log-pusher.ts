/**
 * Telemetry Log Pusher
 *
 * Ships one record per served request to the output sink, best-effort.
 *
 * - Sampling: a counter advances on every non-error push modulo `sampleRate`;
 *   only the call that brings it back to zero is emitted.
 * - Batching: with `batchSize` > 1, emitted rows accumulate and are flushed
 *   as one tabular record once exactly `batchSize` rows are buffered. A
 *   partial batch is never flushed.
 * - Errors bypass sampling and batching and are always pushed.
 * - Sink failures (thrown or rejected) are logged and dropped; nothing is
 *   retried and nothing propagates to the caller.
 *
 * Counter and buffer updates happen in a single synchronous section, so
 * requests interleaving on the event loop cannot corrupt a batch.
 */

import type { Logger } from 'pino';
import { TelemetryPushFailure, asError } from '../api/errors.js';
import { formatMicros, systemClock, type MicrosClock } from '../utils/clock.js';
import { lazyLog } from '../utils/logger-helpers.js';
import {
  BATCH_HEADERS,
  type BatchRecord,
  type BatchRow,
  type ErrorRecord,
  type OutputSink,
  type ServedRecord,
  type TelemetryHeader,
  type TelemetryRecord,
} from '../types/telemetry.js';
import { runHook, type ServingTelemetryHooks } from './hooks.js';

export interface TelemetryPusherOptions {
  sink: OutputSink;
  header: TelemetryHeader;
  sampleRate?: number;
  batchSize?: number;
  /** Append stack traces to error messages */
  verbose?: boolean;
  /** Real-time metrics attached to every record */
  metrics?: () => Readonly<Record<string, unknown>>;
  clock?: MicrosClock;
  hooks?: ServingTelemetryHooks;
  logger?: Logger;
}

export interface PushEntry {
  /** Request start, epoch microseconds */
  startMicros: number;
  request: unknown;
  response?: unknown;
  operation: string;
  error?: Error;
  partitionKey?: string;
}

export interface PusherStats {
  sampleCounter: number;
  bufferedRows: number;
  pushed: number;
  failed: number;
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

export class TelemetryPusher {
  private readonly sink: OutputSink;
  private readonly header: TelemetryHeader;
  private readonly sampleRate: number;
  private readonly batchSize: number;
  private readonly verbose: boolean;
  private readonly metrics: () => Readonly<Record<string, unknown>>;
  private readonly clock: MicrosClock;
  private readonly hooks?: ServingTelemetryHooks;
  private readonly logger?: Logger;

  private sampleCounter = 0;
  private batchCounter = 0;
  private batch: BatchRow[] = [];
  private pushed = 0;
  private failed = 0;

  constructor(options: TelemetryPusherOptions) {
    this.sink = options.sink;
    this.header = options.header;
    this.sampleRate = Math.max(1, Math.floor(options.sampleRate ?? 1));
    this.batchSize = Math.max(1, Math.floor(options.batchSize ?? 1));
    this.verbose = options.verbose ?? false;
    this.metrics = options.metrics ?? (() => ({}));
    this.clock = options.clock ?? systemClock;
    this.hooks = options.hooks;
    this.logger = options.logger;
  }

  public getStats(): PusherStats {
    return {
      sampleCounter: this.sampleCounter,
      bufferedRows: this.batch.length,
      pushed: this.pushed,
      failed: this.failed,
    };
  }

  /**
   * Record one served request (or failure). Never throws.
   */
  public push(entry: PushEntry): void {
    if (entry.error) {
      this.emit([this.errorRecord(entry, entry.error)], entry.partitionKey);
      return;
    }

    this.sampleCounter = (this.sampleCounter + 1) % this.sampleRate;
    if (this.sampleCounter !== 0) {
      return;
    }

    const microsec = this.clock() - entry.startMicros;
    if (this.batchSize > 1) {
      this.appendRow(entry, microsec);
      return;
    }

    this.emit([this.servedRecord(entry, microsec)], entry.partitionKey);
  }

  private appendRow(entry: PushEntry, microsec: number): void {
    if (this.batchCounter === 0) {
      this.batch = [];
    }
    this.batch.push([
      entry.request,
      entry.operation,
      entry.response,
      formatMicros(entry.startMicros),
      microsec,
      { ...this.metrics() },
    ]);
    this.batchCounter = (this.batchCounter + 1) % this.batchSize;

    if (this.batchCounter === 0) {
      const record: BatchRecord = {
        ...this.header,
        headers: BATCH_HEADERS,
        values: this.batch,
      };
      this.batch = [];
      lazyLog(this.logger, 'debug', () => ({ rows: record.values.length }), 'Telemetry batch flushed');
      this.emit([record], entry.partitionKey);
    }
  }

  private servedRecord(entry: PushEntry, microsec: number): ServedRecord {
    const record: ServedRecord = {
      ...this.header,
      request: entry.request,
      op: entry.operation,
      resp: entry.response,
      when: formatMicros(entry.startMicros),
      microsec,
    };
    const metrics = this.metrics();
    if (Object.keys(metrics).length > 0) {
      record.metrics = { ...metrics };
    }
    return record;
  }

  private errorRecord(entry: PushEntry, error: Error): ErrorRecord {
    const message = this.verbose && error.stack ? `${error.message}\n${error.stack}` : error.message;
    return {
      ...this.header,
      request: entry.request,
      op: entry.operation,
      when: formatMicros(entry.startMicros),
      error: message,
    };
  }

  private emit(records: TelemetryRecord[], partitionKey?: string): void {
    try {
      const result = this.sink.push(records, partitionKey);
      if (isPromiseLike(result)) {
        void result.then(
          () => this.recordPushed(records.length),
          (error: unknown) => this.recordFailure(records.length, error)
        );
        return;
      }
      this.recordPushed(records.length);
    } catch (error) {
      this.recordFailure(records.length, error);
    }
  }

  private recordPushed(records: number): void {
    this.pushed += records;
    runHook(this.logger, 'onTelemetryPushed', () =>
      this.hooks?.onTelemetryPushed?.(this.header.model, records)
    );
  }

  private recordFailure(records: number, error: unknown): void {
    this.failed += records;
    const failure = new TelemetryPushFailure(records, asError(error));
    this.logger?.warn({ model: this.header.model, records, err: failure.cause }, failure.message);
    runHook(this.logger, 'onTelemetryPushFailed', () =>
      this.hooks?.onTelemetryPushFailed?.(this.header.model, failure)
    );
  }
}
