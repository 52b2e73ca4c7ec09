/**
 * In-process output sink
 *
 * Keeps pushed records in memory. Used by mock/local servers and tests.
 */

import type { OutputSink, TelemetryRecord } from '../../types/telemetry.js';

export interface SinkWrite {
  records: TelemetryRecord[];
  partitionKey?: string;
}

export class MemoryOutputSink implements OutputSink {
  private readonly writes: SinkWrite[] = [];
  private readonly capacity: number;

  /**
   * @param capacity - Oldest writes are dropped beyond this many
   */
  constructor(capacity = 10_000) {
    this.capacity = Math.max(1, capacity);
  }

  public push(records: TelemetryRecord[], partitionKey?: string): void {
    this.writes.push({ records: [...records], partitionKey });
    if (this.writes.length > this.capacity) {
      this.writes.shift();
    }
  }

  public getWrites(): readonly SinkWrite[] {
    return this.writes;
  }

  public getRecords(): TelemetryRecord[] {
    return this.writes.flatMap((write) => write.records);
  }

  public clear(): void {
    this.writes.length = 0;
  }
}
