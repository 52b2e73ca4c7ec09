/**
 * NATS output sink
 *
 * Publishes each telemetry record as a JSON message on a subject. The
 * partition key travels in the `partition-key` header so stream consumers
 * can shard by endpoint.
 */

import { JSONCodec, headers, type MsgHdrs, type NatsConnection } from 'nats';
import type { OutputSink, TelemetryRecord } from '../../types/telemetry.js';

export const PARTITION_KEY_HEADER = 'partition-key';

function partitionHeaders(partitionKey: string): MsgHdrs {
  const msgHeaders = headers();
  msgHeaders.set(PARTITION_KEY_HEADER, partitionKey);
  return msgHeaders;
}

/** Publishing surface of a NATS connection */
export type NatsPublisher = Pick<NatsConnection, 'publish'>;

export class NatsOutputSink implements OutputSink {
  private readonly connection: NatsPublisher;
  private readonly subject: string;
  private readonly jc = JSONCodec<TelemetryRecord>();

  /**
   * @param connection - Connected NATS client (or anything with publish())
   * @param subject - Subject records are published to
   */
  constructor(connection: NatsPublisher, subject: string) {
    this.connection = connection;
    this.subject = subject;
  }

  public getSubject(): string {
    return this.subject;
  }

  /**
   * @throws if the connection is closed or the payload cannot be published
   */
  public push(records: TelemetryRecord[], partitionKey?: string): void {
    const options = partitionKey ? { headers: partitionHeaders(partitionKey) } : undefined;
    for (const record of records) {
      this.connection.publish(this.subject, this.jc.encode(record), options);
    }
  }
}
