/**
 * Hosting context contract
 *
 * Everything the dispatcher needs to know about the runtime it is embedded in.
 */

import type { OutputSink } from './telemetry.js';

export interface FunctionIdentity {
  project: string;
  name: string;
  uid?: string;
  tag?: string;
}

export interface StreamSettings {
  enabled: boolean;
  hostname: string;
  functionUri: string;
  outputSink?: OutputSink;
}

export interface HostingContext {
  /** Create endpoint records and mark them as monitored */
  trackModels: boolean;
  /** Running under a local/mock server */
  isMock: boolean;
  /** Force endpoint/telemetry initialization even in mock mode */
  monitoringMock?: boolean;
  workerId: number | string;
  function: FunctionIdentity;
  stream: StreamSettings;
  /** Append stack traces to telemetry error records */
  verbose?: boolean;
  getParam?(key: string): unknown;
}
