/**
 * Microsecond wall clock
 *
 * Date only carries milliseconds; response timestamps and telemetry elapsed
 * times are reported in microseconds, so the clock combines the performance
 * time origin with the high-resolution offset.
 */

import { performance } from 'node:perf_hooks';

/** Returns epoch microseconds */
export type MicrosClock = () => number;

export const systemClock: MicrosClock = () =>
  Math.round((performance.timeOrigin + performance.now()) * 1000);

/**
 * ISO-8601 timestamp with microsecond precision, e.g. 2025-03-01T10:00:00.123456Z
 */
export function formatMicros(epochMicros: number): string {
  const millis = Math.floor(epochMicros / 1000);
  const micros = String(Math.floor(epochMicros) % 1_000_000).padStart(6, '0');
  const iso = new Date(millis).toISOString();
  return `${iso.slice(0, 19)}.${micros}Z`;
}
