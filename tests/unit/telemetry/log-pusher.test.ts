import { describe, it, expect, beforeEach, vi } from 'vitest';
import { TelemetryPusher, type TelemetryPusherOptions } from '../../../src/telemetry/log-pusher.js';
import { TelemetryPushFailure } from '../../../src/api/errors.js';
import { BATCH_HEADERS, type TelemetryHeader } from '../../../src/types/telemetry.js';
import { RecordingSink, silentLogger } from '../../helpers/fakes.js';

const START = 1_700_000_000_000_000;
const WHEN = '2023-11-14T22:13:20.000000Z';

const header: TelemetryHeader = {
  class: 'SumModel',
  worker: 0,
  model: 'm',
  version: 'latest',
  host: 'test-host',
  function_uri: 'demo/serving',
  endpoint_id: 'ep-1',
};

describe('TelemetryPusher', () => {
  let sink: RecordingSink;

  beforeEach(() => {
    sink = new RecordingSink();
  });

  function createPusher(options: Partial<TelemetryPusherOptions> = {}): TelemetryPusher {
    return new TelemetryPusher({
      sink,
      header,
      clock: () => START + 500_000,
      logger: silentLogger,
      ...options,
    });
  }

  describe('flat records', () => {
    it('pushes one record per request', () => {
      const pusher = createPusher();

      pusher.push({
        startMicros: START,
        request: { inputs: [[1]] },
        response: { outputs: [1] },
        operation: 'infer',
        partitionKey: 'ep-1',
      });

      expect(sink.pushes).toEqual([
        {
          records: [
            {
              ...header,
              request: { inputs: [[1]] },
              op: 'infer',
              resp: { outputs: [1] },
              when: WHEN,
              microsec: 500_000,
            },
          ],
          partitionKey: 'ep-1',
        },
      ]);
    });

    it('attaches real-time metrics when present', () => {
      const pusher = createPusher({ metrics: () => ({ drift: 0.2 }) });

      pusher.push({ startMicros: START, request: {}, response: {}, operation: 'infer' });

      expect(sink.records[0]).toMatchObject({ metrics: { drift: 0.2 } });
    });
  });

  describe('sampling', () => {
    it('emits exactly one of every N pushes', () => {
      const pusher = createPusher({ sampleRate: 3 });

      for (let i = 1; i <= 7; i++) {
        pusher.push({ startMicros: START, request: { n: i }, response: {}, operation: `op-${i}` });
      }

      expect(sink.records.map((record) => ('op' in record ? record.op : undefined))).toEqual(['op-3', 'op-6']);
      expect(pusher.getStats().sampleCounter).toBe(1);
    });

    it('always emits errors without moving the counter', () => {
      const pusher = createPusher({ sampleRate: 100 });

      pusher.push({
        startMicros: START,
        request: { id: 'r1' },
        operation: 'infer',
        error: new Error('boom'),
        partitionKey: 'ep-1',
      });

      expect(sink.pushes).toEqual([
        {
          records: [{ ...header, request: { id: 'r1' }, op: 'infer', when: WHEN, error: 'boom' }],
          partitionKey: 'ep-1',
        },
      ]);
      expect(pusher.getStats().sampleCounter).toBe(0);
    });

    it('appends the stack in verbose mode', () => {
      const pusher = createPusher({ verbose: true });
      const error = new Error('boom');

      pusher.push({ startMicros: START, request: {}, operation: 'infer', error });

      expect(sink.records[0]).toMatchObject({ error: `boom\n${error.stack}` });
    });
  });

  describe('batching', () => {
    it('flushes one record per B requests with rows in order', () => {
      const pusher = createPusher({ batchSize: 2 });

      for (let i = 1; i <= 5; i++) {
        pusher.push({ startMicros: START, request: { n: i }, response: { r: i }, operation: 'infer' });
      }

      expect(sink.pushes).toHaveLength(2);
      expect(sink.records[0]).toEqual({
        ...header,
        headers: BATCH_HEADERS,
        values: [
          [{ n: 1 }, 'infer', { r: 1 }, WHEN, 500_000, {}],
          [{ n: 2 }, 'infer', { r: 2 }, WHEN, 500_000, {}],
        ],
      });
      expect(sink.records[1]).toMatchObject({
        values: [
          [{ n: 3 }, 'infer', { r: 3 }, WHEN, 500_000, {}],
          [{ n: 4 }, 'infer', { r: 4 }, WHEN, 500_000, {}],
        ],
      });
    });

    it('never flushes a partial batch', () => {
      const pusher = createPusher({ batchSize: 4 });

      for (let i = 0; i < 3; i++) {
        pusher.push({ startMicros: START, request: {}, response: {}, operation: 'infer' });
      }

      expect(sink.pushes).toHaveLength(0);
      expect(pusher.getStats().bufferedRows).toBe(3);
    });

    it('combines sampling and batching', () => {
      const pusher = createPusher({ sampleRate: 2, batchSize: 2 });

      for (let i = 1; i <= 8; i++) {
        pusher.push({ startMicros: START, request: { n: i }, response: {}, operation: 'infer' });
      }

      expect(sink.pushes).toHaveLength(2);
      expect(sink.records[0]).toMatchObject({
        values: [
          [{ n: 2 }, 'infer', {}, WHEN, 500_000, {}],
          [{ n: 4 }, 'infer', {}, WHEN, 500_000, {}],
        ],
      });
    });

    it('sends errors outside the batch', () => {
      const pusher = createPusher({ batchSize: 2 });

      pusher.push({ startMicros: START, request: { n: 1 }, response: {}, operation: 'infer' });
      pusher.push({ startMicros: START, request: { n: 2 }, operation: 'infer', error: new Error('boom') });

      expect(sink.records).toEqual([{ ...header, request: { n: 2 }, op: 'infer', when: WHEN, error: 'boom' }]);
      expect(pusher.getStats().bufferedRows).toBe(1);
    });
  });

  describe('sink failures', () => {
    it('contains synchronous sink errors', () => {
      const onTelemetryPushFailed = vi.fn();
      const pusher = createPusher({ hooks: { onTelemetryPushFailed } });
      sink.mode = 'throw';

      expect(() =>
        pusher.push({ startMicros: START, request: {}, response: {}, operation: 'infer' })
      ).not.toThrow();

      expect(pusher.getStats()).toMatchObject({ pushed: 0, failed: 1 });
      expect(onTelemetryPushFailed).toHaveBeenCalledTimes(1);
      const [model, failure] = onTelemetryPushFailed.mock.calls[0] ?? [];
      expect(model).toBe('m');
      expect(failure).toBeInstanceOf(TelemetryPushFailure);
      expect(failure).toMatchObject({ message: 'telemetry push failed: sink unavailable' });
    });

    it('contains rejected sink pushes', async () => {
      const pusher = createPusher();
      sink.mode = 'reject';

      pusher.push({ startMicros: START, request: {}, operation: 'infer', error: new Error('boom') });

      await vi.waitFor(() => expect(pusher.getStats().failed).toBe(1));
      expect(pusher.getStats().pushed).toBe(0);
    });

    it('reports successful pushes to the hooks', () => {
      const onTelemetryPushed = vi.fn();
      const pusher = createPusher({ hooks: { onTelemetryPushed } });

      pusher.push({ startMicros: START, request: {}, response: {}, operation: 'infer' });

      expect(onTelemetryPushed).toHaveBeenCalledWith('m', 1);
      expect(pusher.getStats().pushed).toBe(1);
    });

    it('keeps going after a failing hook', () => {
      const pusher = createPusher({
        hooks: {
          onTelemetryPushed: () => {
            throw new Error('metrics down');
          },
        },
      });

      expect(() =>
        pusher.push({ startMicros: START, request: {}, response: {}, operation: 'infer' })
      ).not.toThrow();
      expect(sink.pushes).toHaveLength(1);
    });
  });
});
