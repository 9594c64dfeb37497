import test from 'node:test';
import assert from 'node:assert/strict';
import { StatusError } from '../errors';
import { runRealtime } from '../realtime';
import type { BusArrival } from '../types/bus';
import { queuedSource, townCentreDue } from './helpers';

test('refreshes until a fetch fails', async () => {
  const failure = new StatusError(503, 'Service Unavailable');
  const { source, requested } = queuedSource([[townCentreDue], [], failure]);
  const events: string[] = [];
  const rendered: BusArrival[][] = [];
  const sleeps: number[] = [];

  await assert.rejects(
    runRealtime({
      load: () => source.getBuses('22001688'),
      render: (arrivals) => {
        events.push('render');
        rendered.push(arrivals);
      },
      clear: () => events.push('clear'),
      sleep: async (ms) => {
        events.push('sleep');
        sleeps.push(ms);
      },
      now: () => new Date(2026, 9, 18, 12, 0, 0),
      intervalMs: 30_000,
    }),
    failure,
  );

  assert.deepEqual(events, ['clear', 'render', 'sleep', 'clear', 'render', 'sleep', 'clear']);
  assert.deepEqual(rendered, [[townCentreDue], []]);
  assert.deepEqual(sleeps, [30_000, 30_000]);
  assert.equal(requested.length, 3);
});
