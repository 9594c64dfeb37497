import test from 'node:test';
import assert from 'node:assert/strict';
import { measureRoad, renderRoad } from '../render/road';

const noon = new Date(2026, 9, 18, 12, 0, 0);

test('a due bus sits at the stop', () => {
  assert.deepEqual(measureRoad({ kind: 'due' }, noon), { roads: 0, unit: 5, showStop: true });
  assert.equal(renderRoad({ kind: 'due' }, false, noon), '🚏🚌');
});

test('minute countdowns under five minutes sit at the stop', () => {
  assert.equal(renderRoad({ kind: 'minutes', minutes: 3 }, false, noon), '🚏🚌');
  assert.equal(renderRoad({ kind: 'minutes', minutes: 0 }, false, noon), '🚏🚌');
  assert.ok(measureRoad({ kind: 'minutes', minutes: -4 }, noon).roads <= 0);
});

test('one road segment per five minutes', () => {
  assert.equal(renderRoad({ kind: 'minutes', minutes: 9 }, false, noon), '🚏_🚌_____');
  assert.equal(renderRoad({ kind: 'minutes', minutes: 25 }, true, noon), '🚏_____🚍_____');
});

test('clock times count whole hours without a stop marker', () => {
  assert.deepEqual(measureRoad({ kind: 'clock', hour: 14, minute: 32 }, noon), { roads: 2, unit: 12, showStop: false });
  assert.equal(renderRoad({ kind: 'clock', hour: 14, minute: 32 }, false, noon), `__🚌${'_'.repeat(12)}`);
  assert.equal(measureRoad({ kind: 'clock', hour: 23, minute: 59 }, noon).roads, 11);
});

test('clock times within the hour or already gone sit at the stop', () => {
  assert.equal(renderRoad({ kind: 'clock', hour: 12, minute: 30 }, true, noon), '🚏🚍');
  assert.equal(renderRoad({ kind: 'clock', hour: 11, minute: 30 }, false, noon), '🚏🚌');
});

test('closer arrivals draw shorter roads', () => {
  const lengths = [5, 15, 30, 45].map((minutes) => renderRoad({ kind: 'minutes', minutes }, false, noon).length);
  assert.deepEqual(
    lengths,
    [...lengths].sort((a, b) => a - b),
  );
  assert.ok((lengths[0] ?? 0) < (lengths[3] ?? 0));
});
