import type { ArrivalTime } from '../types/bus';

export const STOP = '🚏';
export const BUS = '🚌';
// There is no double decker glyph, the oncoming bus stands in for one.
export const DOUBLE_DECKER = '🚍';
export const ROAD = '_';

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;

export interface RoadMeasure {
  roads: number;
  /** 5 for minute countdowns, 12 for wall-clock departures. */
  unit: 5 | 12;
  showStop: boolean;
}

function targetOf(time: ArrivalTime, now: Date): Date {
  switch (time.kind) {
    case 'due':
      return new Date(now.getTime());
    case 'minutes':
      return new Date(now.getTime() + time.minutes * MINUTE_MS);
    case 'clock': {
      const target = new Date(now.getTime());
      target.setHours(time.hour, time.minute, 0, 0);
      return target;
    }
  }
}

export function measureRoad(time: ArrivalTime, now: Date): RoadMeasure {
  const remaining = targetOf(time, now).getTime() - now.getTime();
  if (time.kind === 'clock') {
    return { roads: Math.trunc(remaining / HOUR_MS) % 12, unit: 12, showStop: false };
  }
  return { roads: Math.trunc(Math.trunc(remaining / MINUTE_MS) / 5), unit: 5, showStop: true };
}

/**
 * Draws how far away a bus is: the further off, the longer the road between
 * the stop and the bus. Approximate by nature.
 */
export function renderRoad(time: ArrivalTime, isDoubleDecker: boolean, now: Date): string {
  const bus = isDoubleDecker ? DOUBLE_DECKER : BUS;
  const { roads, unit, showStop } = measureRoad(time, now);
  if (roads <= 0) {
    return `${STOP}${bus}`;
  }
  return `${showStop ? STOP : ''}${ROAD.repeat(roads)}${bus}${ROAD.repeat(unit)}`;
}
