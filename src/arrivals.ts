import { ParseError } from './errors';
import type { ArrivalTime, BusArrival, BusArrivalJson } from './types/bus';

function toInt(value: string | undefined): number {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? 0 : parsed;
}

export function parseArrivalTime(raw: string): ArrivalTime {
  const token = raw.trim().split(/\s+/)[0] ?? '';
  if (token === 'Due') {
    return { kind: 'due' };
  }
  if (token.includes(':')) {
    const [hour, minute] = token.split(':');
    return { kind: 'clock', hour: toInt(hour), minute: toInt(minute) };
  }
  return { kind: 'minutes', minutes: toInt(token) };
}

export function createBusArrival(fields: {
  serviceNumber: number;
  destination: string;
  rawTime: string;
  isDoubleDecker: boolean;
}): BusArrival {
  return Object.freeze({
    serviceNumber: fields.serviceNumber,
    destination: fields.destination,
    rawTime: fields.rawTime,
    time: Object.freeze(parseArrivalTime(fields.rawTime)),
    isDoubleDecker: fields.isDoubleDecker,
  });
}

export function describeArrival(arrival: BusArrival): string {
  const lead = `Bus ${arrival.serviceNumber} going to ${arrival.destination}`;
  switch (arrival.time.kind) {
    case 'due':
      return `${lead} is ${arrival.rawTime}`;
    case 'clock':
      return `${lead} @ ${arrival.rawTime}`;
    case 'minutes':
      return `${lead} in ${arrival.rawTime}`;
  }
}

export function toJson(arrival: BusArrival): BusArrivalJson {
  return {
    bus: arrival.serviceNumber,
    to: arrival.destination,
    time: arrival.rawTime,
    double_decker: arrival.isDoubleDecker,
  };
}

function isArrivalJson(value: unknown): value is BusArrivalJson {
  if (typeof value !== 'object' || value === null) return false;
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.bus === 'number' &&
    Number.isInteger(record.bus) &&
    typeof record.to === 'string' &&
    typeof record.time === 'string' &&
    typeof record.double_decker === 'boolean'
  );
}

export function fromJson(value: unknown): BusArrival {
  if (!isArrivalJson(value)) {
    throw new ParseError('Invalid bus arrival payload');
  }
  return createBusArrival({
    serviceNumber: value.bus,
    destination: value.to,
    rawTime: value.time,
    isDoubleDecker: value.double_decker,
  });
}
