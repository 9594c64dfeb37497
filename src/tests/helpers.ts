import { once } from 'events';
import { createServer, type Server } from 'http';
import { createBusArrival } from '../arrivals';
import type { TimetableSource } from '../timetable/client';
import type { BusArrival } from '../types/bus';
import { createLogger, type LogSink } from '../utils/logger';

export const silentSink: LogSink = {
  debug: () => undefined,
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export const silentLogger = createLogger('error', silentSink);

export const townCentreDue = createBusArrival({
  serviceNumber: 12,
  destination: 'TownCentre',
  rawTime: 'Due',
  isDoubleDecker: false,
});

export const busStationInNine = createBusArrival({
  serviceNumber: 5,
  destination: 'Bus Station',
  rawTime: '9',
  isDoubleDecker: true,
});

/** Answers each call with the next queued result; an Error is thrown instead. */
export function queuedSource(results: Array<BusArrival[] | Error>) {
  const requested: string[] = [];
  const source: TimetableSource = {
    getBuses: async (code) => {
      requested.push(code);
      const next = results.shift();
      if (next === undefined) throw new Error('no more results queued');
      if (next instanceof Error) throw next;
      return next;
    },
  };
  return { source, requested };
}

/** Holds a loopback port so that nothing else can listen on it. */
export async function holdPort(): Promise<{ port: number; release: () => Promise<void> }> {
  const holder: Server = createServer();
  holder.listen(0, '127.0.0.1');
  await once(holder, 'listening');
  const address = holder.address();
  if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
  return {
    port: address.port,
    release: async () => {
      holder.close();
      await once(holder, 'close');
    },
  };
}
