import chalk from 'chalk';
import { describeArrival } from '../arrivals';
import type { BusArrival } from '../types/bus';
import { BUS, DOUBLE_DECKER, ROAD, STOP, renderRoad } from './road';

export type Painter = chalk.Chalk;

const HEADERS = ['Bus', 'To', 'Time', 'Emoji', 'Double Decker'] as const;
const COLUMN_GAP = '  ';

/** 3:04PM */
export function formatClock(date: Date): string {
  const hours = date.getHours();
  const minutes = String(date.getMinutes()).padStart(2, '0');
  const suffix = hours < 12 ? 'AM' : 'PM';
  return `${hours % 12 || 12}:${minutes}${suffix}`;
}

function heading(code: string, now: Date): string[] {
  return [
    `Departure information at ${formatClock(now)}`,
    `Stop Ref: ${code}`,
    '------------------------------------',
  ];
}

export function legend(): string {
  return `${STOP} stop  ${BUS} single decker  ${DOUBLE_DECKER} double decker  ${ROAD} about 5 minutes (1 hour for timed departures)`;
}

export function renderBoard(
  arrivals: readonly BusArrival[],
  code: string,
  now: Date,
  paint: Painter = chalk,
): string[] {
  const rows = arrivals.map((arrival) => [
    String(arrival.serviceNumber),
    arrival.destination,
    arrival.rawTime,
    renderRoad(arrival.time, arrival.isDoubleDecker, now),
    arrival.isDoubleDecker ? 'Yes' : 'No',
  ]);
  const widths = HEADERS.map((header, i) => Math.max(header.length, ...rows.map((row) => (row[i] ?? '').length)));

  const format = (cells: string[], colour: Array<(text: string) => string>) =>
    cells
      .map((cell, i) => {
        const padded = cell.padEnd(widths[i] ?? 0);
        const style = colour[i];
        return style ? style(padded) : padded;
      })
      .join(COLUMN_GAP)
      .trimEnd();

  const rowColours = [paint.bold, paint.cyan, paint.yellow];
  const headerColours = HEADERS.map(() => paint.bold);

  return [
    ...heading(code, now),
    format([...HEADERS], headerColours),
    ...rows.map((row) => format(row, rowColours)),
    '',
    legend(),
  ];
}

/** One sentence per departure. */
export function renderList(arrivals: readonly BusArrival[], code: string, now: Date): string[] {
  return [...heading(code, now), ...arrivals.map(describeArrival)];
}
