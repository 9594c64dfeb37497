import { load } from 'cheerio';
import { createBusArrival } from '../arrivals';
import type { BusArrival } from '../types/bus';

type Column = 'service' | 'destination' | 'time' | 'lowFloor';

// Low floor first: its header usually reads "Low Floor (Small Bus)".
const COLUMN_MATCHERS: Array<[Column, RegExp]> = [
  ['lowFloor', /low\s*floor/],
  ['service', /^(service|bus|route|no\b)/],
  ['destination', /^(to|destination)\b/],
  ['time', /^(time|due|departs?|expected)\b/],
];

const DEFAULT_POSITIONS: Record<Column, number> = {
  service: 0,
  destination: 1,
  time: 2,
  lowFloor: 3,
};

function resolveColumns(headers: string[]): Record<Column, number> {
  const normalized = headers.map((header) => header.toLowerCase());
  const claimed = new Set<number>();
  const columns: Record<Column, number> = { ...DEFAULT_POSITIONS };

  for (const [column, matcher] of COLUMN_MATCHERS) {
    const index = normalized.findIndex((header, i) => !claimed.has(i) && matcher.test(header));
    if (index === -1) continue;
    claimed.add(index);
    columns[column] = index;
  }
  return columns;
}

function parseServiceNumber(text: string): number {
  // Anything but plain digits reads as service 0.
  return /^[0-9]+$/.test(text) ? Number(text) : 0;
}

/**
 * Reads the first table of an upstream departures page.
 *
 * The first row is treated as the header and every other row becomes one
 * arrival, in document order. Columns are located by header text and fall back to
 * the usual service/destination/time/low-floor order when a header is unknown.
 */
export function parseTimetable(html: string): BusArrival[] {
  const $ = load(html);
  const table = $('table').first();

  // The HTML parser puts every row of a table inside a thead, tbody or tfoot.
  const [header, ...rows] = table
    .children('thead, tbody, tfoot')
    .children('tr')
    .toArray()
    .map((row) =>
      $(row)
        .children('th, td')
        .toArray()
        .map((cell) => $(cell).text().replace(/\s+/g, ' ').trim()),
    );
  if (!header) return [];

  const columns = resolveColumns(header);

  return rows.map((cells) => {
    const cell = (column: Column) => cells[columns[column]] ?? '';
    return createBusArrival({
      serviceNumber: parseServiceNumber(cell('service')),
      destination: cell('destination'),
      rawTime: cell('time'),
      isDoubleDecker: cell('lowFloor') !== 'Yes',
    });
  });
}
