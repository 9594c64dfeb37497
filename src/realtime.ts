import type { BusArrival } from './types/bus';

export interface RealtimeOptions {
  load: () => Promise<BusArrival[]>;
  render: (arrivals: BusArrival[], now: Date) => void;
  clear: () => void;
  sleep: (ms: number) => Promise<void>;
  now: () => Date;
  intervalMs: number;
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Refreshes the board until a fetch fails; the failure is the only way out. */
export async function runRealtime(options: RealtimeOptions): Promise<never> {
  for (;;) {
    options.clear();
    const arrivals = await options.load();
    options.render(arrivals, options.now());
    await options.sleep(options.intervalMs);
  }
}
