export type ArrivalTime =
  | { kind: 'due' }
  | { kind: 'minutes'; minutes: number }
  | { kind: 'clock'; hour: number; minute: number };

export interface BusArrival {
  readonly serviceNumber: number;
  readonly destination: string;
  /** Time cell exactly as scraped: "Due", "12" or "14:32". */
  readonly rawTime: string;
  readonly time: ArrivalTime;
  readonly isDoubleDecker: boolean;
}

// Wire format served by the API.
export interface BusArrivalJson {
  bus: number;
  to: string;
  time: string;
  double_decker: boolean;
}
