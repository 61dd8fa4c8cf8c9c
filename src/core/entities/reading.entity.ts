/**
 * Reading: one weight sample pushed by a bin sensor or pulled from the
 * sensor-network feed. Immutable once stored.
 */
export interface Reading {
  readonly id: string;
  /** ISO-8601 UTC, normalised via Date#toISOString so string order is time order */
  readonly timestamp: string;
  readonly weightKg: number;
  readonly sensorId: string;
  readonly temperature: number;
  readonly humidity: number;
  readonly location: string;
  readonly source: ReadingSource;
  /** Upstream feed timestamp, used to skip feed entries already ingested */
  readonly externalTimestamp: string | null;
}

export const ReadingSource = {
  DEVICE: "device",
  FEED: "thingspeak",
} as const;

export type ReadingSource = (typeof ReadingSource)[keyof typeof ReadingSource];

export const DEFAULT_LOCATION = "nao especificado";
