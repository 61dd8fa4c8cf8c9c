import { type Reading, ReadingSource } from "../../src/core/entities/reading.entity.js";

let seq = 0;

/** Build a stored reading; the timestamp is normalised the way repositories store it */
export const reading = (
  timestamp: string,
  weightKg: number,
  overrides: Partial<Omit<Reading, "timestamp" | "weightKg">> = {},
): Reading => {
  seq += 1;
  return {
    id: `r-${seq}`,
    timestamp: new Date(timestamp).toISOString(),
    weightKg,
    sensorId: "bin-1",
    temperature: 20,
    humidity: 50,
    location: "entrada",
    source: ReadingSource.DEVICE,
    externalTimestamp: null,
    ...overrides,
  };
};

/** A fixed clock, in epoch milliseconds */
export const fixedClock =
  (iso: string): (() => number) =>
  () =>
    Date.parse(iso);
