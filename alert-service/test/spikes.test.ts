import { describe, expect, it } from "vitest";
import { extractSpikes } from "../src/spikes.js";
import type { CleanTelemetryRecord } from "../src/types.js";

const lastSeen = new Date("2024-01-15T12:00:00.000Z");
const clean: CleanTelemetryRecord[] = [
  { sensorIndex: 7, pm25: 12.5, channelFlags: 0, channelState: 3, lastSeen },
  { sensorIndex: 3, pm25: 35, channelFlags: 0, channelState: 3, lastSeen },
  { sensorIndex: 9, pm25: 80.2, channelFlags: 0, channelState: 1, lastSeen },
];

describe("extractSpikes", () => {
  it("keeps readings at or above the threshold in input order", () => {
    expect(extractSpikes(clean, 35)).toEqual([
      { sensorIndex: 3, pm25: 35 },
      { sensorIndex: 9, pm25: 80.2 },
    ]);
  });

  it("returns every clean record for a zero threshold", () => {
    expect(extractSpikes(clean, 0).map((spike) => spike.sensorIndex)).toEqual([7, 3, 9]);
  });

  it("returns nothing above the highest reading", () => {
    expect(extractSpikes(clean, 80.3)).toEqual([]);
    expect(extractSpikes([], 0)).toEqual([]);
  });
});
