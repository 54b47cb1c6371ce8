import type { SpikeEvent } from "@aq-alerts/types";
import type { CleanTelemetryRecord } from "./types.js";

export function extractSpikes(clean: readonly CleanTelemetryRecord[], threshold: number): SpikeEvent[] {
  return clean
    .filter((record) => record.pm25 >= threshold)
    .map((record) => ({ sensorIndex: record.sensorIndex, pm25: record.pm25 }));
}
