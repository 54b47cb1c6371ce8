import type { SpikeEvent } from "@aq-alerts/types";
import { uniqueSorted } from "./lib/docs.js";

export function newAlertMessage(spikes: readonly SpikeEvent[]): string {
  const peak = Math.max(...spikes.map((spike) => spike.pm25));
  const sensors = uniqueSorted(spikes.map((spike) => spike.sensorIndex)).join(", ");
  return `Air quality alert: PM2.5 reached ${peak.toFixed(1)} µg/m³ near you (sensor ${sensors}). Consider limiting time outdoors.`;
}

export function reportMessage(durationMinutes: number, maxReading: number): string {
  const unit = durationMinutes === 1 ? "minute" : "minutes";
  return `Air quality update: the alert near you has ended after ${durationMinutes} ${unit}. Peak PM2.5 was ${maxReading.toFixed(1)} µg/m³.`;
}
