import type { ChannelFlags, ChannelState } from "@aq-alerts/types";
import type { CleanTelemetryRecord, TelemetryRecord } from "./types.js";

export const CHANNEL_FLAGS_NORMAL: ChannelFlags = 0;
export const CHANNEL_STATE_NO_PM: ChannelState = 0;

export type QualityOptions = {
  staleAfterMinutes: number;
  readingCeiling: number;
};

export const DEFAULT_QUALITY_OPTIONS: QualityOptions = {
  staleAfterMinutes: 60,
  readingCeiling: 1000
};

export type QualityVerdict = "clean" | "flagged" | "unusable";

export type QualityResult = {
  clean: CleanTelemetryRecord[];
  flagged: TelemetryRecord[];
  unusable: TelemetryRecord[];
  /** Every sensor not in `clean`, in input order. */
  flaggedSensorIds: number[];
};

function isChannelFlags(value: number): value is ChannelFlags {
  return value === 0 || value === 1 || value === 2 || value === 3;
}

function isChannelState(value: number): value is ChannelState {
  return value === 0 || value === 1 || value === 2 || value === 3;
}

function asComplete(record: TelemetryRecord, readingCeiling: number): CleanTelemetryRecord | null {
  const { pm25, channelFlags, channelState, lastSeen } = record;
  if (pm25 === null || channelFlags === null || channelState === null || lastSeen === null) return null;
  if (!Number.isFinite(pm25) || pm25 >= readingCeiling) return null;
  if (!isChannelFlags(channelFlags) || !isChannelState(channelState)) return null;
  return { sensorIndex: record.sensorIndex, pm25, channelFlags, channelState, lastSeen };
}

type Evaluation =
  | { verdict: "unusable" }
  | { verdict: "clean" | "flagged"; record: CleanTelemetryRecord };

function evaluate(record: TelemetryRecord, now: Date, options: QualityOptions): Evaluation {
  const complete = asComplete(record, options.readingCeiling);
  if (!complete) return { verdict: "unusable" };
  const cutoff = now.getTime() - options.staleAfterMinutes * 60_000;
  const flagged = complete.channelFlags !== CHANNEL_FLAGS_NORMAL
    || complete.channelState === CHANNEL_STATE_NO_PM
    || complete.lastSeen.getTime() < cutoff;
  return { verdict: flagged ? "flagged" : "clean", record: complete };
}

export function judgeRecord(record: TelemetryRecord, now: Date, options: QualityOptions = DEFAULT_QUALITY_OPTIONS): QualityVerdict {
  return evaluate(record, now, options).verdict;
}

/**
 * Splits raw telemetry into clean, rule-flagged and unusable records. `now`
 * must be in the same wall-clock frame as each record's lastSeen.
 */
export function classifyTelemetry(
  records: readonly TelemetryRecord[],
  now: Date,
  options: QualityOptions = DEFAULT_QUALITY_OPTIONS
): QualityResult {
  const result: QualityResult = { clean: [], flagged: [], unusable: [], flaggedSensorIds: [] };

  for (const record of records) {
    const evaluation = evaluate(record, now, options);
    if (evaluation.verdict === "clean") {
      result.clean.push(evaluation.record);
      continue;
    }
    result[evaluation.verdict].push(record);
    result.flaggedSensorIds.push(record.sensorIndex);
  }

  return result;
}
