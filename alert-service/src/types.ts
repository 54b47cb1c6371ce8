import type { Timestamp } from "firebase-admin/firestore";
import type { ChannelFlags, ChannelState } from "@aq-alerts/types";

export type TelemetryRecord = {
  sensorIndex: number;
  pm25: number | null;
  channelFlags: number | null;
  channelState: number | null;
  /** Wall-clock time in the run's time zone, after the provider offset. */
  lastSeen: Date | null;
};

export type CleanTelemetryRecord = {
  sensorIndex: number;
  pm25: number;
  channelFlags: ChannelFlags;
  channelState: ChannelState;
  lastSeen: Date;
};

export type RunTime = {
  startedAt: Date;
  timeZone: string;
  localTime: Date;
};

export type TelemetryFetchResult = {
  runtime: RunTime;
  threshold: number;
  records: TelemetryRecord[];
};

type StoredTime = Timestamp | Date;

export type AlertDoc = {
  alertId: string;
  recordId: number;
  startTime: StoredTime;
  lastUpdated: StoredTime;
  maxReading: number;
  sensorIndices: number[];
  closedAt: StoredTime | null;
  reportId: string | null;
};

export type ReportDoc = {
  reportId: string;
  recordId: number;
  startTime: StoredTime;
  durationMinutes: number;
  maxReading: number;
  sensorIndices: number[];
  alerts: string[];
  createdAt: StoredTime;
};
