import type { DocumentData } from "firebase-admin/firestore";
import type { GeoPointLike } from "@aq-alerts/types";
import { toDate } from "./time.js";

export type Subscription = {
  recordId: number;
  location: GeoPointLike | null;
  subscribed: boolean;
  activeAlerts: string[];
  cachedAlerts: string[];
  messagesSent: number;
  lastMessaged: Date | null;
};

export type Alert = {
  alertId: string;
  recordId: number;
  startTime: Date;
  lastUpdated: Date;
  maxReading: number;
  sensorIndices: number[];
  closedAt: Date | null;
  reportId: string | null;
};

function stringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];
}

function numberArray(value: unknown): number[] {
  return Array.isArray(value) ? value.filter((item): item is number => typeof item === "number" && Number.isFinite(item)) : [];
}

function finiteNumber(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

export function toGeoPoint(value: unknown): GeoPointLike | null {
  if (!value || typeof value !== "object") return null;
  const lat = "lat" in value ? value.lat : "latitude" in value ? value.latitude : undefined;
  const lon = "lon" in value ? value.lon : "longitude" in value ? value.longitude : undefined;
  if (typeof lat !== "number" || typeof lon !== "number") return null;
  if (!Number.isFinite(lat) || !Number.isFinite(lon)) return null;
  return { lat, lon };
}

export function toSubscription(id: string, data: DocumentData | undefined): Subscription | null {
  if (!data) return null;
  const recordId = finiteNumber(data.recordId, Number(id));
  if (!Number.isInteger(recordId)) return null;
  return {
    recordId,
    location: toGeoPoint(data.location),
    subscribed: data.subscribed === true,
    activeAlerts: stringArray(data.activeAlerts),
    cachedAlerts: stringArray(data.cachedAlerts),
    messagesSent: finiteNumber(data.messagesSent, 0),
    lastMessaged: toDate(data.lastMessaged)
  };
}

export function toAlert(id: string, data: DocumentData | undefined): Alert | null {
  if (!data) return null;
  const startTime = toDate(data.startTime);
  if (!startTime) return null;
  const maxReading = data.maxReading;
  if (typeof maxReading !== "number" || !Number.isFinite(maxReading)) return null;
  return {
    alertId: typeof data.alertId === "string" ? data.alertId : id,
    recordId: finiteNumber(data.recordId, Number.NaN),
    startTime,
    lastUpdated: toDate(data.lastUpdated) ?? startTime,
    maxReading,
    sensorIndices: numberArray(data.sensorIndices),
    closedAt: toDate(data.closedAt),
    reportId: typeof data.reportId === "string" ? data.reportId : null
  };
}

export function uniqueSorted(values: Iterable<number>): number[] {
  return [...new Set(values)].sort((a, b) => a - b);
}
