import type { DocumentReference, Firestore } from "firebase-admin/firestore";
import { COLLECTIONS, db as getDb } from "../lib/fire.js";
import { toAlert, toSubscription, uniqueSorted, type Alert } from "../lib/docs.js";
import { ReportError, withStore } from "../lib/errors.js";
import { elapsedWholeMinutes } from "../lib/time.js";
import type { ReportDoc } from "../types.js";

export type ReportAggregate = {
  startTime: Date;
  durationMinutes: number;
  maxReading: number;
  sensorIndices: number[];
};

export type ReportServiceDependencies = {
  db?: Firestore;
  now?: () => Date;
};

export function aggregateAlerts(alerts: readonly Alert[], now: Date): ReportAggregate | null {
  if (!alerts.length) return null;
  const startMillis = Math.min(...alerts.map((alert) => alert.startTime.getTime()));
  const startTime = new Date(startMillis);
  return {
    startTime,
    durationMinutes: elapsedWholeMinutes(startTime, now),
    maxReading: Math.max(...alerts.map((alert) => alert.maxReading)),
    sensorIndices: uniqueSorted(alerts.flatMap((alert) => alert.sensorIndices))
  };
}

export class ReportService {
  private readonly db: Firestore;
  private readonly now: () => Date;

  constructor(deps: ReportServiceDependencies = {}) {
    this.db = deps.db ?? getDb();
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Rolls the user's cached alerts into a new report and clears the cache.
   * Creating the report fails when `reportId` already exists, so the whole
   * transaction can be retried without applying twice.
   */
  async initializeReport(recordId: number, reportId: string): Promise<{ durationMinutes: number; maxReading: number }> {
    return withStore("reports.initialize", () => this.db.runTransaction(async (tx) => {
      const subRef = this.db.collection(COLLECTIONS.subscriptions).doc(String(recordId));
      const subscription = toSubscription(subRef.id, (await tx.get(subRef)).data());
      if (!subscription) {
        throw new ReportError("unknown_subscription", `No subscription for record ${recordId}`);
      }
      if (!subscription.cachedAlerts.length) {
        throw new ReportError("no_cached_alerts", `Record ${recordId} has no cached alerts to report`);
      }

      const alertRefs = subscription.cachedAlerts.map((alertId) => this.db.collection(COLLECTIONS.alerts).doc(alertId));
      const snaps = await tx.getAll(...alertRefs);
      const alerts: Alert[] = [];
      const found: DocumentReference[] = [];
      for (const snap of snaps) {
        const alert = toAlert(snap.id, snap.data());
        if (!alert) continue;
        alerts.push(alert);
        found.push(snap.ref);
      }

      const now = this.now();
      const aggregate = aggregateAlerts(alerts, now);
      if (!aggregate) {
        throw new ReportError("no_cached_alerts", `Cached alerts of record ${recordId} could not be found`);
      }

      const report: ReportDoc = {
        reportId,
        recordId,
        startTime: aggregate.startTime,
        durationMinutes: aggregate.durationMinutes,
        maxReading: aggregate.maxReading,
        sensorIndices: aggregate.sensorIndices,
        alerts: subscription.cachedAlerts,
        createdAt: now
      };
      tx.create(this.db.collection(COLLECTIONS.reports).doc(reportId), report);
      for (const ref of found) {
        tx.update(ref, { reportId });
      }
      tx.update(subRef, { cachedAlerts: [] });

      return { durationMinutes: aggregate.durationMinutes, maxReading: aggregate.maxReading };
    }));
  }
}
