import { randomUUID } from "node:crypto";
import type { Firestore } from "firebase-admin/firestore";
import type { SpikeEvent } from "@aq-alerts/types";
import { COLLECTIONS, db as getDb } from "../lib/fire.js";
import { toAlert, toSubscription, uniqueSorted } from "../lib/docs.js";
import { withStore } from "../lib/errors.js";
import type { AlertDoc } from "../types.js";

export type AlertTrackerDependencies = {
  db?: Firestore;
  newId?: () => string;
};

function peak(spikes: readonly SpikeEvent[]): number {
  return spikes.reduce((max, spike) => Math.max(max, spike.pm25), Number.NEGATIVE_INFINITY);
}

/**
 * Owns the Idle → Alerting → Reportable transitions of a subscription. Each
 * method is one Firestore transaction.
 */
export class AlertTracker {
  private readonly db: Firestore;
  private readonly newId: () => string;

  constructor(deps: AlertTrackerDependencies = {}) {
    this.db = deps.db ?? getDb();
    this.newId = deps.newId ?? randomUUID;
  }

  private subscriptionRef(recordId: number) {
    return this.db.collection(COLLECTIONS.subscriptions).doc(String(recordId));
  }

  private alertRef(alertId: string) {
    return this.db.collection(COLLECTIONS.alerts).doc(alertId);
  }

  async openAlert(recordId: number, spikes: readonly SpikeEvent[], now: Date): Promise<string | null> {
    if (!spikes.length) return null;
    return withStore("alerts.open", () => this.db.runTransaction(async (tx) => {
      const subRef = this.subscriptionRef(recordId);
      const subscription = toSubscription(subRef.id, (await tx.get(subRef)).data());
      if (!subscription) return null;
      if (subscription.activeAlerts.length || subscription.cachedAlerts.length) return null;

      const alertId = this.newId();
      const alert: AlertDoc = {
        alertId,
        recordId,
        startTime: now,
        lastUpdated: now,
        maxReading: peak(spikes),
        sensorIndices: uniqueSorted(spikes.map((spike) => spike.sensorIndex)),
        closedAt: null,
        reportId: null
      };
      tx.create(this.alertRef(alertId), alert);
      tx.update(subRef, { activeAlerts: [alertId] });
      return alertId;
    }));
  }

  async extendAlerts(recordId: number, spikes: readonly SpikeEvent[], now: Date): Promise<string[]> {
    if (!spikes.length) return [];
    return withStore("alerts.extend", () => this.db.runTransaction(async (tx) => {
      const subRef = this.subscriptionRef(recordId);
      const subscription = toSubscription(subRef.id, (await tx.get(subRef)).data());
      if (!subscription?.activeAlerts.length) return [];

      const refs = subscription.activeAlerts.map((alertId) => this.alertRef(alertId));
      const snaps = await tx.getAll(...refs);
      const touched: string[] = [];
      for (const snap of snaps) {
        const alert = toAlert(snap.id, snap.data());
        if (!alert) continue;
        tx.update(snap.ref, {
          maxReading: Math.max(alert.maxReading, peak(spikes)),
          sensorIndices: uniqueSorted([...alert.sensorIndices, ...spikes.map((spike) => spike.sensorIndex)]),
          lastUpdated: now
        });
        touched.push(alert.alertId);
      }
      return touched;
    }));
  }

  async closeAlerts(recordId: number, now: Date): Promise<string[]> {
    return withStore("alerts.close", () => this.db.runTransaction(async (tx) => {
      const subRef = this.subscriptionRef(recordId);
      const subscription = toSubscription(subRef.id, (await tx.get(subRef)).data());
      if (!subscription?.activeAlerts.length) return [];

      const moved = subscription.activeAlerts;
      const snaps = await tx.getAll(...moved.map((alertId) => this.alertRef(alertId)));
      for (const snap of snaps) {
        if (snap.exists) tx.update(snap.ref, { closedAt: now });
      }
      tx.update(subRef, {
        activeAlerts: [],
        cachedAlerts: [...new Set([...subscription.cachedAlerts, ...moved])]
      });
      return moved;
    }));
  }

  async listOpenAlertOwners(): Promise<number[]> {
    return withStore("alerts.open.list", async () => {
      const snap = await this.db.collection(COLLECTIONS.alerts).where("closedAt", "==", null).get();
      const owners: number[] = [];
      snap.docs.forEach((doc) => {
        const alert = toAlert(doc.id, doc.data());
        if (alert && Number.isInteger(alert.recordId)) owners.push(alert.recordId);
      });
      return uniqueSorted(owners);
    });
  }

  async listRecordsAwaitingReport(): Promise<number[]> {
    return withStore("alerts.unreported.list", async () => {
      const snap = await this.db.collection(COLLECTIONS.alerts).where("reportId", "==", null).get();
      const owners: number[] = [];
      snap.docs.forEach((doc) => {
        const alert = toAlert(doc.id, doc.data());
        if (alert?.closedAt && Number.isInteger(alert.recordId)) owners.push(alert.recordId);
      });
      return uniqueSorted(owners);
    });
  }
}
