import type { Firestore } from "firebase-admin/firestore";
import { COLLECTIONS, db as getDb } from "../lib/fire.js";
import { toSubscription } from "../lib/docs.js";
import { withStore } from "../lib/errors.js";

export type AlertGateDependencies = {
  db?: Firestore;
};

export class AlertGate {
  private readonly db: Firestore;

  constructor(deps: AlertGateDependencies = {}) {
    this.db = deps.db ?? getDb();
  }

  /** Users with neither an active nor a cached alert, in input order. */
  async usersForNewAlert(recordIds: readonly number[]): Promise<number[]> {
    const ids = [...new Set(recordIds)];
    if (!ids.length) return [];

    const collection = this.db.collection(COLLECTIONS.subscriptions);
    const snaps = await withStore("subscriptions.getAll", () =>
      this.db.getAll(...ids.map((id) => collection.doc(String(id))))
    );

    const idle = new Set<number>();
    for (const snap of snaps) {
      const subscription = toSubscription(snap.id, snap.data());
      if (!subscription) continue;
      if (subscription.activeAlerts.length === 0 && subscription.cachedAlerts.length === 0) {
        idle.add(subscription.recordId);
      }
    }
    return ids.filter((id) => idle.has(id));
  }
}
