import type { Firestore } from "firebase-admin/firestore";
import { COLLECTIONS, db as getDb } from "../lib/fire.js";
import { toSubscription, uniqueSorted } from "../lib/docs.js";
import { withStore } from "../lib/errors.js";
import { planarDistanceMeters } from "../lib/projection.js";
import { SensorRegistry } from "./sensorRegistry.js";

export type SubscriberResolverDependencies = {
  db?: Firestore;
  sensors?: SensorRegistry;
  utmZone?: number;
};

/**
 * Finds subscribed users around a sensor. Distances are planar, measured
 * between UTM-projected coordinates, so the radius is in meters.
 */
export class SubscriberResolver {
  private readonly db: Firestore;
  private readonly sensors: SensorRegistry;
  private readonly utmZone: number;

  constructor(deps: SubscriberResolverDependencies = {}) {
    this.db = deps.db ?? getDb();
    this.sensors = deps.sensors ?? new SensorRegistry({ db: this.db });
    this.utmZone = deps.utmZone ?? 15;
  }

  async usersNearSensor(sensorIndex: number, distanceMeters: number): Promise<number[]> {
    const sensor = await this.sensors.getSensor(sensorIndex);
    if (!sensor?.location) return [];
    const origin = sensor.location;

    const snap = await withStore("subscriptions.subscribed", () =>
      this.db.collection(COLLECTIONS.subscriptions).where("subscribed", "==", true).get()
    );

    const nearby: number[] = [];
    snap.docs.forEach((doc) => {
      const subscription = toSubscription(doc.id, doc.data());
      if (!subscription?.subscribed || !subscription.location) return;
      if (planarDistanceMeters(origin, subscription.location, this.utmZone) <= distanceMeters) {
        nearby.push(subscription.recordId);
      }
    });
    return uniqueSorted(nearby);
  }
}
