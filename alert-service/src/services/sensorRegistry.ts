import type { Firestore } from "firebase-admin/firestore";
import type { GeoPointLike } from "@aq-alerts/types";
import { COLLECTIONS, db as getDb } from "../lib/fire.js";
import { toGeoPoint, uniqueSorted } from "../lib/docs.js";
import { withStore } from "../lib/errors.js";

export type RegisteredSensor = {
  sensorIndex: number;
  name: string | null;
  location: GeoPointLike | null;
};

export type SensorRegistryDependencies = {
  db?: Firestore;
};

export class SensorRegistry {
  private readonly db: Firestore;

  constructor(deps: SensorRegistryDependencies = {}) {
    this.db = deps.db ?? getDb();
  }

  async listSensorIds(): Promise<number[]> {
    return withStore("sensors.list", async () => {
      const snap = await this.db.collection(COLLECTIONS.sensors).get();
      const ids: number[] = [];
      snap.docs.forEach((doc) => {
        const raw = doc.get("sensorIndex") ?? Number(doc.id);
        if (typeof raw === "number" && Number.isInteger(raw)) ids.push(raw);
      });
      return uniqueSorted(ids);
    });
  }

  async getSensor(sensorIndex: number): Promise<RegisteredSensor | null> {
    return withStore("sensors.get", async () => {
      const snap = await this.db.collection(COLLECTIONS.sensors).doc(String(sensorIndex)).get();
      if (!snap.exists) return null;
      const name = snap.get("name");
      return {
        sensorIndex,
        name: typeof name === "string" ? name : null,
        location: toGeoPoint(snap.get("location"))
      };
    });
  }
}
