import type { Firestore } from "firebase-admin/firestore";
import { COLLECTIONS, db as getDb } from "../lib/fire.js";
import { withStore } from "../lib/errors.js";

/** Maps subscription record ids to phone numbers. Unknown ids are left out of the result. */
export interface ContactDirectory {
  lookup(recordIds: readonly number[]): Promise<Map<number, string>>;
}

export type FirestoreContactDirectoryDependencies = {
  db?: Firestore;
};

export class FirestoreContactDirectory implements ContactDirectory {
  private readonly db: Firestore;

  constructor(deps: FirestoreContactDirectoryDependencies = {}) {
    this.db = deps.db ?? getDb();
  }

  async lookup(recordIds: readonly number[]): Promise<Map<number, string>> {
    const ids = [...new Set(recordIds)];
    const contacts = new Map<number, string>();
    if (!ids.length) return contacts;

    const collection = this.db.collection(COLLECTIONS.contacts);
    const snaps = await withStore("contacts.getAll", () => this.db.getAll(...ids.map((id) => collection.doc(String(id)))));
    snaps.forEach((snap, index) => {
      const phone = snap.get("phone");
      if (typeof phone === "string" && phone.trim()) contacts.set(ids[index], phone.trim());
    });
    return contacts;
  }
}
