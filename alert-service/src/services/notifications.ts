import type { Firestore } from "firebase-admin/firestore";
import type { ContactFailure, DeliveryFailure, DispatchSummary } from "@aq-alerts/types";
import { COLLECTIONS, db as getDb } from "../lib/fire.js";
import { toSubscription } from "../lib/docs.js";
import { DispatchError, withStore } from "../lib/errors.js";
import type { ContactDirectory } from "./contacts.js";
import type { DeliveryResult, MessageSender, OutboundMessage } from "./messaging.js";

export type NotificationDispatcherDependencies = {
  db?: Firestore;
  contacts: ContactDirectory;
  sender: MessageSender;
};

type Attempt = {
  count: number;
  lastAt: Date;
};

export class NotificationDispatcher {
  private readonly db: Firestore;
  private readonly contacts: ContactDirectory;
  private readonly sender: MessageSender;

  constructor(deps: NotificationDispatcherDependencies) {
    this.db = deps.db ?? getDb();
    this.contacts = deps.contacts;
    this.sender = deps.sender;
  }

  async resolveContacts(recordIds: readonly number[]): Promise<ReadonlyMap<number, string>> {
    if (!recordIds.length) return new Map();
    return this.contacts.lookup(recordIds);
  }

  /**
   * Sends `messages[i]` to `recordIds[i]` and records every attempt on the
   * subscription. A record id may appear more than once; its counter then
   * grows by the number of messages attempted for it. Pass `contacts` from
   * resolveContacts to skip the lookup.
   */
  async dispatch(
    recordIds: readonly number[],
    messages: readonly string[],
    contacts?: ReadonlyMap<number, string>
  ): Promise<DispatchSummary> {
    if (recordIds.length !== messages.length) {
      throw new DispatchError(`Got ${recordIds.length} recipients for ${messages.length} messages`);
    }
    const summary: DispatchSummary = { attempted: 0, delivered: 0, contactFailures: [], deliveryFailures: [] };
    if (!recordIds.length) return summary;

    const phones = contacts ?? await this.contacts.lookup(recordIds);
    const outbound: Array<{ recordId: number; to: string; body: string }> = [];
    const missing = new Set<number>();
    recordIds.forEach((recordId, index) => {
      const to = phones.get(recordId);
      if (to) outbound.push({ recordId, to, body: messages[index] });
      else missing.add(recordId);
    });
    summary.contactFailures = [...missing].map((recordId): ContactFailure => ({ recordId, reason: "no_contact" }));
    if (!outbound.length) return summary;

    const results = await this.send(outbound.map(({ to, body }) => ({ to, body })));
    const attempts = new Map<number, Attempt>();
    const deliveryFailures: DeliveryFailure[] = [];
    outbound.forEach((message, index) => {
      const result = results[index];
      const at = result?.at ?? new Date();
      if (result?.ok) summary.delivered += 1;
      else deliveryFailures.push({ recordId: message.recordId, to: message.to, error: result && !result.ok ? result.error : "no delivery result" });

      const previous = attempts.get(message.recordId);
      attempts.set(message.recordId, {
        count: (previous?.count ?? 0) + 1,
        lastAt: previous && previous.lastAt > at ? previous.lastAt : at
      });
    });
    summary.attempted = outbound.length;
    summary.deliveryFailures = deliveryFailures;

    await this.recordAttempts(attempts);
    return summary;
  }

  /** A sender that throws fails every message of the batch instead of the whole run. */
  private async send(batch: OutboundMessage[]): Promise<DeliveryResult[]> {
    try {
      return await this.sender.sendAll(batch);
    }
    catch (err) {
      const at = new Date();
      const error = err instanceof Error ? err.message : String(err);
      return batch.map((message): DeliveryResult => ({ to: message.to, ok: false, at, error }));
    }
  }

  private async recordAttempts(attempts: Map<number, Attempt>): Promise<void> {
    const entries = [...attempts.entries()];
    const collection = this.db.collection(COLLECTIONS.subscriptions);
    await withStore("subscriptions.recordMessages", () => this.db.runTransaction(async (tx) => {
      const refs = entries.map(([recordId]) => collection.doc(String(recordId)));
      const snaps = await tx.getAll(...refs);
      snaps.forEach((snap, index) => {
        const subscription = toSubscription(snap.id, snap.data());
        if (!subscription) return;
        const [, attempt] = entries[index];
        tx.update(snap.ref, {
          messagesSent: subscription.messagesSent + attempt.count,
          lastMessaged: attempt.lastAt
        });
      });
    }));
  }
}
