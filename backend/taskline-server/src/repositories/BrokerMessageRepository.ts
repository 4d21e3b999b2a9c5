/**
 * BrokerMessageRepository
 *
 * Data access for the broker_messages table. Claiming runs in an IMMEDIATE
 * transaction, so the select-then-lease pair holds the write lock and two
 * consumers can never lease the same message.
 */

import { and, asc, count, eq, isNull, lte, or, sql } from "drizzle-orm";
import { brokerMessages, BrokerMessageRow, NewBrokerMessageRow } from "../db/schema";
import type { StoreDatabase } from "../db/connection";

export class BrokerMessageRepository {
  private db: StoreDatabase;

  constructor(db: StoreDatabase) {
    this.db = db;
  }

  /**
   * Append a message to the queue
   */
  insert(message: Omit<NewBrokerMessageRow, "id" | "claimedBy" | "leaseExpiresAt" | "deliveries">): BrokerMessageRow {
    return this.db.insert(brokerMessages).values(message).returning().get();
  }

  /**
   * Lease the oldest visible message to a consumer
   *
   * @returns The leased message, or undefined if none is visible
   */
  claimNext(consumerId: string, now: Date, leaseMs: number): BrokerMessageRow | undefined {
    return this.db.transaction(
      (tx) => {
        const next = tx
          .select({ id: brokerMessages.id })
          .from(brokerMessages)
          .where(or(isNull(brokerMessages.leaseExpiresAt), lte(brokerMessages.leaseExpiresAt, now)))
          .orderBy(asc(brokerMessages.id))
          .limit(1)
          .get();
        if (!next) {
          return undefined;
        }
        return tx
          .update(brokerMessages)
          .set({
            claimedBy: consumerId,
            leaseExpiresAt: new Date(now.getTime() + leaseMs),
            deliveries: sql`${brokerMessages.deliveries} + 1`,
          })
          .where(eq(brokerMessages.id, next.id))
          .returning()
          .get();
      },
      { behavior: "immediate" }
    );
  }

  findById(id: number): BrokerMessageRow | undefined {
    return this.db.select().from(brokerMessages).where(eq(brokerMessages.id, id)).get();
  }

  /**
   * Delete an acknowledged message
   */
  delete(id: number): boolean {
    const result = this.db.delete(brokerMessages).where(eq(brokerMessages.id, id)).run();
    return result.changes > 0;
  }

  /**
   * Clear the lease held by a consumer so the message is visible again
   */
  release(id: number, consumerId: string): boolean {
    const result = this.db
      .update(brokerMessages)
      .set({ claimedBy: null, leaseExpiresAt: null })
      .where(and(eq(brokerMessages.id, id), eq(brokerMessages.claimedBy, consumerId)))
      .run();
    return result.changes > 0;
  }

  size(): number {
    const row = this.db.select({ total: count() }).from(brokerMessages).get();
    return row?.total ?? 0;
  }
}
