/**
 * PendingTaskRepository
 *
 * Data access for the pending_tasks table. Membership changes are single
 * statements (insert-if-absent, delete-by-key); ranks are computed from the
 * current rows inside one read transaction.
 */

import { and, asc, count, eq, lt, or } from "drizzle-orm";
import { pendingTasks, PendingTaskRow } from "../db/schema";
import type { StoreDatabase } from "../db/connection";

export class PendingTaskRepository {
  private db: StoreDatabase;

  constructor(db: StoreDatabase) {
    this.db = db;
  }

  /**
   * Insert an entry unless the task already has one
   *
   * @returns true if a row was inserted
   */
  insert(taskId: string, enqueuedAt: Date): boolean {
    const result = this.db
      .insert(pendingTasks)
      .values({ taskId, enqueuedAt })
      .onConflictDoNothing({ target: pendingTasks.taskId })
      .run();
    return result.changes > 0;
  }

  /**
   * Delete the entry for a task
   *
   * @returns true if a row was deleted
   */
  delete(taskId: string): boolean {
    const result = this.db.delete(pendingTasks).where(eq(pendingTasks.taskId, taskId)).run();
    return result.changes > 0;
  }

  findByTaskId(taskId: string): PendingTaskRow | undefined {
    return this.db.select().from(pendingTasks).where(eq(pendingTasks.taskId, taskId)).get();
  }

  /**
   * Count entries ordered strictly before the given task, or undefined when
   * the task has no entry. Both reads share one snapshot.
   */
  countAhead(taskId: string): number | undefined {
    return this.db.transaction((tx) => {
      const own = tx.select().from(pendingTasks).where(eq(pendingTasks.taskId, taskId)).get();
      if (!own) {
        return undefined;
      }
      const row = tx
        .select({ ahead: count() })
        .from(pendingTasks)
        .where(
          or(
            lt(pendingTasks.enqueuedAt, own.enqueuedAt),
            and(eq(pendingTasks.enqueuedAt, own.enqueuedAt), lt(pendingTasks.seq, own.seq))
          )
        )
        .get();
      return row?.ahead ?? 0;
    });
  }

  /**
   * All entries in queue order
   */
  findAllOrdered(): PendingTaskRow[] {
    return this.db
      .select()
      .from(pendingTasks)
      .orderBy(asc(pendingTasks.enqueuedAt), asc(pendingTasks.seq))
      .all();
  }

  size(): number {
    const row = this.db.select({ total: count() }).from(pendingTasks).get();
    return row?.total ?? 0;
  }
}
