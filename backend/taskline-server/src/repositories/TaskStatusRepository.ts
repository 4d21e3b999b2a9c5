/**
 * TaskStatusRepository
 *
 * Data access for the task_status table using Drizzle ORM.
 * State changes are conditional updates so two processes racing on the same
 * task can never both apply a transition.
 */

import { and, count, eq, inArray } from "drizzle-orm";
import { taskStatus, TaskStatusRow, NewTaskStatusRow } from "../db/schema";
import type { StoreDatabase } from "../db/connection";
import { TaskState } from "../queue/TaskState";

export class TaskStatusRepository {
  private db: StoreDatabase;

  constructor(db: StoreDatabase) {
    this.db = db;
  }

  /**
   * Insert a new status record
   */
  create(row: NewTaskStatusRow): void {
    this.db.insert(taskStatus).values(row).run();
  }

  /**
   * Find a status record by task ID
   */
  findById(id: string): TaskStatusRow | undefined {
    return this.db.select().from(taskStatus).where(eq(taskStatus.id, id)).get();
  }

  /**
   * Move a task to `to` only if it is currently in one of `from`.
   *
   * @returns true if the row was updated
   */
  transition(
    id: string,
    from: TaskState[],
    to: TaskState,
    updates: Pick<Partial<TaskStatusRow>, "result" | "startedAt" | "completedAt"> = {}
  ): boolean {
    if (from.length === 0) {
      return false;
    }
    const result = this.db
      .update(taskStatus)
      .set({ ...updates, state: to })
      .where(and(eq(taskStatus.id, id), inArray(taskStatus.state, from)))
      .run();
    return result.changes > 0;
  }

  /**
   * Delete a status record by ID
   */
  delete(id: string): boolean {
    const result = this.db.delete(taskStatus).where(eq(taskStatus.id, id)).run();
    return result.changes > 0;
  }

  /**
   * Number of records per state
   */
  countByState(): Record<TaskState, number> {
    const counts: Record<TaskState, number> = {
      [TaskState.PENDING]: 0,
      [TaskState.STARTED]: 0,
      [TaskState.SUCCESS]: 0,
      [TaskState.FAILURE]: 0,
    };
    const rows = this.db
      .select({ state: taskStatus.state, total: count() })
      .from(taskStatus)
      .groupBy(taskStatus.state)
      .all();
    for (const row of rows) {
      counts[row.state] = row.total;
    }
    return counts;
  }
}
