/**
 * PositionLedger
 *
 * Tracks the pending set: tasks published but not yet started. A task's
 * queue position is the 0-based count of pending tasks ordered before it by
 * (enqueuedAt, seq), computed from current membership on every read. No
 * per-task counter is stored, so concurrent removals cannot make positions
 * drift.
 *
 * The ledger is not authoritative for task state; callers merge it with the
 * StatusStore.
 */

import { PendingTaskRepository } from "../repositories/PendingTaskRepository";
import { withStore } from "../errors";
import { Logger, createLogger } from "../utils/logger";

export interface PendingEntry {
  taskId: string;
  enqueuedAt: Date;
}

export class PositionLedger {
  private readonly repository: PendingTaskRepository;
  private readonly logger: Logger;

  constructor(repository: PendingTaskRepository, options: { logger?: Logger } = {}) {
    this.repository = repository;
    this.logger = options.logger ?? createLogger("PositionLedger");
  }

  /**
   * Add a task to the end of the pending set. Appending twice is a no-op.
   */
  append(taskId: string, enqueuedAt: Date): boolean {
    const inserted = withStore("ledger.append", () => this.repository.insert(taskId, enqueuedAt));
    if (inserted) {
      this.logger.debug(`Added task ${taskId}`);
    }
    return inserted;
  }

  /**
   * Remove a task from the pending set. Removing an absent task is a no-op.
   *
   * @returns true if the task was pending until now
   */
  remove(taskId: string): boolean {
    const removed = withStore("ledger.remove", () => this.repository.delete(taskId));
    if (removed) {
      this.logger.debug(`Removed task ${taskId}`);
    }
    return removed;
  }

  /**
   * 0-based queue position, or null if the task is not pending.
   * A task that moves from a number to null between two reads has started.
   */
  positionOf(taskId: string): number | null {
    const ahead = withStore("ledger.position", () => this.repository.countAhead(taskId));
    return ahead ?? null;
  }

  has(taskId: string): boolean {
    return withStore("ledger.has", () => this.repository.findByTaskId(taskId)) !== undefined;
  }

  /**
   * Pending entries in queue order
   */
  entries(): PendingEntry[] {
    return withStore("ledger.entries", () => this.repository.findAllOrdered()).map((row) => ({
      taskId: row.taskId,
      enqueuedAt: row.enqueuedAt,
    }));
  }

  /**
   * Logical queue length
   */
  size(): number {
    return withStore("ledger.size", () => this.repository.size());
  }
}
