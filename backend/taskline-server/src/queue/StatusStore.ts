/**
 * StatusStore
 *
 * Canonical lifecycle state and result for every task. Writes follow the
 * forward-only state machine in TaskState; the check and the write are one
 * conditional UPDATE, so concurrent writers from different processes cannot
 * regress a task.
 */

import { TaskStatusRepository } from "../repositories/TaskStatusRepository";
import { TaskStatusRow } from "../db/schema";
import { TaskState, getAllowedSources, isTerminalState } from "./TaskState";
import { InvalidTransitionError, TaskNotFoundError, withStore } from "../errors";
import { Logger, createLogger } from "../utils/logger";

export interface TaskStatusRecord {
  id: string;
  taskType: string;
  payload: string;
  state: TaskState;
  result: string | null;
  enqueuedAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
}

export interface NewTaskStatus {
  id: string;
  taskType: string;
  payload: string;
  enqueuedAt: Date;
}

/**
 * Outcome of a state write.
 * - applied: the transition happened
 * - duplicate: the task was already in the target state
 * - rejected: the write would have moved the task backward or sideways
 */
export type TransitionOutcome =
  | { status: "applied"; record: TaskStatusRecord }
  | { status: "duplicate"; record: TaskStatusRecord }
  | { status: "rejected"; record: TaskStatusRecord; error: InvalidTransitionError };

export interface StateCounts {
  pending: number;
  started: number;
  succeeded: number;
  failed: number;
  total: number;
}

export class StatusStore {
  private readonly repository: TaskStatusRepository;
  private readonly logger: Logger;

  constructor(repository: TaskStatusRepository, options: { logger?: Logger } = {}) {
    this.repository = repository;
    this.logger = options.logger ?? createLogger("StatusStore");
  }

  /**
   * Write the initial PENDING record for a new task
   */
  create(task: NewTaskStatus): TaskStatusRecord {
    withStore("status.create", () =>
      this.repository.create({
        id: task.id,
        taskType: task.taskType,
        payload: task.payload,
        state: TaskState.PENDING,
        result: null,
        enqueuedAt: task.enqueuedAt,
      })
    );
    return {
      ...task,
      state: TaskState.PENDING,
      result: null,
      startedAt: null,
      completedAt: null,
    };
  }

  /**
   * Get a record, or throw TaskNotFoundError
   */
  get(id: string): TaskStatusRecord {
    const record = this.find(id);
    if (!record) {
      throw new TaskNotFoundError(id);
    }
    return record;
  }

  find(id: string): TaskStatusRecord | undefined {
    const row = withStore("status.get", () => this.repository.findById(id));
    return row ? toRecord(row) : undefined;
  }

  /**
   * Move a task forward to `state`.
   *
   * @param result - Handler output or error message; kept only for terminal states
   * @throws TaskNotFoundError if the task has no record
   */
  set(id: string, state: TaskState, result?: string): TransitionOutcome {
    const now = new Date();
    const updates: Pick<Partial<TaskStatusRow>, "result" | "startedAt" | "completedAt"> = {};
    if (state === TaskState.STARTED) {
      updates.startedAt = now;
    } else if (isTerminalState(state)) {
      updates.completedAt = now;
      updates.result = result ?? null;
    }

    const applied = withStore("status.set", () =>
      this.repository.transition(id, getAllowedSources(state), state, updates)
    );
    const current = this.get(id);

    if (applied) {
      this.logger.debug(`Task ${id} -> ${state}`);
      return { status: "applied", record: current };
    }

    if (current.state === state) {
      this.logger.debug(`Task ${id} already ${state}, ignoring duplicate write`);
      return { status: "duplicate", record: current };
    }

    const error = new InvalidTransitionError(id, current.state, state);
    this.logger.warn(error.message);
    return { status: "rejected", record: current, error };
  }

  /**
   * Remove a record. Only used to roll back a submission that never reached
   * the broker.
   */
  discard(id: string): boolean {
    return withStore("status.discard", () => this.repository.delete(id));
  }

  counts(): StateCounts {
    const byState = withStore("status.counts", () => this.repository.countByState());
    return {
      pending: byState[TaskState.PENDING],
      started: byState[TaskState.STARTED],
      succeeded: byState[TaskState.SUCCESS],
      failed: byState[TaskState.FAILURE],
      total:
        byState[TaskState.PENDING] +
        byState[TaskState.STARTED] +
        byState[TaskState.SUCCESS] +
        byState[TaskState.FAILURE],
    };
  }
}

function toRecord(row: TaskStatusRow): TaskStatusRecord {
  return {
    id: row.id,
    taskType: row.taskType,
    payload: row.payload,
    state: row.state,
    result: row.result,
    enqueuedAt: row.enqueuedAt,
    startedAt: row.startedAt,
    completedAt: row.completedAt,
  };
}
