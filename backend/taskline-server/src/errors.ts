/**
 * Engine error taxonomy
 *
 * - SubmissionError: the broker rejected a publish; the task was not created
 * - TaskNotFoundError: no status record for the requested id
 * - InvalidTransitionError: a write tried to move a task backward or sideways
 * - StoreUnavailableError: the shared store could not be reached or locked
 */

import type { TaskState } from "./queue/TaskState";

/**
 * Error thrown when a task cannot be handed to the broker
 */
export class SubmissionError extends Error {
  constructor(
    public readonly taskId: string,
    cause: unknown
  ) {
    super(`Failed to publish task '${taskId}': ${describeError(cause)}`, { cause });
    this.name = "SubmissionError";
  }
}

/**
 * Error thrown when the status store has no record for a task id
 */
export class TaskNotFoundError extends Error {
  constructor(public readonly taskId: string) {
    super(`Task with id '${taskId}' not found`);
    this.name = "TaskNotFoundError";
  }
}

/**
 * Raised internally for a rejected backward or lateral state change.
 * Logged by the status store, never surfaced to callers.
 */
export class InvalidTransitionError extends Error {
  constructor(
    public readonly taskId: string,
    public readonly from: TaskState,
    public readonly to: TaskState
  ) {
    super(`Invalid state transition: ${from} -> ${to} for task ${taskId}`);
    this.name = "InvalidTransitionError";
  }
}

/**
 * Error thrown when the shared store is unreachable, locked or closed
 */
export class StoreUnavailableError extends Error {
  constructor(
    public readonly operation: string,
    cause: unknown
  ) {
    super(`Store unavailable during ${operation}: ${describeError(cause)}`, { cause });
    this.name = "StoreUnavailableError";
  }
}

const UNAVAILABLE_CODES = ["SQLITE_BUSY", "SQLITE_LOCKED", "SQLITE_CANTOPEN", "SQLITE_FULL"];

/**
 * Check whether an error from better-sqlite3 means the store is unusable
 * right now, as opposed to a bug in the statement.
 */
export function isStoreUnavailable(error: unknown): boolean {
  if (error instanceof StoreUnavailableError) {
    return true;
  }
  if (!(error instanceof Error)) {
    return false;
  }
  if ("code" in error && typeof error.code === "string") {
    return UNAVAILABLE_CODES.includes(error.code) || error.code.startsWith("SQLITE_IOERR");
  }
  // better-sqlite3 throws a plain TypeError once the connection is closed
  return error.message.includes("database connection is not open");
}

/**
 * Run a store operation, mapping connectivity failures to StoreUnavailableError
 */
export function withStore<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof StoreUnavailableError) {
      throw error;
    }
    if (isStoreUnavailable(error)) {
      throw new StoreUnavailableError(operation, error);
    }
    throw error;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
