/**
 * LifecycleHandler
 *
 * Dedicated consumer of lifecycle signals. Applies each signal to the
 * StatusStore and the PositionLedger:
 *
 * ```
 * task.started   → StatusStore PENDING → STARTED,          ledger.remove
 * task.succeeded → StatusStore PENDING|STARTED → SUCCESS,  ledger.remove
 * task.failed    → StatusStore PENDING|STARTED → FAILURE,  ledger.remove
 * ```
 *
 * Every step is idempotent, so redelivered or reordered signals settle in
 * the same state. Store outages are retried with backoff; signals for tasks
 * the StatusStore has never seen are logged and dropped.
 */

import { StatusStore, TransitionOutcome } from "./StatusStore";
import { PositionLedger } from "./PositionLedger";
import { TaskState } from "./TaskState";
import { LifecycleSignalBus, TaskSignal, TASK_SIGNAL_TYPES } from "./LifecycleSignals";
import { Subscription } from "./SignalBus";
import { TaskNotFoundError, describeError, isStoreUnavailable } from "../errors";
import { RetryOptions, retryWithBackoff } from "../utils/retry";
import { Logger, createLogger } from "../utils/logger";

export type SignalOutcome = TransitionOutcome["status"] | "dropped";

export interface LifecycleHandlerOptions {
  /** Backoff for StoreUnavailableError (attempts, baseDelayMs, maxDelayMs) */
  retry?: Pick<RetryOptions, "attempts" | "baseDelayMs" | "maxDelayMs">;
  logger?: Logger;
}

export class LifecycleHandler {
  private readonly statusStore: StatusStore;
  private readonly ledger: PositionLedger;
  private readonly retry: Pick<RetryOptions, "attempts" | "baseDelayMs" | "maxDelayMs">;
  private readonly logger: Logger;

  /** Event subscriptions for cleanup */
  private readonly subscriptions: Subscription[] = [];

  constructor(
    statusStore: StatusStore,
    ledger: PositionLedger,
    bus: LifecycleSignalBus,
    options: LifecycleHandlerOptions = {}
  ) {
    this.statusStore = statusStore;
    this.ledger = ledger;
    this.retry = options.retry ?? {};
    this.logger = options.logger ?? createLogger("LifecycleHandler");

    for (const type of TASK_SIGNAL_TYPES) {
      this.subscriptions.push(
        bus.subscribe(type, async (signal) => {
          await this.handle(signal);
        })
      );
    }
  }

  /**
   * Apply a signal, retrying while the store is unavailable.
   * Rethrows the last StoreUnavailableError once retries run out.
   */
  async handle(signal: TaskSignal): Promise<SignalOutcome> {
    return retryWithBackoff(() => this.apply(signal), {
      ...this.retry,
      shouldRetry: isStoreUnavailable,
      onRetry: (error, attempt, delayMs) => {
        this.logger.warn(
          `${signal.type} for task ${signal.taskId} failed (attempt ${attempt}), retrying in ${delayMs}ms: ${describeError(error)}`
        );
      },
    });
  }

  /**
   * Apply a signal once, without retrying.
   */
  apply(signal: TaskSignal): SignalOutcome {
    let outcome: TransitionOutcome;
    try {
      outcome = this.writeState(signal);
    } catch (error) {
      if (error instanceof TaskNotFoundError) {
        this.logger.warn(`Dropping ${signal.type} for unknown task ${signal.taskId}`);
        return "dropped";
      }
      throw error;
    }

    // Any signal means a worker has the task, so it no longer waits in line
    this.ledger.remove(signal.taskId);

    if (outcome.status === "applied") {
      this.logger.info(`Task ${signal.taskId} is now ${outcome.record.state}`);
    }
    return outcome.status;
  }

  private writeState(signal: TaskSignal): TransitionOutcome {
    switch (signal.type) {
      case "task.started":
        return this.statusStore.set(signal.taskId, TaskState.STARTED);
      case "task.succeeded":
        return this.statusStore.set(signal.taskId, TaskState.SUCCESS, signal.result);
      case "task.failed":
        return this.statusStore.set(signal.taskId, TaskState.FAILURE, signal.error);
    }
  }

  /**
   * Unsubscribe from the bus
   */
  destroy(): void {
    for (const subscription of this.subscriptions) {
      subscription.unsubscribe();
    }
    this.subscriptions.length = 0;
  }
}
