/**
 * SubmissionGateway
 *
 * Accepts a unit of work and makes it visible to workers and pollers:
 *
 * ```
 * submit(payload)
 *   → StatusStore.create (PENDING)
 *   → PositionLedger.append
 *   → broker.publish ──fails──→ ledger.remove, StatusStore.discard, SubmissionError
 * ```
 *
 * The ledger entry is written before publishing so a worker that starts the
 * task at once always finds the entry to remove.
 */

import { v4 as uuidv4 } from "uuid";
import { StatusStore } from "./StatusStore";
import { PositionLedger } from "./PositionLedger";
import { TaskBroker } from "../broker/TaskBroker";
import { SubmissionError, describeError } from "../errors";
import { Logger, createLogger } from "../utils/logger";

export const DEFAULT_TASK_TYPE = "echo";

export interface SubmitOptions {
  /** Handler key the worker dispatches on (default: 'echo') */
  taskType?: string;
}

export interface SubmissionGatewayOptions {
  logger?: Logger;
  /** Clock, overridable in tests */
  now?: () => Date;
  /** Id generator, overridable in tests */
  generateId?: () => string;
}

export class SubmissionGateway {
  private readonly statusStore: StatusStore;
  private readonly ledger: PositionLedger;
  private readonly broker: TaskBroker;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(
    statusStore: StatusStore,
    ledger: PositionLedger,
    broker: TaskBroker,
    options: SubmissionGatewayOptions = {}
  ) {
    this.statusStore = statusStore;
    this.ledger = ledger;
    this.broker = broker;
    this.logger = options.logger ?? createLogger("SubmissionGateway");
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? (() => uuidv4());
  }

  /**
   * Submit a payload for execution.
   *
   * @returns The new task id
   * @throws SubmissionError if the broker rejects the publish
   * @throws StoreUnavailableError if the shared store cannot be written
   */
  async submit(payload: string, options: SubmitOptions = {}): Promise<string> {
    const taskId = this.generateId();
    const taskType = options.taskType ?? DEFAULT_TASK_TYPE;
    const enqueuedAt = this.now();

    this.statusStore.create({ id: taskId, taskType, payload, enqueuedAt });
    try {
      this.ledger.append(taskId, enqueuedAt);
    } catch (error) {
      this.rollback(taskId);
      throw error;
    }

    try {
      await this.broker.publish({ taskId, taskType, payload, enqueuedAt });
    } catch (error) {
      this.logger.error(`Broker publish failed for task ${taskId}: ${describeError(error)}`);
      this.rollback(taskId);
      throw new SubmissionError(taskId, error);
    }

    // The task is live from here on; nothing below may fail the submission
    this.logger.info(`Task ${taskId} dispatched`);
    return taskId;
  }

  /**
   * Undo the store writes of a submission that never reached the broker.
   * Each step is attempted on its own so a failed ledger removal still
   * discards the PENDING record.
   */
  private rollback(taskId: string): void {
    try {
      this.ledger.remove(taskId);
    } catch (error) {
      this.logger.error(`Rollback of ledger entry for task ${taskId} failed: ${describeError(error)}`);
    }
    try {
      this.statusStore.discard(taskId);
    } catch (error) {
      this.logger.error(`Rollback of status record for task ${taskId} failed: ${describeError(error)}`);
    }
  }
}
