/**
 * Worker
 *
 * Execution harness for one worker process. The Worker:
 * 1. Claims messages from the TaskBroker, up to `concurrency` at a time
 * 2. Emits task.started through LifecycleSignals
 * 3. Runs the handler registered for the message's task type
 * 4. Emits task.succeeded / task.failed with the result or error
 * 5. Acks the message once every signal was recorded, or releases it for
 *    redelivery when one was not
 *
 * Lifecycle:
 *   worker.start() → polling loop begins
 *   worker.stop()  → stops claiming, waits for running tasks
 */

import { hostname } from "os";
import { TaskBroker, TaskMessage, BrokerDelivery } from "../broker/TaskBroker";
import { LifecycleSignals, TaskSignal } from "./LifecycleSignals";
import { PublishResult } from "./SignalBus";
import { describeError } from "../errors";
import { Logger, createLogger } from "../utils/logger";

/**
 * Handler function for executing a specific task type.
 * Returns the result string or throws an error.
 */
export type TaskHandler = (
  message: TaskMessage,
  context: TaskExecutionContext
) => Promise<string> | string;

/**
 * Context provided to task handlers during execution
 */
export interface TaskExecutionContext {
  /** Aborted when the task times out or the worker is force-stopped */
  signal: AbortSignal;
  /** Broker delivery count, 1 on the first attempt */
  deliveries: number;
  consumerId: string;
}

/**
 * Result of a task execution
 */
export interface TaskExecutionResult {
  taskId: string;
  success: boolean;
  result?: string;
  error?: string;
  /** False when a signal could not be recorded and the message was released */
  acknowledged: boolean;
  durationMs: number;
}

/**
 * Worker configuration options
 */
export interface WorkerOptions {
  /** Identity used for broker leases (default: hostname:pid) */
  consumerId?: string;
  /** Concurrent task slots (default: 1) */
  concurrency?: number;
  /** Polling interval in milliseconds (default: 250ms) */
  pollIntervalMs?: number;
  /** Task timeout in milliseconds (default: 60000ms) */
  taskTimeoutMs?: number;
  /** Broker lease per claim in milliseconds (default: 120000ms) */
  leaseMs?: number;
  logger?: Logger;
}

/**
 * Worker statistics
 */
export interface WorkerStats {
  isRunning: boolean;
  totalProcessed: number;
  successCount: number;
  failureCount: number;
  timeoutCount: number;
  /** Deliveries whose signals could not be recorded */
  releasedCount: number;
  runningCount: number;
  avgDurationMs: number;
  uptimeMs: number;
}

const SHUTDOWN_REASON = "worker shutdown";

export class Worker {
  private readonly broker: TaskBroker;
  private readonly signals: LifecycleSignals;
  private readonly handlers: Map<string, TaskHandler> = new Map();
  private readonly logger: Logger;

  private readonly consumerId: string;
  private readonly concurrency: number;
  private readonly pollIntervalMs: number;
  private readonly taskTimeoutMs: number;
  private readonly leaseMs: number;

  private running: boolean = false;
  private pollTimeoutId?: ReturnType<typeof setTimeout>;
  private readonly runningTasks: Map<number, AbortController> = new Map();
  private startedAt?: Date;

  private stats = {
    totalProcessed: 0,
    successCount: 0,
    failureCount: 0,
    timeoutCount: 0,
    releasedCount: 0,
    totalDurationMs: 0,
  };

  constructor(broker: TaskBroker, signals: LifecycleSignals, options: WorkerOptions = {}) {
    this.broker = broker;
    this.signals = signals;
    this.consumerId = options.consumerId ?? `${hostname()}:${process.pid}`;
    this.concurrency = Math.max(1, options.concurrency ?? 1);
    this.pollIntervalMs = options.pollIntervalMs ?? 250;
    this.taskTimeoutMs = options.taskTimeoutMs ?? 60000;
    this.leaseMs = options.leaseMs ?? 120000;
    this.logger = options.logger ?? createLogger(`Worker:${this.consumerId}`);
  }

  /**
   * Register a handler for a task type.
   *
   * @returns this for chaining
   */
  registerHandler(taskType: string, handler: TaskHandler): this {
    this.handlers.set(taskType, handler);
    return this;
  }

  hasHandler(taskType: string): boolean {
    return this.handlers.has(taskType);
  }

  /**
   * Start the polling loop. Does nothing if already running.
   */
  start(): void {
    if (this.running) {
      return;
    }

    this.running = true;
    this.startedAt = new Date();
    this.logger.info(
      `Started: concurrency=${this.concurrency}, pollIntervalMs=${this.pollIntervalMs}, taskTimeoutMs=${this.taskTimeoutMs}`
    );
    this.poll();
  }

  /**
   * Stop claiming and wait for running tasks.
   *
   * @param forceTimeoutMs - Abort running tasks after this many ms; their
   *   messages are released for another worker
   */
  async stop(forceTimeoutMs?: number): Promise<void> {
    if (!this.running && this.runningTasks.size === 0) {
      return;
    }

    this.running = false;

    if (this.pollTimeoutId) {
      clearTimeout(this.pollTimeoutId);
      this.pollTimeoutId = undefined;
    }

    const waitForRunning = async () => {
      while (this.runningTasks.size > 0) {
        await new Promise((resolve) => setTimeout(resolve, 50));
      }
    };

    if (forceTimeoutMs !== undefined) {
      let forceTimer: ReturnType<typeof setTimeout> | undefined;
      await Promise.race([
        waitForRunning(),
        new Promise<void>((resolve) => {
          forceTimer = setTimeout(() => {
            for (const [, controller] of this.runningTasks) {
              controller.abort(SHUTDOWN_REASON);
            }
            resolve();
          }, forceTimeoutMs);
        }),
      ]);
      clearTimeout(forceTimer);
      await waitForRunning();
    } else {
      await waitForRunning();
    }

    this.logger.info(`Stopped after ${this.stats.totalProcessed} tasks`);
  }

  /**
   * Claim and execute a single message without the polling loop.
   *
   * @returns The execution result, or undefined if nothing was claimable
   */
  async processOnce(): Promise<TaskExecutionResult | undefined> {
    const delivery = await this.broker.claim(this.consumerId, this.leaseMs);
    if (!delivery) {
      return undefined;
    }
    const controller = new AbortController();
    this.runningTasks.set(delivery.deliveryId, controller);
    try {
      return await this.execute(delivery, controller);
    } finally {
      this.runningTasks.delete(delivery.deliveryId);
    }
  }

  private poll(): void {
    if (!this.running) {
      return;
    }

    this.fillSlots()
      .catch((error) => {
        this.logger.error(`Claim failed: ${describeError(error)}`);
      })
      .finally(() => {
        if (this.running) {
          this.pollTimeoutId = setTimeout(() => this.poll(), this.pollIntervalMs);
        }
      });
  }

  /**
   * Claim messages until every slot is busy or the broker is empty
   */
  private async fillSlots(): Promise<void> {
    while (this.running && this.runningTasks.size < this.concurrency) {
      const delivery = await this.broker.claim(this.consumerId, this.leaseMs);
      if (!delivery) {
        return;
      }

      const controller = new AbortController();
      this.runningTasks.set(delivery.deliveryId, controller);
      this.execute(delivery, controller)
        .catch((error) => {
          this.logger.error(
            `Unexpected error executing task ${delivery.message.taskId}: ${describeError(error)}`
          );
        })
        .finally(() => {
          this.runningTasks.delete(delivery.deliveryId);
        });
    }
  }

  private async execute(
    delivery: BrokerDelivery,
    abortController: AbortController
  ): Promise<TaskExecutionResult> {
    const { message } = delivery;
    const startTime = Date.now();

    if (delivery.deliveries > 1) {
      this.logger.warn(`Redelivery #${delivery.deliveries} of task ${message.taskId}`);
    }

    let recorded = this.isRecorded(await this.signals.started(message.taskId));

    const handler = this.handlers.get(message.taskType);
    let outcome: { success: true; result: string } | { success: false; error: string };

    if (!handler) {
      outcome = { success: false, error: `No handler registered for task type: ${message.taskType}` };
    } else {
      try {
        const result = await this.runWithTimeout(handler, delivery, abortController);
        outcome = { success: true, result };
      } catch (error) {
        if (abortController.signal.reason === SHUTDOWN_REASON) {
          this.logger.warn(`Task ${message.taskId} interrupted by shutdown, releasing`);
          await this.release(delivery);
          this.stats.releasedCount++;
          return {
            taskId: message.taskId,
            success: false,
            error: SHUTDOWN_REASON,
            acknowledged: false,
            durationMs: Date.now() - startTime,
          };
        }
        if (error instanceof TaskTimeoutError) {
          this.stats.timeoutCount++;
        }
        outcome = { success: false, error: describeError(error) };
      }
    }

    if (outcome.success) {
      recorded = this.isRecorded(await this.signals.succeeded(message.taskId, outcome.result)) && recorded;
      this.stats.successCount++;
    } else {
      this.logger.warn(`Task ${message.taskId} failed: ${outcome.error}`);
      recorded = this.isRecorded(await this.signals.failed(message.taskId, outcome.error)) && recorded;
      this.stats.failureCount++;
    }

    if (recorded) {
      await this.ack(delivery);
    } else {
      this.logger.warn(`Signals for task ${message.taskId} not recorded, releasing for redelivery`);
      await this.release(delivery);
      this.stats.releasedCount++;
    }

    const durationMs = Date.now() - startTime;
    this.stats.totalProcessed++;
    this.stats.totalDurationMs += durationMs;

    return {
      taskId: message.taskId,
      success: outcome.success,
      result: outcome.success ? outcome.result : undefined,
      error: outcome.success ? undefined : outcome.error,
      acknowledged: recorded,
      durationMs,
    };
  }

  private async runWithTimeout(
    handler: TaskHandler,
    delivery: BrokerDelivery,
    abortController: AbortController
  ): Promise<string> {
    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        const error = new TaskTimeoutError(this.taskTimeoutMs);
        reject(error);
        abortController.abort(error);
      }, this.taskTimeoutMs);
    });

    const abortPromise = new Promise<never>((_, reject) => {
      abortController.signal.addEventListener(
        "abort",
        () => reject(new Error(String(abortController.signal.reason))),
        { once: true }
      );
    });

    const context: TaskExecutionContext = {
      signal: abortController.signal,
      deliveries: delivery.deliveries,
      consumerId: this.consumerId,
    };

    try {
      return await Promise.race([
        Promise.resolve(handler(delivery.message, context)),
        timeoutPromise,
        abortPromise,
      ]);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private isRecorded(result: PublishResult<TaskSignal>): boolean {
    for (const error of result.errors) {
      this.logger.error(
        `Could not record ${result.signal.type} for task ${result.signal.taskId}: ${error.message}`
      );
    }
    return result.errors.length === 0;
  }

  private async ack(delivery: BrokerDelivery): Promise<void> {
    try {
      await this.broker.ack(delivery.deliveryId);
    } catch (error) {
      // The lease will expire and the message comes back; replaying it is a no-op
      this.logger.error(`Ack of task ${delivery.message.taskId} failed: ${describeError(error)}`);
    }
  }

  private async release(delivery: BrokerDelivery): Promise<void> {
    try {
      await this.broker.release(delivery.deliveryId, this.consumerId);
    } catch (error) {
      this.logger.error(`Release of task ${delivery.message.taskId} failed: ${describeError(error)}`);
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  getStats(): WorkerStats {
    return {
      isRunning: this.running,
      totalProcessed: this.stats.totalProcessed,
      successCount: this.stats.successCount,
      failureCount: this.stats.failureCount,
      timeoutCount: this.stats.timeoutCount,
      releasedCount: this.stats.releasedCount,
      runningCount: this.runningTasks.size,
      avgDurationMs:
        this.stats.totalProcessed > 0 ? this.stats.totalDurationMs / this.stats.totalProcessed : 0,
      uptimeMs: this.startedAt ? Date.now() - this.startedAt.getTime() : 0,
    };
  }
}

export class TaskTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Task timeout after ${timeoutMs}ms`);
    this.name = "TaskTimeoutError";
  }
}
