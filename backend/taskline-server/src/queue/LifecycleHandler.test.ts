import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { LifecycleHandler } from "./LifecycleHandler";
import { LifecycleSignals, LifecycleSignalBus, TaskSignal } from "./LifecycleSignals";
import { SignalBus } from "./SignalBus";
import { StatusStore, TransitionOutcome } from "./StatusStore";
import { PositionLedger } from "./PositionLedger";
import { TaskState } from "./TaskState";
import { TaskStatusRepository } from "../repositories/TaskStatusRepository";
import { PendingTaskRepository } from "../repositories/PendingTaskRepository";
import { StoreUnavailableError } from "../errors";
import { createTestStore, TestStore } from "../db/testUtils";
import { nullLogger } from "../utils/logger";
import { createRecordingLogger, RecordingLogger } from "../utils/testLogger";

/**
 * StatusStore whose first `failures` writes fail as if the database were locked
 */
class FlakyStatusStore extends StatusStore {
  constructor(
    repository: TaskStatusRepository,
    private failures: number
  ) {
    super(repository, { logger: nullLogger });
  }

  set(id: string, state: TaskState, result?: string): TransitionOutcome {
    if (this.failures > 0) {
      this.failures--;
      throw new StoreUnavailableError("status.set", new Error("database is locked"));
    }
    return super.set(id, state, result);
  }
}

describe("LifecycleHandler", () => {
  let store: TestStore;
  let statusStore: StatusStore;
  let ledger: PositionLedger;
  let bus: LifecycleSignalBus;
  let logger: RecordingLogger;
  let handler: LifecycleHandler;

  const enqueuedAt = new Date("2024-05-01T10:00:00.000Z");
  const signal = {
    started: (taskId: string): TaskSignal => ({ type: "task.started", taskId, timestamp: new Date() }),
    succeeded: (taskId: string, result: string): TaskSignal => ({
      type: "task.succeeded",
      taskId,
      result,
      timestamp: new Date(),
    }),
    failed: (taskId: string, error: string): TaskSignal => ({
      type: "task.failed",
      taskId,
      error,
      timestamp: new Date(),
    }),
  };

  function submit(taskId: string): void {
    statusStore.create({ id: taskId, taskType: "echo", payload: taskId, enqueuedAt });
    ledger.append(taskId, enqueuedAt);
  }

  beforeEach(() => {
    store = createTestStore();
    statusStore = new StatusStore(new TaskStatusRepository(store.db), { logger: nullLogger });
    ledger = new PositionLedger(new PendingTaskRepository(store.db), { logger: nullLogger });
    bus = new SignalBus<TaskSignal>();
    logger = createRecordingLogger();
    handler = new LifecycleHandler(statusStore, ledger, bus, {
      logger,
      retry: { attempts: 3, baseDelayMs: 1 },
    });
  });

  afterEach(() => {
    handler.destroy();
    store.close();
  });

  it("marks a task STARTED and takes it out of the line", () => {
    submit("A");
    submit("B");

    assert.equal(handler.apply(signal.started("A")), "applied");

    assert.equal(statusStore.get("A").state, TaskState.STARTED);
    assert.equal(ledger.positionOf("A"), null);
    assert.equal(ledger.positionOf("B"), 0);
  });

  it("treats a repeated started signal as a duplicate", () => {
    submit("A");

    handler.apply(signal.started("A"));
    const second = handler.apply(signal.started("A"));

    assert.equal(second, "duplicate");
    assert.equal(statusStore.get("A").state, TaskState.STARTED);
    assert.equal(ledger.size(), 0);
  });

  it("settles on SUCCESS when succeeded arrives before started", () => {
    submit("A");

    assert.equal(handler.apply(signal.succeeded("A", "hi")), "applied");
    assert.equal(handler.apply(signal.started("A")), "rejected");

    const record = statusStore.get("A");
    assert.equal(record.state, TaskState.SUCCESS);
    assert.equal(record.result, "hi");
    assert.equal(ledger.positionOf("A"), null);
  });

  it("stores the error message of a failed task", () => {
    submit("A");

    handler.apply(signal.started("A"));
    handler.apply(signal.failed("A", "boom"));

    const record = statusStore.get("A");
    assert.equal(record.state, TaskState.FAILURE);
    assert.equal(record.result, "boom");
  });

  it("drops signals for tasks it has never seen", () => {
    assert.equal(handler.apply(signal.started("ghost")), "dropped");

    assert.deepEqual(logger.messages("warn"), ["Dropping task.started for unknown task ghost"]);
    assert.equal(statusStore.find("ghost"), undefined);
  });

  it("applies signals published on the bus", async () => {
    submit("A");
    const signals = new LifecycleSignals(bus);

    const startedResult = await signals.started("A");
    assert.equal(startedResult.errors.length, 0);
    assert.equal(statusStore.get("A").state, TaskState.STARTED);

    const succeededResult = await signals.succeeded("A", "hi");
    assert.equal(succeededResult.errors.length, 0);
    assert.equal(statusStore.get("A").state, TaskState.SUCCESS);
  });

  it("settles concurrent duplicate signals on one state", async () => {
    submit("A");
    const signals = new LifecycleSignals(bus);

    const results = await Promise.all([
      signals.started("A"),
      signals.started("A"),
      signals.succeeded("A", "hi"),
    ]);

    for (const result of results) {
      assert.equal(result.errors.length, 0);
    }
    assert.equal(statusStore.get("A").state, TaskState.SUCCESS);
    assert.equal(ledger.size(), 0);
  });

  describe("when the store is unavailable", () => {
    it("retries until the write goes through", async () => {
      const flaky = new FlakyStatusStore(new TaskStatusRepository(store.db), 2);
      const retrying = new LifecycleHandler(flaky, ledger, new SignalBus<TaskSignal>(), {
        logger,
        retry: { attempts: 3, baseDelayMs: 1 },
      });
      submit("A");

      const outcome = await retrying.handle(signal.started("A"));

      assert.equal(outcome, "applied");
      assert.equal(statusStore.get("A").state, TaskState.STARTED);
      assert.equal(ledger.positionOf("A"), null);
      assert.deepEqual(logger.messages("warn"), [
        "task.started for task A failed (attempt 1), retrying in 1ms: Store unavailable during status.set: database is locked",
        "task.started for task A failed (attempt 2), retrying in 2ms: Store unavailable during status.set: database is locked",
      ]);
      retrying.destroy();
    });

    it("gives up after the last attempt and reports the error to the publisher", async () => {
      const flaky = new FlakyStatusStore(new TaskStatusRepository(store.db), 10);
      const flakyBus = new SignalBus<TaskSignal>();
      const retrying = new LifecycleHandler(flaky, ledger, flakyBus, {
        logger: nullLogger,
        retry: { attempts: 2, baseDelayMs: 1 },
      });
      submit("A");

      const result = await new LifecycleSignals(flakyBus).started("A");

      assert.equal(result.errors.length, 1);
      assert.ok(result.errors[0] instanceof StoreUnavailableError);
      assert.equal(statusStore.get("A").state, TaskState.PENDING);
      assert.equal(ledger.positionOf("A"), 0);
      retrying.destroy();
    });
  });

  it("stops listening after destroy", async () => {
    submit("A");
    handler.destroy();

    const result = await new LifecycleSignals(bus).started("A");

    assert.equal(result.handlerCount, 0);
    assert.equal(statusStore.get("A").state, TaskState.PENDING);
  });
});
