import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { SubmissionGateway } from "./SubmissionGateway";
import { StatusStore } from "./StatusStore";
import { PositionLedger } from "./PositionLedger";
import { TaskState } from "./TaskState";
import { TaskStatusRepository } from "../repositories/TaskStatusRepository";
import { PendingTaskRepository } from "../repositories/PendingTaskRepository";
import { BrokerMessageRepository } from "../repositories/BrokerMessageRepository";
import { SqliteBroker } from "../broker/SqliteBroker";
import { BrokerDelivery, TaskBroker, TaskMessage } from "../broker/TaskBroker";
import { StoreUnavailableError, SubmissionError } from "../errors";
import { createTestStore, TestStore } from "../db/testUtils";
import { nullLogger } from "../utils/logger";
import { createRecordingLogger } from "../utils/testLogger";

class FailingBroker implements TaskBroker {
  published: TaskMessage[] = [];

  async publish(message: TaskMessage): Promise<void> {
    this.published.push(message);
    throw new Error("broker down");
  }

  async claim(): Promise<BrokerDelivery | undefined> {
    return undefined;
  }

  async ack(): Promise<void> {}

  async release(): Promise<void> {}
}

class BusyLedger extends PositionLedger {
  failAppend = false;
  failRemove = false;
  failReads = false;

  append(taskId: string, enqueuedAt: Date): boolean {
    if (this.failAppend) {
      throw new StoreUnavailableError("ledger.append", new Error("database is locked"));
    }
    return super.append(taskId, enqueuedAt);
  }

  remove(taskId: string): boolean {
    if (this.failRemove) {
      throw new StoreUnavailableError("ledger.remove", new Error("database is locked"));
    }
    return super.remove(taskId);
  }

  size(): number {
    if (this.failReads) {
      throw new StoreUnavailableError("ledger.size", new Error("database is locked"));
    }
    return super.size();
  }

  positionOf(taskId: string): number | null {
    if (this.failReads) {
      throw new StoreUnavailableError("ledger.position", new Error("database is locked"));
    }
    return super.positionOf(taskId);
  }
}

describe("SubmissionGateway", () => {
  let store: TestStore;
  let statusStore: StatusStore;
  let ledger: PositionLedger;
  let broker: SqliteBroker;

  const clock = () => {
    let tick = 0;
    return () => new Date(Date.UTC(2024, 4, 1, 10, 0, tick++));
  };
  const ids = (...values: string[]) => {
    const queue = [...values];
    return () => queue.shift() ?? "overflow";
  };

  beforeEach(() => {
    store = createTestStore();
    statusStore = new StatusStore(new TaskStatusRepository(store.db), { logger: nullLogger });
    ledger = new PositionLedger(new PendingTaskRepository(store.db), { logger: nullLogger });
    broker = new SqliteBroker(new BrokerMessageRepository(store.db));
  });

  afterEach(() => {
    store.close();
  });

  it("records, queues and publishes a submitted task", async () => {
    const gateway = new SubmissionGateway(statusStore, ledger, broker, {
      logger: nullLogger,
      now: clock(),
      generateId: ids("A"),
    });

    const taskId = await gateway.submit("hi");

    assert.equal(taskId, "A");
    assert.equal(statusStore.get("A").state, TaskState.PENDING);
    assert.equal(statusStore.get("A").taskType, "echo");
    assert.equal(ledger.positionOf("A"), 0);
    assert.equal(broker.size(), 1);

    const delivery = await broker.claim("test-consumer", 1000);
    assert.equal(delivery?.message.taskId, "A");
    assert.equal(delivery?.message.payload, "hi");
    assert.equal(delivery?.message.taskType, "echo");
  });

  it("gives each submission the next position", async () => {
    const gateway = new SubmissionGateway(statusStore, ledger, broker, {
      logger: nullLogger,
      now: clock(),
      generateId: ids("A", "B", "C"),
    });

    await gateway.submit("a");
    await gateway.submit("b");
    await gateway.submit("c");

    assert.equal(ledger.positionOf("A"), 0);
    assert.equal(ledger.positionOf("B"), 1);
    assert.equal(ledger.positionOf("C"), 2);
  });

  it("generates distinct ids by default", async () => {
    const gateway = new SubmissionGateway(statusStore, ledger, broker, { logger: nullLogger });

    const first = await gateway.submit("a");
    const second = await gateway.submit("b");

    assert.notEqual(first, second);
    assert.match(first, /^[0-9a-f-]{36}$/);
  });

  it("passes the task type through to the broker", async () => {
    const gateway = new SubmissionGateway(statusStore, ledger, broker, {
      logger: nullLogger,
      generateId: ids("A"),
    });

    await gateway.submit("hi", { taskType: "custom" });

    const delivery = await broker.claim("test-consumer", 1000);
    assert.equal(delivery?.message.taskType, "custom");
    assert.equal(statusStore.get("A").taskType, "custom");
  });

  it("rolls back and throws SubmissionError when publishing fails", async () => {
    const failing = new FailingBroker();
    const logger = createRecordingLogger();
    const gateway = new SubmissionGateway(statusStore, ledger, failing, {
      logger,
      generateId: ids("A"),
    });

    await assert.rejects(gateway.submit("hi"), (error: unknown) => {
      assert.ok(error instanceof SubmissionError);
      assert.equal(error.taskId, "A");
      assert.equal(error.message, "Failed to publish task 'A': broker down");
      return true;
    });

    assert.equal(failing.published.length, 1);
    assert.equal(statusStore.find("A"), undefined);
    assert.equal(ledger.positionOf("A"), null);
    assert.equal(ledger.size(), 0);
    assert.deepEqual(logger.messages("error"), ["Broker publish failed for task A: broker down"]);
  });

  it("does not disturb positions of earlier tasks when a submission fails", async () => {
    const good = new SubmissionGateway(statusStore, ledger, broker, {
      logger: nullLogger,
      generateId: ids("A"),
    });
    const bad = new SubmissionGateway(statusStore, ledger, new FailingBroker(), {
      logger: nullLogger,
      generateId: ids("B"),
    });

    await good.submit("a");
    await assert.rejects(bad.submit("b"), SubmissionError);

    assert.equal(ledger.positionOf("A"), 0);
    assert.equal(ledger.size(), 1);
  });

  it("discards the status record even when the ledger cannot be rolled back", async () => {
    const busy = new BusyLedger(new PendingTaskRepository(store.db), { logger: nullLogger });
    busy.failAppend = true;
    busy.failRemove = true;
    const logger = createRecordingLogger();
    const gateway = new SubmissionGateway(statusStore, busy, broker, {
      logger,
      generateId: ids("A"),
    });

    await assert.rejects(gateway.submit("hi"), StoreUnavailableError);

    assert.equal(statusStore.find("A"), undefined);
    assert.equal(broker.size(), 0);
    assert.deepEqual(logger.messages("error"), [
      "Rollback of ledger entry for task A failed: Store unavailable during ledger.remove: database is locked",
    ]);
  });

  it("resolves once published even if the store becomes unreadable", async () => {
    const busy = new BusyLedger(new PendingTaskRepository(store.db), { logger: nullLogger });
    const gateway = new SubmissionGateway(statusStore, busy, broker, {
      logger: nullLogger,
      generateId: ids("A"),
    });
    busy.failReads = true;

    const taskId = await gateway.submit("hi");

    assert.equal(taskId, "A");
    assert.equal(statusStore.get("A").state, TaskState.PENDING);
    assert.equal(broker.size(), 1);
    busy.failReads = false;
    assert.equal(busy.positionOf("A"), 0);
  });
});
