import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { createEngine, Engine } from "../engine";
import { TaskState } from "./TaskState";
import { TaskNotFoundError } from "../errors";
import { createTestStore, TestStore } from "../db/testUtils";
import { nullLogger } from "../utils/logger";

describe("QueryService", () => {
  let store: TestStore;
  let engine: Engine;

  beforeEach(() => {
    store = createTestStore();
    let next = 0;
    engine = createEngine(store.db, {
      logger: nullLogger,
      gateway: { generateId: () => ["A", "B", "C"][next++] ?? `extra-${next}` },
    });
  });

  afterEach(() => {
    engine.destroy();
    store.close();
  });

  it("shows a waiting task with its position and no result", async () => {
    await engine.gateway.submit("hi");

    assert.deepEqual(engine.queryService.query("A"), {
      task_id: "A",
      status: TaskState.PENDING,
      result: null,
      queue_position: 0,
    });
  });

  it("shows the result and no position once the task succeeded", async () => {
    await engine.gateway.submit("hi");

    await engine.signals.started("A");
    await engine.signals.succeeded("A", "echo: hi");

    assert.deepEqual(engine.queryService.query("A"), {
      task_id: "A",
      status: TaskState.SUCCESS,
      result: "echo: hi",
      queue_position: null,
    });
  });

  it("shows a running task without position or result", async () => {
    await engine.gateway.submit("hi");

    await engine.signals.started("A");

    assert.deepEqual(engine.queryService.query("A"), {
      task_id: "A",
      status: TaskState.STARTED,
      result: null,
      queue_position: null,
    });
  });

  it("shows the error message of a failed task as its result", async () => {
    await engine.gateway.submit("hi");

    await engine.signals.failed("A", "boom");

    assert.deepEqual(engine.queryService.query("A"), {
      task_id: "A",
      status: TaskState.FAILURE,
      result: "boom",
      queue_position: null,
    });
  });

  it("moves later tasks up when the head starts", async () => {
    await engine.gateway.submit("a");
    await engine.gateway.submit("b");
    await engine.gateway.submit("c");

    assert.equal(engine.queryService.query("C").queue_position, 2);

    await engine.signals.started("A");

    assert.equal(engine.queryService.query("B").queue_position, 0);
    assert.equal(engine.queryService.query("C").queue_position, 1);
  });

  it("throws TaskNotFoundError for an unknown id", () => {
    assert.throws(() => engine.queryService.query("nope"), TaskNotFoundError);
  });

  it("summarises the queue", async () => {
    await engine.gateway.submit("a");
    await engine.gateway.submit("b");
    await engine.gateway.submit("c");
    await engine.signals.started("A");
    await engine.signals.succeeded("B", "b");

    assert.deepEqual(engine.queryService.stats(), {
      pending: 1,
      started: 1,
      succeeded: 1,
      failed: 0,
      total: 3,
      queueLength: 1,
    });
  });
});
