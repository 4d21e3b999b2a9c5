import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { StoreUnavailableError, isStoreUnavailable, withStore, SubmissionError } from "./errors";

function sqliteError(code: string, message = "sqlite failure"): Error {
  return Object.assign(new Error(message), { code });
}

describe("isStoreUnavailable", () => {
  it("recognises lock and I/O errors", () => {
    assert.equal(isStoreUnavailable(sqliteError("SQLITE_BUSY")), true);
    assert.equal(isStoreUnavailable(sqliteError("SQLITE_LOCKED")), true);
    assert.equal(isStoreUnavailable(sqliteError("SQLITE_IOERR_WRITE")), true);
    assert.equal(isStoreUnavailable(sqliteError("SQLITE_CANTOPEN")), true);
  });

  it("recognises a closed connection", () => {
    assert.equal(isStoreUnavailable(new TypeError("The database connection is not open")), true);
  });

  it("leaves statement errors alone", () => {
    assert.equal(isStoreUnavailable(sqliteError("SQLITE_CONSTRAINT_UNIQUE")), false);
    assert.equal(isStoreUnavailable(new Error("no such table: task_status")), false);
    assert.equal(isStoreUnavailable("SQLITE_BUSY"), false);
  });
});

describe("withStore", () => {
  it("wraps unavailability in StoreUnavailableError", () => {
    assert.throws(
      () =>
        withStore("ledger.append", () => {
          throw sqliteError("SQLITE_BUSY", "database is locked");
        }),
      (error: unknown) => {
        assert.ok(error instanceof StoreUnavailableError);
        assert.equal(error.operation, "ledger.append");
        assert.equal(error.message, "Store unavailable during ledger.append: database is locked");
        return true;
      }
    );
  });

  it("passes other errors through", () => {
    const original = sqliteError("SQLITE_CONSTRAINT_UNIQUE");
    assert.throws(
      () =>
        withStore("status.create", () => {
          throw original;
        }),
      (error: unknown) => error === original
    );
  });

  it("returns the operation's value", () => {
    assert.equal(
      withStore("status.get", () => 42),
      42
    );
  });
});

describe("SubmissionError", () => {
  it("keeps the broker error as its cause", () => {
    const cause = new Error("connection refused");
    const error = new SubmissionError("t1", cause);

    assert.equal(error.cause, cause);
    assert.equal(error.name, "SubmissionError");
  });
});
