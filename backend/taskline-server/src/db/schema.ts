/**
 * Drizzle ORM Schema Definitions
 * Shared store for task status, the pending-set ledger and the broker queue
 */

import { sqliteTable, text, integer } from "drizzle-orm/sqlite-core";
import { TaskState } from "../queue/TaskState";

/**
 * Task status table - canonical lifecycle state per task
 *
 * Design decisions:
 * - state is one of PENDING, STARTED, SUCCESS, FAILURE and only moves forward
 * - result holds the handler output on SUCCESS and the error message on FAILURE
 * - enqueued_at is stored in milliseconds; it is the queue ordering key
 */
export const taskStatus = sqliteTable("task_status", {
  id: text("id").primaryKey(),
  taskType: text("task_type").notNull(),
  payload: text("payload").notNull(),
  state: text("state", {
    enum: [TaskState.PENDING, TaskState.STARTED, TaskState.SUCCESS, TaskState.FAILURE],
  })
    .notNull()
    .default(TaskState.PENDING),
  result: text("result"),
  enqueuedAt: integer("enqueued_at", { mode: "timestamp_ms" }).notNull(),
  startedAt: integer("started_at", { mode: "timestamp_ms" }),
  completedAt: integer("completed_at", { mode: "timestamp_ms" }),
});

/**
 * Pending tasks table - one row per task still waiting for a worker
 *
 * Design decisions:
 * - seq is assigned by SQLite on insert and breaks enqueued_at ties
 * - task_id is unique so a repeated append is a no-op
 * - rows are deleted, never updated; positions are computed on read
 */
export const pendingTasks = sqliteTable("pending_tasks", {
  seq: integer("seq").primaryKey({ autoIncrement: true }),
  taskId: text("task_id").notNull().unique(),
  enqueuedAt: integer("enqueued_at", { mode: "timestamp_ms" }).notNull(),
});

/**
 * Broker messages table - competing-consumers work queue
 *
 * Design decisions:
 * - a message is invisible while its lease is live; an expired lease makes it
 *   claimable again, which gives at-least-once delivery
 * - acknowledged messages are deleted
 */
export const brokerMessages = sqliteTable("broker_messages", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  taskId: text("task_id").notNull(),
  taskType: text("task_type").notNull(),
  payload: text("payload").notNull(),
  enqueuedAt: integer("enqueued_at", { mode: "timestamp_ms" }).notNull(),
  claimedBy: text("claimed_by"),
  leaseExpiresAt: integer("lease_expires_at", { mode: "timestamp_ms" }),
  deliveries: integer("deliveries").notNull().default(0),
});

// Type exports for use in repositories
export type TaskStatusRow = typeof taskStatus.$inferSelect;
export type NewTaskStatusRow = typeof taskStatus.$inferInsert;
export type PendingTaskRow = typeof pendingTasks.$inferSelect;
export type BrokerMessageRow = typeof brokerMessages.$inferSelect;
export type NewBrokerMessageRow = typeof brokerMessages.$inferInsert;
