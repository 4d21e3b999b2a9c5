/**
 * Lifecycle signals emitted by workers as tasks change state.
 * Signals are facts: they may arrive more than once and out of order.
 */

import { SignalBus, PublishResult } from "./SignalBus";

export interface TaskStartedSignal {
  type: "task.started";
  taskId: string;
  timestamp: Date;
}

export interface TaskSucceededSignal {
  type: "task.succeeded";
  taskId: string;
  result: string;
  timestamp: Date;
}

export interface TaskFailedSignal {
  type: "task.failed";
  taskId: string;
  error: string;
  timestamp: Date;
}

export type TaskSignal = TaskStartedSignal | TaskSucceededSignal | TaskFailedSignal;

export type TaskSignalType = TaskSignal["type"];

export const TASK_SIGNAL_TYPES: TaskSignalType[] = ["task.started", "task.succeeded", "task.failed"];

export type LifecycleSignalBus = SignalBus<TaskSignal>;

/**
 * Worker-facing emitter. Each call resolves once every subscriber has
 * finished with the signal.
 */
export class LifecycleSignals {
  constructor(private readonly bus: LifecycleSignalBus) {}

  started(taskId: string): Promise<PublishResult<TaskSignal>> {
    return this.bus.publish({ type: "task.started", taskId, timestamp: new Date() });
  }

  succeeded(taskId: string, result: string): Promise<PublishResult<TaskSignal>> {
    return this.bus.publish({ type: "task.succeeded", taskId, result, timestamp: new Date() });
  }

  failed(taskId: string, error: string): Promise<PublishResult<TaskSignal>> {
    return this.bus.publish({ type: "task.failed", taskId, error, timestamp: new Date() });
  }
}
