/**
 * Task Queue Module
 *
 * Position tracking and lifecycle synchronization for tasks in the shared
 * store, plus the worker that executes them.
 */

export {
  TaskState,
  isTerminalState,
  isValidTransition,
  getAllowedTransitions,
  getAllowedSources,
} from "./TaskState";
export { StatusStore } from "./StatusStore";
export type { TaskStatusRecord, NewTaskStatus, TransitionOutcome, StateCounts } from "./StatusStore";
export { PositionLedger } from "./PositionLedger";
export type { PendingEntry } from "./PositionLedger";
export { SignalBus } from "./SignalBus";
export type {
  BaseSignal,
  SignalOfType,
  SignalHandler,
  Subscription,
  PublishResult,
} from "./SignalBus";
export { LifecycleSignals, TASK_SIGNAL_TYPES } from "./LifecycleSignals";
export type {
  TaskSignal,
  TaskSignalType,
  TaskStartedSignal,
  TaskSucceededSignal,
  TaskFailedSignal,
  LifecycleSignalBus,
} from "./LifecycleSignals";
export { LifecycleHandler } from "./LifecycleHandler";
export type { SignalOutcome, LifecycleHandlerOptions } from "./LifecycleHandler";
export { SubmissionGateway, DEFAULT_TASK_TYPE } from "./SubmissionGateway";
export type { SubmitOptions, SubmissionGatewayOptions } from "./SubmissionGateway";
export { QueryService } from "./QueryService";
export type { TaskView, QueueStats } from "./QueryService";
export { Worker, TaskTimeoutError } from "./Worker";
export type {
  TaskHandler,
  TaskExecutionContext,
  TaskExecutionResult,
  WorkerOptions,
  WorkerStats,
} from "./Worker";
