/**
 * TaskState Enum
 *
 * Lifecycle state of a submitted task:
 *
 *   PENDING → STARTED → SUCCESS
 *                 ↓
 *              FAILURE
 *
 * Transitions only move forward. A terminal event that arrives before
 * "started" was observed moves PENDING straight to SUCCESS or FAILURE.
 */
export enum TaskState {
  /**
   * Published to the broker and waiting for a worker.
   * The only state that holds a queue position.
   */
  PENDING = "PENDING",

  /**
   * A worker has begun executing the task.
   */
  STARTED = "STARTED",

  /**
   * Finished; result holds the handler output.
   */
  SUCCESS = "SUCCESS",

  /**
   * Finished with an error; result holds the error message.
   */
  FAILURE = "FAILURE",
}

const RANK: Record<TaskState, number> = {
  [TaskState.PENDING]: 0,
  [TaskState.STARTED]: 1,
  [TaskState.SUCCESS]: 2,
  [TaskState.FAILURE]: 2,
};

const ALL_STATES: TaskState[] = [
  TaskState.PENDING,
  TaskState.STARTED,
  TaskState.SUCCESS,
  TaskState.FAILURE,
];

/**
 * Check if a state is terminal (no further transitions possible)
 */
export function isTerminalState(state: TaskState): boolean {
  return state === TaskState.SUCCESS || state === TaskState.FAILURE;
}

/**
 * Check if a state transition moves strictly forward
 */
export function isValidTransition(from: TaskState, to: TaskState): boolean {
  return RANK[to] > RANK[from];
}

/**
 * Get allowed next states from current state
 */
export function getAllowedTransitions(state: TaskState): TaskState[] {
  return ALL_STATES.filter((candidate) => isValidTransition(state, candidate));
}

/**
 * States a task may currently be in for a write of `to` to apply
 */
export function getAllowedSources(to: TaskState): TaskState[] {
  return ALL_STATES.filter((candidate) => isValidTransition(candidate, to));
}
