/**
 * QueryService
 *
 * Read side for polling clients: merges StatusStore state with the
 * PositionLedger. The status decides; the ledger only answers "how many are
 * ahead" while the task is PENDING.
 */

import { StatusStore } from "./StatusStore";
import { PositionLedger } from "./PositionLedger";
import { TaskState } from "./TaskState";

export interface TaskView {
  task_id: string;
  status: TaskState;
  result: string | null;
  /** 0-based count of pending tasks ahead; null unless PENDING */
  queue_position: number | null;
}

export interface QueueStats {
  pending: number;
  started: number;
  succeeded: number;
  failed: number;
  total: number;
  /** Current size of the pending set */
  queueLength: number;
}

export class QueryService {
  constructor(
    private readonly statusStore: StatusStore,
    private readonly ledger: PositionLedger
  ) {}

  /**
   * @throws TaskNotFoundError if the task was never submitted
   */
  query(taskId: string): TaskView {
    const record = this.statusStore.get(taskId);

    if (record.state !== TaskState.PENDING) {
      return {
        task_id: record.id,
        status: record.state,
        result: record.result,
        queue_position: null,
      };
    }

    return {
      task_id: record.id,
      status: record.state,
      result: null,
      queue_position: this.ledger.positionOf(taskId),
    };
  }

  stats(): QueueStats {
    return {
      ...this.statusStore.counts(),
      queueLength: this.ledger.size(),
    };
  }
}
