/**
 * SqliteBroker
 *
 * TaskBroker backed by the broker_messages table of the shared store.
 * Any number of worker processes may claim from the same file.
 */

import { BrokerMessageRepository } from "../repositories/BrokerMessageRepository";
import { BrokerMessageRow } from "../db/schema";
import { withStore } from "../errors";
import { BrokerDelivery, TaskBroker, TaskMessage } from "./TaskBroker";

export class SqliteBroker implements TaskBroker {
  constructor(
    private readonly repository: BrokerMessageRepository,
    private readonly now: () => Date = () => new Date()
  ) {}

  async publish(message: TaskMessage): Promise<void> {
    withStore("broker.publish", () => this.repository.insert(message));
  }

  async claim(consumerId: string, leaseMs: number): Promise<BrokerDelivery | undefined> {
    const row = withStore("broker.claim", () =>
      this.repository.claimNext(consumerId, this.now(), leaseMs)
    );
    return row ? toDelivery(row) : undefined;
  }

  async ack(deliveryId: number): Promise<void> {
    withStore("broker.ack", () => this.repository.delete(deliveryId));
  }

  async release(deliveryId: number, consumerId: string): Promise<void> {
    withStore("broker.release", () => this.repository.release(deliveryId, consumerId));
  }

  /**
   * Messages not yet acknowledged, leased or not
   */
  size(): number {
    return withStore("broker.size", () => this.repository.size());
  }
}

function toDelivery(row: BrokerMessageRow): BrokerDelivery {
  return {
    deliveryId: row.id,
    deliveries: row.deliveries,
    message: {
      taskId: row.taskId,
      taskType: row.taskType,
      payload: row.payload,
      enqueuedAt: row.enqueuedAt,
    },
  };
}
