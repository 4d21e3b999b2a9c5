/**
 * TaskBroker
 *
 * Transport that carries published tasks to workers. Delivery is
 * at-least-once to one consumer at a time (competing consumers): a claimed
 * message stays invisible while its lease is live and is redelivered if the
 * consumer neither acks nor renews it.
 */

export interface TaskMessage {
  taskId: string;
  taskType: string;
  payload: string;
  enqueuedAt: Date;
}

export interface BrokerDelivery {
  /** Broker-assigned id used to ack or release this delivery */
  deliveryId: number;
  message: TaskMessage;
  /** How many times the message has been handed out, this one included */
  deliveries: number;
}

export interface TaskBroker {
  publish(message: TaskMessage): Promise<void>;
  claim(consumerId: string, leaseMs: number): Promise<BrokerDelivery | undefined>;
  ack(deliveryId: number): Promise<void>;
  release(deliveryId: number, consumerId: string): Promise<void>;
}
