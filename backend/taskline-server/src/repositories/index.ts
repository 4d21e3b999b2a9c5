/**
 * Repository exports
 * Data access layer over the shared task store
 */

export { TaskStatusRepository } from "./TaskStatusRepository";
export { PendingTaskRepository } from "./PendingTaskRepository";
export { BrokerMessageRepository } from "./BrokerMessageRepository";
