export { SqliteBroker } from "./SqliteBroker";
export type { TaskBroker, TaskMessage, BrokerDelivery } from "./TaskBroker";
