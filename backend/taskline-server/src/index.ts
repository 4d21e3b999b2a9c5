/**
 * @taskline/server
 * Task queue with live queue positions
 */

// Database exports
export {
  getDatabase,
  initializeDatabase,
  closeDatabase,
  getSqliteConnection,
  getDefaultDbPath,
  createTables,
  schema,
} from "./db/connection";
export type { StoreDatabase } from "./db/connection";
export type { TaskStatusRow, PendingTaskRow, BrokerMessageRow } from "./db/schema";

// Repository exports
export { TaskStatusRepository, PendingTaskRepository, BrokerMessageRepository } from "./repositories";

// Queue exports
export * from "./queue";

// Broker exports
export { SqliteBroker } from "./broker";
export type { TaskBroker, TaskMessage, BrokerDelivery } from "./broker";

// Runner exports
export { createEchoTaskHandler } from "./runner";
export type { EchoTaskHandlerOptions } from "./runner";

// Engine, config and errors
export { createEngine, createWorker } from "./engine";
export type { Engine, EngineOptions } from "./engine";
export { loadConfig, loadEnvFile, ConfigError } from "./config";
export type { TasklineConfig } from "./config";
export {
  SubmissionError,
  TaskNotFoundError,
  InvalidTransitionError,
  StoreUnavailableError,
  isStoreUnavailable,
} from "./errors";
export { createLogger, setLogLevel } from "./utils/logger";
export type { Logger, LogLevel } from "./utils/logger";

// API exports
export { createServer, startServer, appRouter, createContext } from "./api";
export type { ServerOptions, AppRouter, Context } from "./api";
