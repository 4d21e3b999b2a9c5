/**
 * Engine wiring
 *
 * Builds the components that share one store: repositories, StatusStore,
 * PositionLedger, broker, signal bus and the LifecycleHandler subscribed to
 * it. Both the API process and worker processes start from here.
 */

import { StoreDatabase } from "./db/connection";
import { TaskStatusRepository, PendingTaskRepository, BrokerMessageRepository } from "./repositories";
import { StatusStore } from "./queue/StatusStore";
import { PositionLedger } from "./queue/PositionLedger";
import { SignalBus } from "./queue/SignalBus";
import { LifecycleSignals, LifecycleSignalBus, TaskSignal } from "./queue/LifecycleSignals";
import { LifecycleHandler, LifecycleHandlerOptions } from "./queue/LifecycleHandler";
import { SubmissionGateway, SubmissionGatewayOptions, DEFAULT_TASK_TYPE } from "./queue/SubmissionGateway";
import { QueryService } from "./queue/QueryService";
import { Worker } from "./queue/Worker";
import { createEchoTaskHandler } from "./runner/EchoTaskHandler";
import { TasklineConfig } from "./config";
import { SqliteBroker } from "./broker/SqliteBroker";
import { TaskBroker } from "./broker/TaskBroker";
import { Logger } from "./utils/logger";

export interface EngineOptions {
  /** Replaces the SQLite-backed broker */
  broker?: TaskBroker;
  signalRetry?: LifecycleHandlerOptions["retry"];
  gateway?: Pick<SubmissionGatewayOptions, "now" | "generateId">;
  /** Passed to every component instead of its own console logger */
  logger?: Logger;
}

export interface Engine {
  statusStore: StatusStore;
  ledger: PositionLedger;
  broker: TaskBroker;
  bus: LifecycleSignalBus;
  signals: LifecycleSignals;
  lifecycleHandler: LifecycleHandler;
  gateway: SubmissionGateway;
  queryService: QueryService;
  /** Unsubscribe the LifecycleHandler */
  destroy(): void;
}

export function createEngine(db: StoreDatabase, options: EngineOptions = {}): Engine {
  const { logger } = options;

  const statusStore = new StatusStore(new TaskStatusRepository(db), { logger });
  const ledger = new PositionLedger(new PendingTaskRepository(db), { logger });
  const broker = options.broker ?? new SqliteBroker(new BrokerMessageRepository(db));

  const bus: LifecycleSignalBus = new SignalBus<TaskSignal>();
  const signals = new LifecycleSignals(bus);
  const lifecycleHandler = new LifecycleHandler(statusStore, ledger, bus, {
    retry: options.signalRetry,
    logger,
  });

  const gateway = new SubmissionGateway(statusStore, ledger, broker, {
    ...options.gateway,
    logger,
  });
  const queryService = new QueryService(statusStore, ledger);

  return {
    statusStore,
    ledger,
    broker,
    bus,
    signals,
    lifecycleHandler,
    gateway,
    queryService,
    destroy: () => lifecycleHandler.destroy(),
  };
}

/**
 * Worker bound to an engine's broker and signals, with the echo handler
 * registered under the default task type.
 */
export function createWorker(
  engine: Engine,
  config: TasklineConfig["worker"],
  options: { consumerId?: string; logger?: Logger } = {}
): Worker {
  const worker = new Worker(engine.broker, engine.signals, {
    consumerId: options.consumerId,
    concurrency: config.concurrency,
    pollIntervalMs: config.pollIntervalMs,
    taskTimeoutMs: config.taskTimeoutMs,
    leaseMs: config.leaseMs,
    logger: options.logger,
  });
  worker.registerHandler(DEFAULT_TASK_TYPE, createEchoTaskHandler({ delayMs: config.echoDelayMs }));
  return worker;
}
