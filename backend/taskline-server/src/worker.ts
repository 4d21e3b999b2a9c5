/**
 * Worker Entry Point
 *
 * Runs one worker process against the shared store. Start as many as needed;
 * they compete for broker messages.
 * Can be run directly with: tsx src/worker.ts
 */

import { initializeDatabase, getDatabase, closeDatabase } from "./db/connection";
import { createEngine, createWorker } from "./engine";
import { loadConfig, loadEnvFile } from "./config";
import { createLogger, setLogLevel } from "./utils/logger";

loadEnvFile();
const config = loadConfig();
setLogLevel(config.logLevel);

const logger = createLogger("WorkerProcess");

const db = getDatabase(config.dbPath);
initializeDatabase();

const engine = createEngine(db, { signalRetry: config.signalRetry });
const worker = createWorker(engine, config.worker);

let isShuttingDown = false;

async function gracefulShutdown(signal: string, timeoutMs: number): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  logger.info(`${signal} received, waiting for running tasks...`);

  try {
    await worker.stop(timeoutMs);
    engine.destroy();
    closeDatabase();
    process.exit(0);
  } catch (err) {
    logger.error("Error during shutdown:", err);
    process.exit(1);
  }
}

process.on("SIGTERM", () => gracefulShutdown("SIGTERM", 30000));
process.on("SIGINT", () => gracefulShutdown("SIGINT", 10000));

worker.start();
logger.info(`Polling ${config.dbPath} (concurrency=${config.worker.concurrency})`);
