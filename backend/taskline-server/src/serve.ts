/**
 * Server Entry Point
 *
 * Starts the Fastify server with TRPC integration over the shared store,
 * optionally with an embedded worker.
 * Can be run directly with: tsx src/serve.ts
 */

import { startServer } from "./api";
import { initializeDatabase, getDatabase, closeDatabase } from "./db/connection";
import { createEngine, createWorker } from "./engine";
import { loadConfig, loadEnvFile } from "./config";
import { createLogger, setLogLevel } from "./utils/logger";

loadEnvFile();
const config = loadConfig();
setLogLevel(config.logLevel);

const logger = createLogger("Serve");

// Initialize database tables before starting server
const db = getDatabase(config.dbPath);
initializeDatabase();

const engine = createEngine(db, { signalRetry: config.signalRetry });

// TASKLINE_EMBEDDED_WORKER: run tasks in this process too
const worker = config.embeddedWorker ? createWorker(engine, config.worker) : undefined;

let isShuttingDown = false;

async function gracefulShutdown(signal: string, timeoutMs: number): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  logger.info(`${signal} received, initiating graceful shutdown...`);

  try {
    if (worker) {
      await worker.stop(timeoutMs);
    }
    engine.destroy();
    closeDatabase();

    logger.info("Shutdown complete");
    process.exit(0);
  } catch (err) {
    logger.error("Error during shutdown:", err);
    process.exit(1);
  }
}

process.on("SIGTERM", () => gracefulShutdown("SIGTERM", 30000));
process.on("SIGINT", () => gracefulShutdown("SIGINT", 10000));

startServer({
  gateway: engine.gateway,
  queryService: engine.queryService,
  port: config.port,
  host: config.host,
  httpLogger: config.httpLogger,
})
  .then(() => {
    if (worker) {
      worker.start();
      logger.info(`Embedded worker started (concurrency=${config.worker.concurrency})`);
    }

    logger.info(`Store: ${config.dbPath}`);
    logger.info(`Health check: http://${config.host}:${config.port}/health`);
    logger.info(`TRPC endpoint: http://${config.host}:${config.port}/trpc`);
    logger.info(`REST API: http://${config.host}:${config.port}/api/v1`);
  })
  .catch((err) => {
    logger.error("Failed to start server:", err);
    process.exit(1);
  });
