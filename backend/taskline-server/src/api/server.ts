/**
 * Fastify Server with TRPC Integration
 *
 * HTTP server providing:
 * - /health endpoint for health checks
 * - /trpc/* endpoints for TRPC API
 * - / and /api/v1/* REST endpoints
 * - CORS support for cross-origin requests
 */

import Fastify, { FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import { fastifyTRPCPlugin, FastifyTRPCPluginOptions } from "@trpc/server/adapters/fastify";
import { appRouter, createContext, AppRouter } from "./trpc";
import { registerRestRoutes } from "./rest";
import { SubmissionGateway } from "../queue/SubmissionGateway";
import { QueryService } from "../queue/QueryService";
import { Logger, createLogger } from "../utils/logger";

export interface ServerOptions {
  gateway: SubmissionGateway;
  queryService: QueryService;
  /** Port to listen on (default: 3000) */
  port?: number;
  /** Host to bind to (default: '0.0.0.0') */
  host?: string;
  /** Enable Fastify request logging (default: false) */
  httpLogger?: boolean;
  logger?: Logger;
}

/**
 * Create and configure a Fastify server with TRPC
 */
export async function createServer(options: ServerOptions): Promise<FastifyInstance> {
  const { gateway, queryService, httpLogger = false } = options;
  const logger = options.logger ?? createLogger("Server");

  const server = Fastify({ logger: httpLogger });

  await server.register(cors, {
    origin: true,
    methods: ["GET", "POST", "OPTIONS"],
    credentials: true,
  });

  server.get("/health", async () => {
    return { status: "ok", timestamp: new Date().toISOString() };
  });

  await server.register(fastifyTRPCPlugin, {
    prefix: "/trpc",
    trpcOptions: {
      router: appRouter,
      createContext: () => createContext(gateway, queryService),
      onError: ({ path, error }) => {
        logger.error(`TRPC Error on ${path}: ${error.message}`);
      },
    } satisfies FastifyTRPCPluginOptions<AppRouter>["trpcOptions"],
  });

  await registerRestRoutes(server, createContext(gateway, queryService));

  return server;
}

/**
 * Start the server and listen on the specified port
 */
export async function startServer(options: ServerOptions): Promise<FastifyInstance> {
  const { port = 3000, host = "0.0.0.0" } = options;
  const logger = options.logger ?? createLogger("Server");

  const server = await createServer(options);

  try {
    const address = await server.listen({ port, host });
    logger.info(`Listening at ${address}`);
    return server;
  } catch (err) {
    server.log.error(err);
    throw err;
  }
}

export { appRouter } from "./trpc";
export type { AppRouter } from "./trpc";
