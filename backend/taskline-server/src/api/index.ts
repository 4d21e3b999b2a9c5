/**
 * API Module Exports
 *
 * Barrel exports for the Fastify/TRPC API layer.
 */

// Server exports
export { createServer, startServer } from "./server";
export type { ServerOptions } from "./server";

// TRPC exports
export { appRouter, taskRouter, queueRouter, router, publicProcedure, createContext } from "./trpc";
export type { AppRouter, Context } from "./trpc";

// REST API exports
export { registerRestRoutes, SERVICE_DESCRIPTOR } from "./rest";
