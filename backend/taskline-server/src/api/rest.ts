/**
 * REST API Router
 *
 * Plain HTTP endpoints for clients that do not speak tRPC.
 *
 * Endpoints:
 *   GET    /                      - Service descriptor
 *   POST   /api/v1/tasks          - Submit a task
 *   GET    /api/v1/tasks/:id      - Task status, result and queue position
 *   GET    /api/v1/queue          - Queue statistics
 */

import { FastifyInstance, FastifyReply } from "fastify";
import { z } from "zod";
import { Context } from "./trpc";
import { SubmissionError, StoreUnavailableError, TaskNotFoundError } from "../errors";

export const SERVICE_DESCRIPTOR = {
  service: "Task Queue API",
  description: "Distributed task processing with queue position tracking",
  version: "1.0.0",
  POST: "/api/v1/tasks",
  GET: "/api/v1/tasks/{task_id}",
} as const;

const SubmitBodySchema = z.object({
  text: z.string(),
});

function sendUnavailable(reply: FastifyReply, error: SubmissionError | StoreUnavailableError) {
  return reply.status(503).send({
    error: "Service Unavailable",
    message: error.message,
  });
}

/**
 * Register all REST API routes on the Fastify instance.
 */
export async function registerRestRoutes(server: FastifyInstance, ctx: Context): Promise<void> {
  server.get("/", async () => SERVICE_DESCRIPTOR);

  server.post("/api/v1/tasks", async (request, reply) => {
    const body = SubmitBodySchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({
        error: "Bad Request",
        message: "text is required and must be a string",
      });
    }

    try {
      const taskId = await ctx.gateway.submit(body.data.text);
      return reply.send({
        message: "Task dispatched successfully",
        task_id: taskId,
      });
    } catch (error) {
      if (error instanceof SubmissionError || error instanceof StoreUnavailableError) {
        return sendUnavailable(reply, error);
      }
      throw error;
    }
  });

  server.get<{ Params: { id: string } }>("/api/v1/tasks/:id", async (request, reply) => {
    try {
      return reply.send(ctx.queryService.query(request.params.id));
    } catch (error) {
      if (error instanceof TaskNotFoundError) {
        return reply.status(404).send({
          error: "Not Found",
          message: error.message,
        });
      }
      if (error instanceof StoreUnavailableError) {
        return sendUnavailable(reply, error);
      }
      throw error;
    }
  });

  server.get("/api/v1/queue", async (_request, reply) => {
    try {
      return reply.send(ctx.queryService.stats());
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        return sendUnavailable(reply, error);
      }
      throw error;
    }
  });
}
