/**
 * TRPC Router Configuration
 *
 * Task submission, task status and queue statistics over tRPC.
 */

import { initTRPC, TRPCError } from "@trpc/server";
import { z } from "zod";
import { SubmissionGateway } from "../queue/SubmissionGateway";
import { QueryService } from "../queue/QueryService";
import { SubmissionError, StoreUnavailableError, TaskNotFoundError } from "../errors";

/**
 * Context passed to all TRPC procedures
 */
export interface Context {
  gateway: SubmissionGateway;
  queryService: QueryService;
}

export function createContext(gateway: SubmissionGateway, queryService: QueryService): Context {
  return { gateway, queryService };
}

const t = initTRPC.context<Context>().create();

export const router = t.router;
export const publicProcedure = t.procedure;

/**
 * Translate engine errors into TRPC errors. Anything unrecognised is rethrown.
 */
function toTRPCError(error: unknown): unknown {
  if (error instanceof TaskNotFoundError) {
    return new TRPCError({ code: "NOT_FOUND", message: error.message, cause: error });
  }
  if (error instanceof SubmissionError || error instanceof StoreUnavailableError) {
    return new TRPCError({ code: "INTERNAL_SERVER_ERROR", message: error.message, cause: error });
  }
  return error;
}

/**
 * Task router - submit work and poll its status
 */
export const taskRouter = router({
  /**
   * Submit a payload for execution
   */
  submit: publicProcedure
    .input(
      z.object({
        text: z.string(),
        taskType: z.string().min(1).optional(),
      })
    )
    .mutation(async ({ ctx, input }) => {
      try {
        const taskId = await ctx.gateway.submit(input.text, { taskType: input.taskType });
        return { message: "Task dispatched successfully", task_id: taskId };
      } catch (error) {
        throw toTRPCError(error);
      }
    }),

  /**
   * Current status, result and queue position of a task
   */
  get: publicProcedure.input(z.object({ id: z.string().min(1) })).query(({ ctx, input }) => {
    try {
      return ctx.queryService.query(input.id);
    } catch (error) {
      throw toTRPCError(error);
    }
  }),
});

/**
 * Queue router - aggregate view of the shared store
 */
export const queueRouter = router({
  stats: publicProcedure.query(({ ctx }) => {
    try {
      return ctx.queryService.stats();
    } catch (error) {
      throw toTRPCError(error);
    }
  }),
});

export const appRouter = router({
  task: taskRouter,
  queue: queueRouter,
});

export type AppRouter = typeof appRouter;
