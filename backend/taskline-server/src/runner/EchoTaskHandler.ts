/**
 * EchoTaskHandler
 *
 * Stand-in workload: waits, then returns the payload unchanged.
 */

import { TaskHandler } from "../queue/Worker";

export interface EchoTaskHandlerOptions {
  /** Simulated work duration in milliseconds (default: 20000) */
  delayMs?: number;
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new Error("Task aborted"));
      return;
    }
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error("Task aborted"));
    };
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

export function createEchoTaskHandler(options: EchoTaskHandlerOptions = {}): TaskHandler {
  const delayMs = options.delayMs ?? 20000;

  return async (message, context) => {
    if (delayMs > 0) {
      await sleep(delayMs, context.signal);
    }
    return message.payload;
  };
}
