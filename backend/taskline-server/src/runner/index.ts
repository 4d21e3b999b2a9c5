/**
 * Runner module
 *
 * Task handlers registered on the Worker.
 */

export { createEchoTaskHandler } from "./EchoTaskHandler";
export type { EchoTaskHandlerOptions } from "./EchoTaskHandler";
