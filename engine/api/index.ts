/**
 * Command Handler Registration
 *
 * Registers every command with a router.
 */

import type { AppContext } from "../core/app-context";
import { registerResourceHandlers } from "./resource-handlers";
import { registerServerHandlers } from "./server-handlers";
import { registerStreamHandlers } from "./stream-handlers";
import type { CommandRouter } from "./validation";

/**
 * Register all command handlers
 */
export function registerAllHandlers(router: CommandRouter, context: AppContext): void {
  registerStreamHandlers(router, context);
  registerResourceHandlers(router, context);
  registerServerHandlers(router, context);
}

export { CommandRouter, CommandValidationError, UnknownCommandError, serializeError } from "./validation";
