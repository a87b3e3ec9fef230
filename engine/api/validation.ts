/**
 * Command Router
 *
 * Transport-agnostic command registration with automatic Zod validation.
 * Transports (stdio, WebSocket, HTTP) own framing and call dispatch() with a
 * channel name and an untrusted payload; every result is a CommandResult.
 */

import { z, ZodSchema } from "zod";
import type { CommandResult, SerializedError } from "@framecast/types";
import { AppError, getErrorMessage } from "../core/app-error";
import { logger } from "../utils/logger";

/**
 * Error thrown when a command payload fails validation
 */
export class CommandValidationError extends AppError {
  public readonly channel: string;
  public readonly issues: z.ZodIssue[];

  constructor(channel: string, issues: z.ZodIssue[]) {
    const issueMessages = issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    super(`Command validation failed for ${channel}: ${issueMessages}`, "VALIDATION_ERROR", 400, undefined, {
      channel,
      issues: issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
    });
    this.channel = channel;
    this.issues = issues;
  }
}

/**
 * No handler registered for a channel
 */
export class UnknownCommandError extends AppError {
  constructor(channel: string) {
    super(`Unknown command: ${channel}`, "UNKNOWN_COMMAND", 404, undefined, { channel });
  }
}

type RegisteredHandler = (payload: unknown) => Promise<unknown>;

/**
 * Validate data against a schema
 *
 * @throws CommandValidationError if validation fails
 */
export function validateCommandData<T extends ZodSchema>(schema: T, data: unknown, channel: string): z.infer<T> {
  const result = schema.safeParse(data);

  if (!result.success) {
    logger.warn(`Command validation failed: ${channel}`, {
      issues: result.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
        code: issue.code,
      })),
    });
    throw new CommandValidationError(channel, result.error.issues);
  }

  return result.data;
}

/**
 * Convert any thrown value into its transport form
 */
export function serializeError(error: unknown): SerializedError {
  if (AppError.isAppError(error)) {
    return error.toJSON();
  }
  return {
    name: error instanceof Error ? error.name : "Error",
    message: getErrorMessage(error),
    code: "INTERNAL_ERROR",
    statusCode: 500,
  };
}

export class CommandRouter {
  private readonly handlers = new Map<string, RegisteredHandler>();

  /**
   * Register a handler whose payload is validated first
   *
   * @example
   * ```typescript
   * router.handleWithValidation("stream:start", streamIdPayloadSchema, (data) => {
   *   // data is typed and validated
   *   return registry.start(data.streamId);
   * });
   * ```
   */
  handleWithValidation<T extends ZodSchema>(
    channel: string,
    schema: T,
    handler: (data: z.infer<T>) => Promise<unknown> | unknown
  ): void {
    this.register(channel, async (payload) => handler(validateCommandData(schema, payload, channel)));
  }

  /**
   * Register a handler for a command that takes no payload
   */
  handleNoArgs(channel: string, handler: () => Promise<unknown> | unknown): void {
    this.register(channel, async () => handler());
  }

  /**
   * Run a command. Never throws: failures come back as { success: false }.
   */
  async dispatch(channel: string, payload?: unknown): Promise<CommandResult> {
    const handler = this.handlers.get(channel);
    if (!handler) {
      return { success: false, error: serializeError(new UnknownCommandError(channel)) };
    }

    try {
      const data = await handler(payload);
      return { success: true, data };
    } catch (error) {
      if (!AppError.isAppError(error)) {
        logger.error(`Command failed: ${channel}`, {
          error: getErrorMessage(error),
          stack: error instanceof Error ? error.stack : undefined,
        });
      }
      return { success: false, error: serializeError(error) };
    }
  }

  has(channel: string): boolean {
    return this.handlers.has(channel);
  }

  channels(): string[] {
    return [...this.handlers.keys()];
  }

  removeAll(): void {
    this.handlers.clear();
  }

  private register(channel: string, handler: RegisteredHandler): void {
    if (this.handlers.has(channel)) {
      logger.warn("Replacing command handler", { channel });
    }
    this.handlers.set(channel, handler);
  }
}
