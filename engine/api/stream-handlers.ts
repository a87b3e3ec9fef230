/**
 * Stream Command Handlers
 *
 * Lifecycle, metrics and quality commands for individual streams.
 */

import type { AppContext } from "../core/app-context";
import { logger } from "../utils/logger";
import { setQualitySchema, streamIdPayloadSchema, streamRequestSchema } from "./schemas";
import type { CommandRouter } from "./validation";

/**
 * Register stream command handlers
 */
export function registerStreamHandlers(router: CommandRouter, context: AppContext): void {
  // stream:create - Validate a request (optional preset plus overrides) and register an idle stream
  router.handleWithValidation("stream:create", streamRequestSchema, (data) => {
    const registry = context.getStreamRegistry();
    const streamId = registry.create(data);
    return { streamId, config: registry.get(streamId) };
  });

  // stream:start - Launch the pacing loop
  router.handleWithValidation("stream:start", streamIdPayloadSchema, (data) => {
    const registry = context.getStreamRegistry();
    registry.start(data.streamId);
    return registry.status(data.streamId);
  });

  // stream:stop - Idempotent; resolves once the loop has exited
  router.handleWithValidation("stream:stop", streamIdPayloadSchema, async (data) => {
    await context.getStreamRegistry().stop(data.streamId);
    return { streamId: data.streamId, state: "stopped" };
  });

  router.handleNoArgs("stream:list", () => context.getStreamRegistry().list());

  router.handleWithValidation("stream:get", streamIdPayloadSchema, (data) => {
    const registry = context.getStreamRegistry();
    return { config: registry.get(data.streamId), status: registry.status(data.streamId) };
  });

  router.handleWithValidation("stream:metrics", streamIdPayloadSchema, (data) =>
    context.getStreamRegistry().snapshot(data.streamId)
  );

  // stream:set-quality - Manual override, clamped to the stream's bounds
  router.handleWithValidation("stream:set-quality", setQualitySchema, (data) => {
    const state = context.getStreamRegistry().setQuality(data.streamId, data.quality);
    if (state.quality !== data.quality) {
      logger.debug("Requested quality clamped", {
        streamId: data.streamId,
        requested: data.quality,
        applied: state.quality,
      });
    }
    return state;
  });
}
