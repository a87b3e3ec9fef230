/**
 * Resource Command Handlers
 *
 * Fetch cached frames by URI. Binary transports ask for "binary", text-only
 * transports for "base64".
 */

import type { AppContext } from "../core/app-context";
import { resourceGetSchema } from "./schemas";
import type { CommandRouter } from "./validation";

export function registerResourceHandlers(router: CommandRouter, context: AppContext): void {
  // resource:get - Throws NOT_FOUND once the frame has been evicted
  router.handleWithValidation("resource:get", resourceGetSchema, (data) => {
    const cache = context.getResourceCache();
    const payload = cache.getEncoded(data.uri, data.encoding);
    const entry = cache.describe(data.uri);
    return {
      uri: entry.uri,
      mimeType: entry.mimeType,
      streamId: entry.streamId,
      width: entry.width,
      height: entry.height,
      timestamp: entry.timestamp,
      size: entry.size,
      encoding: data.encoding,
      data: payload,
    };
  });
}
