import { afterEach, beforeEach, describe, it, expect } from "vitest";
import type { CommandResult, SerializedError } from "@framecast/types";
import { CommandRouter, serializeError } from "../../engine/api";
import { DEFAULT_SETTINGS } from "../../engine/config/store";
import { AppContext } from "../../engine/core/app-context";
import { InvalidConfigError } from "../../engine/core/app-error";
import { FakeEncoder, FakeSource, ManualClock } from "../helpers";

function createContext(): AppContext {
  return new AppContext({
    settings: { ...DEFAULT_SETTINGS, logLevel: "silent" },
    source: new FakeSource(),
    encoder: new FakeEncoder(),
    clock: new ManualClock(),
  });
}

function failure(result: CommandResult): SerializedError {
  if (result.success) {
    throw new Error("Expected the command to fail");
  }
  return result.error;
}

function streamIdOf(result: CommandResult): string {
  if (
    result.success &&
    typeof result.data === "object" &&
    result.data !== null &&
    "streamId" in result.data &&
    typeof result.data.streamId === "string"
  ) {
    return result.data.streamId;
  }
  throw new Error("Expected a created stream");
}

describe("command handlers", () => {
  let context: AppContext;
  let router: CommandRouter;

  beforeEach(() => {
    context = createContext();
    router = context.getCommandRouter();
  });

  afterEach(async () => {
    await context.cleanup();
  });

  it("registers every command", () => {
    expect(router.channels().sort()).toEqual([
      "presets:list",
      "resource:get",
      "server:stats",
      "stream:create",
      "stream:get",
      "stream:list",
      "stream:metrics",
      "stream:set-quality",
      "stream:start",
      "stream:stop",
    ]);
  });

  it("reports unknown commands", async () => {
    const error = failure(await router.dispatch("stream:pause", {}));

    expect(error).toMatchObject({ code: "UNKNOWN_COMMAND", statusCode: 404, message: "Unknown command: stream:pause" });
  });

  describe("stream:create", () => {
    it("expands a preset and returns the stored config", async () => {
      const result = await router.dispatch("stream:create", { preset: "balanced", quality: 60 });

      expect(result).toMatchObject({
        success: true,
        data: { config: { targetFps: 30, quality: 60, format: "jpeg", preset: "balanced" } },
      });
      expect(streamIdOf(result)).toMatch(/^stream_[a-f0-9]{16}$/);
    });

    it("rejects malformed payloads before they reach the registry", async () => {
      const error = failure(await router.dispatch("stream:create", { targetFps: "fast" }));

      expect(error.code).toBe("VALIDATION_ERROR");
      expect(error.statusCode).toBe(400);
      expect(error.metadata).toMatchObject({ channel: "stream:create", issues: [{ path: "targetFps" }] });
    });

    it("rejects a capture area outside the source's monitors", async () => {
      const offscreen = failure(
        await router.dispatch("stream:create", { region: { x: 10000, y: 0, width: 100, height: 100 } })
      );
      const missing = failure(await router.dispatch("stream:create", { monitor: 7 }));

      expect(offscreen).toMatchObject({ code: "INVALID_CONFIG", statusCode: 400 });
      expect(missing).toMatchObject({ code: "INVALID_CONFIG", message: "Monitor 7 not available" });
      expect(await router.dispatch("stream:list")).toEqual({ success: true, data: [] });
    });

    it("rejects a rate above the configured maximum", async () => {
      const error = failure(await router.dispatch("stream:create", { targetFps: 61 }));

      expect(error).toMatchObject({ code: "INVALID_CONFIG", statusCode: 400 });
    });
  });

  it("rejects malformed stream ids", async () => {
    const error = failure(await router.dispatch("stream:start", { streamId: "abc" }));

    expect(error.code).toBe("VALIDATION_ERROR");
  });

  it("reports unknown stream ids", async () => {
    const error = failure(await router.dispatch("stream:get", { streamId: "stream_0000000000000000" }));

    expect(error).toMatchObject({ code: "STREAM_NOT_FOUND", statusCode: 404 });
  });

  it("runs a stream and serves its frames", async () => {
    const streamId = streamIdOf(await router.dispatch("stream:create", { targetFps: 10, adaptiveQuality: false }));
    const uris: string[] = [];
    const stopped = new Promise<CommandResult>((resolve, reject) => {
      context.getStreamRegistry().onFrame(streamId, (uri) => {
        uris.push(uri);
        if (uris.length === 1) {
          router.dispatch("stream:stop", { streamId }).then(resolve, reject);
        }
      });
    });

    const started = await router.dispatch("stream:start", { streamId });
    expect(started).toMatchObject({ success: true, data: { id: streamId, state: "running" } });

    expect(await stopped).toEqual({ success: true, data: { streamId, state: "stopped" } });

    const resource = await router.dispatch("resource:get", { uri: uris[0] });
    expect(resource).toEqual({
      success: true,
      data: {
        uri: uris[0],
        mimeType: "image/jpeg",
        streamId,
        width: 4,
        height: 2,
        timestamp: expect.any(Number),
        size: 11,
        encoding: "base64",
        data: Buffer.from("frame-1-q75").toString("base64"),
      },
    });

    const binary = await router.dispatch("resource:get", { uri: uris[0], encoding: "binary" });
    expect(binary).toMatchObject({ success: true, data: { encoding: "binary", data: Buffer.from("frame-1-q75") } });
    expect(context.getResourceCache().stats()).toMatchObject({ hits: 2, misses: 0 });
  });

  it("treats a repeated stop as success and forgets the stream", async () => {
    const streamId = streamIdOf(await router.dispatch("stream:create", {}));

    expect((await router.dispatch("stream:stop", { streamId })).success).toBe(true);
    expect((await router.dispatch("stream:stop", { streamId })).success).toBe(true);
    expect(failure(await router.dispatch("stream:metrics", { streamId })).code).toBe("STREAM_NOT_FOUND");
    expect(failure(await router.dispatch("stream:start", { streamId })).code).toBe("INVALID_STATE");
    expect(await router.dispatch("stream:list")).toEqual({ success: true, data: [] });
  });

  it("returns config and status together", async () => {
    const streamId = streamIdOf(await router.dispatch("stream:create", { preset: "terminal" }));

    expect(await router.dispatch("stream:get", { streamId })).toMatchObject({
      success: true,
      data: {
        config: { id: streamId, targetFps: 5, format: "png", quality: 95 },
        status: { id: streamId, state: "idle", degraded: false, ticks: 0 },
      },
    });
  });

  it("returns an empty metrics snapshot for an idle stream", async () => {
    const streamId = streamIdOf(await router.dispatch("stream:create", {}));

    expect(await router.dispatch("stream:metrics", { streamId })).toMatchObject({
      success: true,
      data: { frameCount: 0, lifetimeFrameCount: 0, currentFps: 0 },
    });
  });

  it("clamps a manual quality override to the stream's bounds", async () => {
    const streamId = streamIdOf(await router.dispatch("stream:create", { maxQuality: 90 }));

    expect(await router.dispatch("stream:set-quality", { streamId, quality: 99 })).toMatchObject({
      success: true,
      data: { quality: 90, maxQuality: 90, lastDirection: "up", lastDelta: 15 },
    });
    expect(failure(await router.dispatch("stream:set-quality", { streamId, quality: 101 })).code).toBe(
      "VALIDATION_ERROR"
    );
  });

  it("reports evicted or unknown resources as not found", async () => {
    const error = failure(await router.dispatch("resource:get", { uri: "screen://capture/999-deadbeef" }));

    expect(error).toMatchObject({ code: "NOT_FOUND", statusCode: 404 });
    expect(context.getResourceCache().stats().misses).toBe(1);
    expect(failure(await router.dispatch("resource:get", { uri: "file:///tmp/frame.jpg" })).code).toBe(
      "VALIDATION_ERROR"
    );
  });

  it("lists presets with their clamped rate and cache recommendation", async () => {
    const result = await router.dispatch("presets:list");

    expect(result.success).toBe(true);
    expect(result).toMatchObject({
      data: expect.arrayContaining([
        expect.objectContaining({ name: "quality", targetFps: 10, recommendedCacheSize: 30 }),
        expect.objectContaining({ name: "extreme", targetFps: 60, recommendedCacheSize: 120 }),
        expect.objectContaining({ name: "shooter", targetFps: 60, description: "Based on performance" }),
      ]),
    });
  });

  it("reports server statistics", async () => {
    await router.dispatch("stream:create", {});
    await router.dispatch("stream:create", {});

    expect(await router.dispatch("server:stats")).toMatchObject({
      success: true,
      data: {
        activeStreams: 2,
        cache: { entries: 0, maxEntries: 60 },
        metrics: { framesProduced: 0 },
      },
    });
  });
});

describe("CommandRouter", () => {
  it("wraps unexpected errors as internal errors", async () => {
    const router = new CommandRouter();
    router.handleNoArgs("server:crash", () => {
      throw new TypeError("boom");
    });

    expect(failure(await router.dispatch("server:crash"))).toEqual({
      name: "TypeError",
      message: "boom",
      code: "INTERNAL_ERROR",
      statusCode: 500,
    });
  });

  it("passes application errors through", async () => {
    const router = new CommandRouter();
    router.handleNoArgs("stream:broken", async () => {
      throw new InvalidConfigError("bad rate", undefined, { targetFps: 0 });
    });

    expect(failure(await router.dispatch("stream:broken"))).toMatchObject({
      name: "InvalidConfigError",
      code: "INVALID_CONFIG",
      metadata: { targetFps: 0 },
    });
  });

  it("replaces a handler registered twice", async () => {
    const router = new CommandRouter();
    router.handleNoArgs("server:ping", () => "first");
    router.handleNoArgs("server:ping", () => "second");

    expect(await router.dispatch("server:ping")).toEqual({ success: true, data: "second" });
  });

  it("forgets every handler on removeAll", async () => {
    const router = new CommandRouter();
    router.handleNoArgs("server:ping", () => "pong");
    router.removeAll();

    expect(router.has("server:ping")).toBe(false);
  });
});

describe("serializeError", () => {
  it("handles thrown non-errors", () => {
    expect(serializeError("plain")).toEqual({
      name: "Error",
      message: "plain",
      code: "INTERNAL_ERROR",
      statusCode: 500,
    });
  });
});
