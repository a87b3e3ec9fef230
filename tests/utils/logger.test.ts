import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { configureLogger, formatLogLine, isLogLevel, logger } from "../../engine/utils/logger";

describe("formatLogLine", () => {
  it("formats a bare message", () => {
    expect(formatLogLine("INFO", "Stream started", undefined, "2024-01-01T00:00:00.000Z")).toBe(
      "[2024-01-01T00:00:00.000Z] [INFO] Stream started\n"
    );
  });

  it("appends data as indented JSON", () => {
    expect(formatLogLine("WARN", "Frame failed", { streamId: "s" }, "2024-01-01T00:00:00.000Z")).toBe(
      '[2024-01-01T00:00:00.000Z] [WARN] Frame failed\n{\n  "streamId": "s"\n}\n'
    );
  });
});

describe("isLogLevel", () => {
  it("accepts the known levels only", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("silent")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel("constructor")).toBe(false);
  });
});

describe("logger", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "framecast-logs-"));
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    configureLogger({ level: "silent", directory: null });
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("writes entries at or above the level to a daily file", () => {
    configureLogger({ level: "warn", directory: dir });

    logger.info("ignored");
    logger.warn("slow consumer", { uri: "screen://capture/1-abcd1234" });
    logger.error("encoder crashed");

    const today = new Date().toISOString().split("T")[0];
    const file = path.join(dir, `framecast-${today}.log`);
    expect(logger.getLogFilePath()).toBe(file);

    const content = fs.readFileSync(file, "utf8");
    expect(content).not.toContain("ignored");
    expect(content).toContain('[WARN] slow consumer\n{\n  "uri": "screen://capture/1-abcd1234"\n}\n');
    expect(logger.getRecentLogs(1)).toMatch(/\[ERROR\] encoder crashed$/);
    expect(console.warn).toHaveBeenCalledTimes(1);
    expect(console.error).toHaveBeenCalledTimes(1);
    expect(console.log).not.toHaveBeenCalled();
  });

  it("logs to the console only without a directory", () => {
    configureLogger({ level: "debug", directory: null });

    logger.debug("tick");

    expect(logger.getLevel()).toBe("debug");
    expect(logger.getLogFilePath()).toBeNull();
    expect(logger.getRecentLogs()).toBe("No logs available yet.");
    expect(console.log).toHaveBeenCalledWith("[DEBUG] tick", "");
  });

  it("prunes old log files beyond the retention count", () => {
    for (let day = 1; day <= 9; day++) {
      const file = path.join(dir, `framecast-2020-01-0${day}.log`);
      fs.writeFileSync(file, "old\n");
      const mtime = new Date(2020, 0, day);
      fs.utimesSync(file, mtime, mtime);
    }

    configureLogger({ directory: dir });

    const remaining = fs.readdirSync(dir).sort();
    expect(remaining).toHaveLength(7);
    expect(remaining[0]).toBe("framecast-2020-01-03.log");
  });
});
