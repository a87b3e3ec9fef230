/**
 * Logger
 *
 * Console logger with optional daily log files.
 * File output is enabled by FRAMECAST_LOG_DIR (or configureLogger) and
 * rotates at 5MB, keeping the most recent 7 files.
 */

import * as fs from "fs";
import * as path from "path";
import { getErrorMessage } from "../core/app-error";

const MAX_LOG_SIZE = 5 * 1024 * 1024; // 5MB
const MAX_LOG_FILES = 7; // Keep 7 days of logs
const LOG_FILE_PREFIX = "framecast-";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function parseLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return normalized && isLogLevel(normalized) ? normalized : "info";
}

let minLevel: LogLevel = parseLevel(process.env.FRAMECAST_LOG_LEVEL);
let logDir: string | null = process.env.FRAMECAST_LOG_DIR || null;

/**
 * Get log file path for today
 */
function getLogFilePath(): string | null {
  if (!logDir) return null;
  const today = new Date().toISOString().split("T")[0];
  return path.join(logDir, `${LOG_FILE_PREFIX}${today}.log`);
}

function ensureLogDir(dir: string): boolean {
  try {
    fs.mkdirSync(dir, { recursive: true });
    return true;
  } catch (error) {
    console.error("Failed to create log directory:", error);
    return false;
  }
}

/**
 * Clean up old log files
 */
function cleanupOldLogs(): void {
  if (!logDir) return;
  const dir = logDir;
  try {
    const logFiles = fs
      .readdirSync(dir)
      .filter((f) => f.startsWith(LOG_FILE_PREFIX) && f.endsWith(".log"))
      .map((f) => ({
        path: path.join(dir, f),
        mtime: fs.statSync(path.join(dir, f)).mtime,
      }))
      .sort((a, b) => b.mtime.getTime() - a.mtime.getTime());

    for (const file of logFiles.slice(MAX_LOG_FILES)) {
      fs.unlinkSync(file.path);
    }
  } catch (error) {
    console.warn("Failed to clean up old logs:", getErrorMessage(error));
  }
}

/**
 * Rotate log file if it's too large
 */
function rotateLogIfNeeded(logFile: string): void {
  if (!fs.existsSync(logFile)) return;
  const stats = fs.statSync(logFile);
  if (stats.size > MAX_LOG_SIZE) {
    const rotatedFile = logFile.replace(".log", `-${Date.now()}.log`);
    fs.renameSync(logFile, rotatedFile);
  }
}

/**
 * Format a log line
 */
export function formatLogLine(
  level: string,
  message: string,
  data?: Record<string, unknown>,
  timestamp: string = new Date().toISOString()
): string {
  return `[${timestamp}] [${level}] ${message}${
    data ? `\n${JSON.stringify(data, null, 2)}` : ""
  }\n`;
}

/**
 * Write log entry to console and, when configured, to file
 */
function writeLog(level: Exclude<LogLevel, "silent">, message: string, data?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) {
    return;
  }

  const label = level.toUpperCase();
  const logFile = getLogFilePath();

  if (logFile) {
    try {
      rotateLogIfNeeded(logFile);
      fs.appendFileSync(logFile, formatLogLine(label, message, data), "utf8");
    } catch (error) {
      console.error("Failed to write log:", error);
    }
  }

  if (level === "error") {
    console.error(`[${label}] ${message}`, data || "");
  } else if (level === "warn") {
    console.warn(`[${label}] ${message}`, data || "");
  } else {
    console.log(`[${label}] ${message}`, data || "");
  }
}

/**
 * Logger utility
 */
export const logger = {
  debug: (message: string, data?: Record<string, unknown>) => writeLog("debug", message, data),
  info: (message: string, data?: Record<string, unknown>) => writeLog("info", message, data),
  warn: (message: string, data?: Record<string, unknown>) => writeLog("warn", message, data),
  error: (message: string, data?: Record<string, unknown>) => writeLog("error", message, data),

  /**
   * Get recent log entries
   */
  getRecentLogs: (lines: number = 100): string => {
    const logFile = getLogFilePath();
    if (!logFile || !fs.existsSync(logFile)) {
      return "No logs available yet.";
    }
    try {
      const content = fs.readFileSync(logFile, "utf8");
      const allLines = content.split("\n").filter((line) => line.trim());
      return allLines.slice(-lines).join("\n");
    } catch (error) {
      return `Error reading logs: ${getErrorMessage(error)}`;
    }
  },

  /**
   * Get log file path
   */
  getLogFilePath: (): string | null => getLogFilePath(),

  getLevel: (): LogLevel => minLevel,
};

/**
 * Reconfigure level and file output at startup
 */
export function configureLogger(options: { level?: LogLevel; directory?: string | null }): void {
  if (options.level) {
    minLevel = options.level;
  }
  if (options.directory !== undefined) {
    logDir = options.directory && ensureLogDir(options.directory) ? options.directory : null;
    cleanupOldLogs();
  }
}

if (logDir && ensureLogDir(logDir)) {
  cleanupOldLogs();
} else {
  logDir = null;
}
