/**
 * Logging infrastructure for the brief agent
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { LoggingConfig } from "../config/types.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Logger handle passed into each component
 */
export interface BriefLogger {
  debug: (message: string, data?: Record<string, unknown>) => void;
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
  step: (index: number, total: number, description: string) => void;
  flush: () => Promise<void>;
}

/**
 * Format a log message for console output
 */
function formatConsoleMessage(
  level: LogLevel,
  message: string,
  data?: Record<string, unknown>,
  config?: LoggingConfig,
): string {
  const parts: string[] = [];

  if (config?.timestamps ?? true) {
    parts.push(`[${new Date().toISOString()}]`);
  }

  parts.push(`[${level.toUpperCase().padEnd(5)}]`);
  parts.push(message);

  if (data && Object.keys(data).length > 0) {
    parts.push(JSON.stringify(data));
  }

  return parts.join(" ");
}

/**
 * Format a log entry as JSON
 */
function formatJsonLog(
  level: LogLevel,
  message: string,
  sessionId: string,
  data?: Record<string, unknown>,
): string {
  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    sessionId,
    message,
    ...data,
  });
}

/**
 * Resolve a configured log directory, expanding a leading ~
 */
export function resolveLogDir(logDir: string): string {
  if (logDir === "~" || logDir.startsWith("~/")) {
    return path.join(os.homedir(), logDir.slice(1));
  }
  return logDir;
}

/**
 * Create a logger for a CLI session, server process or test
 */
export function createLogger(
  sessionId: string,
  config: LoggingConfig,
  options?: {
    quiet?: boolean;
    verbose?: boolean;
  },
): BriefLogger {
  const logBuffer: string[] = [];
  const effectiveLevel: LogLevel = options?.verbose ? "debug" : config.level;
  const shouldLog = (level: LogLevel): boolean =>
    LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[effectiveLevel];

  const log = (level: LogLevel, message: string, data?: Record<string, unknown>): void => {
    if (!shouldLog(level)) return;

    const formattedLine = config.jsonLogs
      ? formatJsonLog(level, message, sessionId, data)
      : formatConsoleMessage(level, message, data, config);

    // Buffer for file writing
    if (config.logDir) {
      logBuffer.push(formattedLine);
    }

    if (!options?.quiet) {
      const output = level === "error" || level === "warn" ? console.error : console.log;
      output(formattedLine);
    }
  };

  return {
    debug: (message, data) => log("debug", message, data),
    info: (message, data) => log("info", message, data),
    warn: (message, data) => log("warn", message, data),
    error: (message, data) => log("error", message, data),

    step: (index, total, description) => {
      log("info", `Executing step ${index}/${total}: ${description}`);
    },

    flush: async () => {
      if (!config.logDir || logBuffer.length === 0) return;

      const logDir = resolveLogDir(config.logDir);
      await fs.mkdir(logDir, { recursive: true });

      const logFile = path.join(logDir, `${sessionId}.log`);
      const lines = logBuffer.splice(0, logBuffer.length);
      await fs.appendFile(logFile, lines.join("\n") + "\n");
    },
  };
}
