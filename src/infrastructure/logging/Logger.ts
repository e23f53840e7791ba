import fs from "fs";
import path from "path";

import { config } from "@config/index";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerPort {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void;
  event?(type: string, payload: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

const threshold: number = isLogLevel(config.observability.logLevel)
  ? LEVEL_ORDER[config.observability.logLevel]
  : LEVEL_ORDER.info;

const logDir = path.join(process.cwd(), "logs");
const logFile = path.join(logDir, "app.log");

function ensureLogDir(): void {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
}

function writeEntry(level: LogLevel, entry: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < threshold) {
    return;
  }

  if (level === "error") {
    console.error(entry);
  } else {
    console.log(entry);
  }

  if (!config.observability.logToFile) {
    return;
  }

  try {
    ensureLogDir();
    fs.appendFileSync(logFile, JSON.stringify(entry) + "\n", {
      encoding: "utf-8",
    });
  } catch (err) {
    console.error("❌ Failed to write log file:", err);
  }
}

/**
 * Structured JSON logger.
 *
 * - log(): `{ timestamp, level, message, ...meta }`
 * - event(): `{ timestamp, type, ...payload }`, recorded at info level
 *
 * Entries go to the console and, unless LOG_TO_FILE=false, to logs/app.log.
 */
export const logger: LoggerPort = {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    writeEntry(level, {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(meta || {}),
    });
  },

  event(type: string, payload: Record<string, unknown>): void {
    writeEntry("info", {
      timestamp: new Date().toISOString(),
      type,
      ...payload,
    });
  },
};

export function logEvent(type: string, payload: Record<string, unknown>): void {
  if (typeof logger.event === "function") {
    logger.event(type, payload);
    return;
  }

  logger.log("info", type, payload);
}
