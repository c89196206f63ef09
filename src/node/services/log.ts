import * as fs from "fs";
import * as path from "path";
import { getErrorMessage } from "@/common/utils/errors";

/**
 * Process-wide logger for the store.
 *
 * Lines go to the console and, once configureLogFile() is called, are appended
 * to a log file under the store root. Level comes from VELLUM_LOG_LEVEL
 * (error | warn | info | debug); defaults to info, or error under NODE_ENV=test.
 */

export type LogLevel = "error" | "warn" | "info" | "debug";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

let logFilePath: string | null = null;
let levelOverride: LogLevel | null = null;

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === "error" || value === "warn" || value === "info" || value === "debug";
}

function currentLevel(): LogLevel {
  if (levelOverride) {
    return levelOverride;
  }
  const fromEnv = process.env.VELLUM_LOG_LEVEL?.toLowerCase();
  if (isLogLevel(fromEnv)) {
    return fromEnv;
  }
  return process.env.NODE_ENV === "test" ? "error" : "info";
}

function formatDetail(detail: unknown): string {
  if (detail instanceof Error) {
    return detail.stack ?? detail.message;
  }
  if (typeof detail === "string") {
    return detail;
  }
  try {
    return JSON.stringify(detail);
  } catch {
    return getErrorMessage(detail);
  }
}

function formatLine(level: LogLevel, message: string, details: unknown[]): string {
  const suffix = details.length > 0 ? " " + details.map(formatDetail).join(" ") : "";
  return `${new Date().toISOString()} [${level.toUpperCase()}] ${message}${suffix}`;
}

function appendToFile(line: string): void {
  if (!logFilePath) return;
  try {
    fs.appendFileSync(logFilePath, line + "\n", "utf-8");
  } catch (error) {
    // Disable the file sink so a broken log file does not fail every later call.
    const failedPath = logFilePath;
    logFilePath = null;
    console.error(`[log] Disabling log file ${failedPath}: ${getErrorMessage(error)}`);
  }
}

function write(level: LogLevel, message: string, details: unknown[]): void {
  if (LEVEL_PRIORITY[level] > LEVEL_PRIORITY[currentLevel()]) {
    return;
  }
  const line = formatLine(level, message, details);
  switch (level) {
    case "error":
      console.error(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "info":
      console.info(line);
      break;
    case "debug":
      console.debug(line);
      break;
  }
  appendToFile(line);
}

export const log = {
  debug: (message: string, ...details: unknown[]): void => write("debug", message, details),
  info: (message: string, ...details: unknown[]): void => write("info", message, details),
  warn: (message: string, ...details: unknown[]): void => write("warn", message, details),
  error: (message: string, ...details: unknown[]): void => write("error", message, details),
  /** Force a level regardless of VELLUM_LOG_LEVEL; pass null to go back to the env. */
  setLevel: (level: LogLevel | null): void => {
    levelOverride = level;
  },
  getLevel: (): LogLevel => currentLevel(),
};

/**
 * Start appending log lines to `filePath` (created with its directory).
 * Pass null to stop writing to a file.
 */
export function configureLogFile(filePath: string | null): void {
  if (filePath === null) {
    logFilePath = null;
    return;
  }
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    logFilePath = filePath;
  } catch (error) {
    logFilePath = null;
    console.error(`[log] Cannot create log directory for ${filePath}: ${getErrorMessage(error)}`);
  }
}

export function getLogFilePath(): string | null {
  return logFilePath;
}

/** Truncate the active log file, if any. */
export async function clearLogFiles(): Promise<void> {
  if (!logFilePath) return;
  await fs.promises.writeFile(logFilePath, "", "utf-8");
}
