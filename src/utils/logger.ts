import { existsSync, mkdirSync } from "fs";
import { appendFile } from "fs/promises";
import { dirname } from "path";
import chalk, { type ChalkInstance } from "chalk";
import type { MultiBar } from "cli-progress";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LoggerConfig {
  logToConsole: boolean;
  logToFile: boolean;
  logFilePath?: string;
  consoleLogLevel: LogLevel;
  fileLogLevel: LogLevel;
  multibar?: MultiBar | null;
}

const defaultConfig: LoggerConfig = {
  logToConsole: true,
  logToFile: false,
  consoleLogLevel: "info",
  fileLogLevel: "debug",
  multibar: null,
};

let currentConfig: LoggerConfig = { ...defaultConfig };

// File writes are chained so lines land in the order they were logged.
let pendingWrite: Promise<void> = Promise.resolve();

/**
 * Configure the logger. Unspecified fields keep their current value.
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  currentConfig = { ...currentConfig, ...config };

  if (currentConfig.logToFile && currentConfig.logFilePath) {
    const logDir = dirname(currentConfig.logFilePath);
    if (logDir && !existsSync(logDir)) {
      try {
        mkdirSync(logDir, { recursive: true });
      } catch (error) {
        console.error(`Failed to create log directory: ${error}`);
        currentConfig.logToFile = false;
      }
    }
  }
}

/**
 * Sets or clears the MultiBar that console output must go through
 * while a progress bar is on screen.
 */
export function setActiveMultibar(multibar: MultiBar | null): void {
  currentConfig.multibar = multibar;
}

export function isLogLevel(value: string): value is LogLevel {
  const levels: readonly string[] = LOG_LEVELS;
  return levels.includes(value);
}

const logLevelValue: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function shouldLog(level: LogLevel, target: "console" | "file"): boolean {
  if (target === "console" && !currentConfig.logToConsole) return false;
  if (
    target === "file" &&
    (!currentConfig.logToFile || !currentConfig.logFilePath)
  ) {
    return false;
  }
  const threshold =
    target === "console"
      ? currentConfig.consoleLogLevel
      : currentConfig.fileLogLevel;
  return logLevelValue[level] >= logLevelValue[threshold];
}

function formatLogMessage(level: LogLevel, message: string): string {
  const timestamp = new Date().toISOString();
  return `[${timestamp}] [${level.toUpperCase()}] ${message}`;
}

function writeConsole(level: LogLevel, coloredMessage: string): void {
  let messageForConsole = coloredMessage;
  if (currentConfig.multibar && currentConfig.logToFile && level === "error") {
    messageForConsole += chalk.gray(" (See log file for full details)");
  }

  if (currentConfig.multibar) {
    currentConfig.multibar.log(`${messageForConsole}\n`);
    return;
  }
  switch (level) {
    case "debug":
      console.debug(messageForConsole);
      break;
    case "info":
      console.info(messageForConsole);
      break;
    case "warn":
      console.warn(messageForConsole);
      break;
    case "error":
      console.error(messageForConsole);
      break;
  }
}

function writeFile(formattedMessage: string, context?: string): void {
  const filePath = currentConfig.logFilePath;
  if (!filePath) return;

  let messageToWrite = formattedMessage;
  if (context) {
    messageToWrite += `\n  Context: ${context}`;
  }
  pendingWrite = pendingWrite.then(() =>
    appendFile(filePath, messageToWrite + "\n").catch((error: unknown) => {
      console.error(`[Logger Error] Failed to write to log file: ${error}`);
    })
  );
}

function emit(
  level: LogLevel,
  color: ChalkInstance,
  message: string,
  context?: string
): void {
  const toConsole = shouldLog(level, "console");
  const toFile = shouldLog(level, "file");
  if (!toConsole && !toFile) return;

  const formattedMessage = formatLogMessage(level, message);
  if (toConsole) writeConsole(level, color(formattedMessage));
  if (toFile) writeFile(formattedMessage, context);
}

/**
 * Resolves once every queued log-file line has been written.
 */
export function flushLogs(): Promise<void> {
  return pendingWrite;
}

export function debug(message: string, context?: string): void {
  emit("debug", chalk.gray, message, context);
}

export function info(message: string, context?: string): void {
  emit("info", chalk.blue, message, context);
}

export function warn(message: string, context?: string): void {
  emit("warn", chalk.yellow, message, context);
}

export function error(message: string, context?: string): void {
  emit("error", chalk.red, message, context);
}

/** Info-level message printed in green. */
export function success(message: string, context?: string): void {
  emit("info", chalk.green, message, context);
}
