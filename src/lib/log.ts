/**
 * Debug logging utility for celsheet
 *
 * Logs are written to the platform state directory.
 * Default: ~/.local/state/celsheet/logs/celsheet-YYYY-MM-DD.log
 * Override: CELSHEET_LOG_DIR environment variable
 *
 * Nothing is written until initLog() runs, so library callers never touch disk.
 */
import { appendFileSync, writeFileSync, existsSync } from "node:fs";
import { getRollingLogPath } from "./paths.js";

/** Categories recorded when verbose mode is off */
const ESSENTIAL_CATEGORIES = new Set(["main", "generate", "error"]);

let initialized = false;
let currentLogFile: string | null = null;
let isVerbose = false;

/**
 * Set verbose logging mode. When true, all logs are recorded.
 * When false, only main, generate, and error categories are recorded.
 */
export function setVerbose(verbose: boolean): void {
  isVerbose = verbose;
}

/**
 * Initialize the log file. Call with reset=true to clear existing logs.
 * Returns false, and leaves logging off, when the log file cannot be written.
 */
export function initLog(reset: boolean = false): boolean {
  try {
    currentLogFile = getRollingLogPath();

    if (reset || !existsSync(currentLogFile)) {
      writeFileSync(
        currentLogFile,
        `=== Celsheet Log Started: ${new Date().toISOString()} ===\n` +
        `=== Log Location: ${currentLogFile} ===\n`
      );
    } else {
      appendFileSync(
        currentLogFile,
        `\n=== Celsheet Session Resumed: ${new Date().toISOString()} ===\n`
      );
    }
  } catch {
    closeLog();
    return false;
  }
  initialized = true;
  return true;
}

/**
 * Stop writing log lines. Used by tests and by embedders that called initLog().
 */
export function closeLog(): void {
  initialized = false;
  currentLogFile = null;
  isVerbose = false;
}

/**
 * Log a message with timestamp
 */
export function log(category: string, message: string, data?: unknown): void {
  if (!initialized || currentLogFile === null) {
    return;
  }
  if (!isVerbose && !ESSENTIAL_CATEGORIES.has(category)) {
    return;
  }

  const timestamp = new Date().toISOString();
  let line = `[${timestamp}] [${category}] ${message}`;
  if (data !== undefined) {
    try {
      line += ` ${JSON.stringify(data)}`;
    } catch {
      line += ` [unstringifiable data]`;
    }
  }

  try {
    // Check if date rolled over (new day = new log file)
    const newLogFile = getRollingLogPath();
    if (currentLogFile !== newLogFile) {
      currentLogFile = newLogFile;
      appendFileSync(
        currentLogFile,
        `\n=== Celsheet Log Continued: ${new Date().toISOString()} ===\n`
      );
    }
    appendFileSync(currentLogFile, line + "\n");
  } catch {
    // Log dir went away or became read-only: stop logging, keep running
    initialized = false;
  }
}

/**
 * Get the current log file path (for external monitoring tools)
 */
export function getCurrentLogPath(): string {
  return currentLogFile || getRollingLogPath();
}
