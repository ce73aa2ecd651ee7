/**
 * Platform-aware path handling for celsheet
 *
 * Supports:
 * - macOS: ~/Library/{Logs,Application Support}/Celsheet
 * - Windows: %LOCALAPPDATA%\Celsheet\Logs and %APPDATA%\Celsheet
 * - Linux: XDG Base Directory Specification
 *   https://specifications.freedesktop.org/basedir-spec/basedir-spec-latest.html
 */
import { homedir } from "node:os";
import { join } from "node:path";
import { mkdirSync } from "node:fs";

// ============================================================================
// XDG Base Directory helpers (Linux only)
// ============================================================================

export function getXdgStateHome(): string {
  return process.env.XDG_STATE_HOME?.trim() || join(homedir(), ".local", "state");
}

export function getXdgConfigHome(): string {
  return process.env.XDG_CONFIG_HOME?.trim() || join(homedir(), ".config");
}

// ============================================================================
// Cross-platform directory resolution
// ============================================================================

/**
 * Central logging directory.
 * Can be overridden via CELSHEET_LOG_DIR environment variable.
 *
 * Paths:
 * - macOS: ~/Library/Logs/Celsheet
 * - Windows: %LOCALAPPDATA%\Celsheet\Logs
 * - Linux: $XDG_STATE_HOME/celsheet/logs (~/.local/state/celsheet/logs)
 */
export function getLogDir(platform: NodeJS.Platform = process.platform): string {
  const override = process.env.CELSHEET_LOG_DIR?.trim();
  if (override) return override;

  if (platform === "darwin") {
    return join(homedir(), "Library", "Logs", "Celsheet");
  }

  if (platform === "win32") {
    const localAppData = process.env.LOCALAPPDATA || join(homedir(), "AppData", "Local");
    return join(localAppData, "Celsheet", "Logs");
  }

  return join(getXdgStateHome(), "celsheet", "logs");
}

/**
 * Configuration directory for user settings.
 * Can be overridden via CELSHEET_CONFIG_DIR environment variable.
 *
 * Paths:
 * - macOS: ~/Library/Application Support/Celsheet
 * - Windows: %APPDATA%\Celsheet
 * - Linux: $XDG_CONFIG_HOME/celsheet (~/.config/celsheet)
 */
export function getConfigDir(platform: NodeJS.Platform = process.platform): string {
  const override = process.env.CELSHEET_CONFIG_DIR?.trim();
  if (override) return override;

  if (platform === "darwin") {
    return join(homedir(), "Library", "Application Support", "Celsheet");
  }

  if (platform === "win32") {
    const appData = process.env.APPDATA || join(homedir(), "AppData", "Roaming");
    return join(appData, "Celsheet");
  }

  return join(getXdgConfigHome(), "celsheet");
}

// ============================================================================
// Utility functions
// ============================================================================

/**
 * Ensure the log directory exists, creating it if necessary.
 */
export function ensureLogDir(): string {
  const dir = getLogDir();
  mkdirSync(dir, { recursive: true });
  return dir;
}

/**
 * Get the path to a dated rolling log file (YYYY-MM-DD format).
 */
export function getRollingLogPath(now: Date = new Date()): string {
  const date = now.toISOString().slice(0, 10); // YYYY-MM-DD
  return join(ensureLogDir(), `celsheet-${date}.log`);
}
