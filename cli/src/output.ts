/**
 * WinProv CLI -- Output Helpers
 *
 * All user-visible output flows through this module. Uses chalk (v4,
 * CommonJS compatible) for ANSI colors and ora for spinners.
 *
 * Values meant for scripts (a region, "true"/"false") are printed bare
 * with console.log; everything else goes through the helpers below.
 */

import chalk from "chalk";
import ora, { type Ora } from "ora";
import type { FetchErrorKind } from "@winprov/engine";

// ─── Force UTF-8 encoding on Windows ───────────────────────
// Legacy console codepages mangle the symbols below.
if (process.platform === "win32") {
  process.stdout.setEncoding?.("utf8");
  process.stderr.setEncoding?.("utf8");
}

// ─── Debug Mode ─────────────────────────────────────────────

let _debugMode = false;

export function setDebugMode(enabled: boolean): void {
  _debugMode = enabled;
}

export function isDebugMode(): boolean {
  return _debugMode;
}

// ─── Color Shortcuts ────────────────────────────────────────

export const colors = {
  success: chalk.green,
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.cyan,
  dim: chalk.gray,
  bold: chalk.bold,
  path: chalk.bold.white,
};

// ─── Symbols (safe for Windows terminals) ───────────────────

export const symbols = {
  success: chalk.green("✔"),
  error: chalk.red("✖"),
  warn: chalk.yellow("⚠"),
  info: chalk.cyan("ℹ"),
};

// ─── Print Helpers ──────────────────────────────────────────

export function printSuccess(msg: string): void {
  console.log(`${symbols.success} ${msg}`);
}

export function printError(msg: string): void {
  console.error(`${symbols.error} ${msg}`);
}

export function printWarn(msg: string): void {
  console.log(`${symbols.warn}  ${msg}`);
}

export function printInfo(msg: string): void {
  console.log(`${symbols.info} ${msg}`);
}

/**
 * Print a debug message. Only visible with --debug.
 */
export function printDebug(msg: string): void {
  if (_debugMode) {
    console.log(colors.dim(`  [debug] ${msg}`));
  }
}

/**
 * Print an indented detail line under a result.
 */
export function printDetail(label: string, value: string): void {
  console.log(`  ${colors.dim(label + ":")} ${value}`);
}

// ─── Spinner ────────────────────────────────────────────────

export function createSpinner(text: string): Ora {
  return ora({ text, color: "cyan", stream: process.stderr });
}

// ─── Error Kind Labels ──────────────────────────────────────

const FETCH_ERROR_LABELS: Record<FetchErrorKind, string> = {
  MISSING_CONFIGURATION: "Artifactory key or host not configured",
  TRANSPORT: "Network failure",
  REMOTE_REJECTED: "Artifactory rejected the request",
  LOCAL_WRITE: "Could not write the output file",
};

export function formatFetchErrorKind(kind: FetchErrorKind): string {
  return FETCH_ERROR_LABELS[kind];
}

// ─── Byte Formatting ────────────────────────────────────────

export function formatBytes(bytes: number): string {
  if (bytes === 0) return "0 B";
  const units = ["B", "KB", "MB", "GB"];
  const i = Math.min(
    Math.floor(Math.log(bytes) / Math.log(1024)),
    units.length - 1,
  );
  return `${(bytes / Math.pow(1024, i)).toFixed(1)} ${units[i]}`;
}

// ─── Duration ───────────────────────────────────────────────

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const mins = Math.floor(ms / 60_000);
  const secs = Math.round((ms % 60_000) / 1000);
  return `${mins}m ${secs}s`;
}
