/**
 * WinProv Engine — Thrown Errors
 *
 * The fetcher and the existence check report failures as typed results.
 * The remaining helpers fail loudly with these.
 */

import type { ErrorCategory } from "./types";

export class WinProvError extends Error {
  readonly category: ErrorCategory;
  readonly details?: Record<string, unknown>;

  constructor(
    category: ErrorCategory,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "WinProvError";
    this.category = category;
    this.details = details;
  }
}

export class ConfigInstallError extends WinProvError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("CONFIG_INSTALL_ERROR", message, details);
    this.name = "ConfigInstallError";
  }
}

export class MetadataError extends WinProvError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("METADATA_ERROR", message, details);
    this.name = "MetadataError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
