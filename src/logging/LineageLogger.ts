import type { Diagnostic } from "../db/Types.js";

/** Outcome of a corpus read */
export interface ProgressSummary {
  /** Supported files the scan tried to read */
  filesRead: number;
  /** Files read into scripts */
  scriptsLoaded: number;
  /** Every problem reported while reading */
  diagnostics: readonly Diagnostic[];
}

/**
 * Logging interface for scans, traces and expansions.
 *
 * Handles both progress updates (in-place terminal updates) and simple logs.
 * All output goes to stderr, so CSV written to stdout stays clean.
 *
 * @example
 * ```typescript
 * logger.startProgress(350, "scripts");
 * logger.updateProgress(142);
 * logger.completeProgress({ filesRead: 350, scriptsLoaded: 349, diagnostics });
 *
 * logger.success("Traced 12 targets in 0.4s");
 * logger.warn("views/broken.sql: No CREATE VIEW statement found");
 * ```
 */
export interface LineageLogger {
  /**
   * Start progress tracking.
   * Displays: [lineage] → Reading {label}... 0/{total} files
   */
  startProgress(total: number, label: string): void;

  updateProgress(current: number): void;

  /**
   * Displays: [lineage] ✓ {label}: read {scriptsLoaded} of {filesRead} files (1 ReadError)
   */
  completeProgress(summary: ProgressSummary): void;

  /** Log a success message (green ✓). */
  success(message: string): void;

  /** Log an info message (neutral). */
  info(message: string): void;

  /** Log a warning message (yellow ⚠). */
  warn(message: string): void;

  /** Log an error message (red ✗). */
  error(message: string): void;
}
