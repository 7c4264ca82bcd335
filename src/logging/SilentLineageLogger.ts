import type { LineageLogger } from "./LineageLogger.js";

/**
 * Silent logger that discards all output.
 * Used in tests and with --quiet.
 */
export const silentLogger: LineageLogger = {
  startProgress(): void {},
  updateProgress(): void {},
  completeProgress(): void {},
  success(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
};
