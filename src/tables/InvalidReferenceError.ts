/**
 * Thrown when a raw table name cannot be turned into a table ref.
 */
export class InvalidReferenceError extends Error {
  readonly raw: string;

  constructor(raw: string, reason: string) {
    super(`Invalid table reference '${raw}': ${reason}`);
    this.name = "InvalidReferenceError";
    this.raw = raw;
  }
}
