import { InvalidReferenceError } from "./InvalidReferenceError.js";
import type { TableRef } from "./TableRef.js";

export interface NormalizeOptions {
  /** Database applied to bare table names */
  defaultDatabase?: string;
  /** Keep identifier case as written (default: lower-case both parts) */
  caseSensitive?: boolean;
}

const QUOTE_PAIRS: Array<[string, string]> = [
  ["`", "`"],
  ['"', '"'],
  ["[", "]"],
];

const unquote = (part: string): string => {
  const trimmed = part.trim();
  for (const [open, close] of QUOTE_PAIRS) {
    if (
      trimmed.length >= 2 &&
      trimmed.startsWith(open) &&
      trimmed.endsWith(close)
    ) {
      return trimmed.slice(1, -1).trim();
    }
  }
  return trimmed;
};

/**
 * Canonicalize a raw table reference into a table ref.
 * Splits on the first dot: "db.table" → { database: "db", table: "table" }.
 *
 * @throws InvalidReferenceError on an empty name or an empty part ("db.")
 *
 * @example
 * normalizeTableName("RAW.Orders") // { database: "raw", table: "orders" }
 * normalizeTableName("orders", { defaultDatabase: "raw" }) // { database: "raw", table: "orders" }
 */
export const normalizeTableName = (
  raw: string,
  options: NormalizeOptions = {},
): TableRef => {
  const trimmed = raw.trim();
  if (trimmed === "") {
    throw new InvalidReferenceError(raw, "empty name");
  }

  const fold = (value: string): string =>
    options.caseSensitive ? value : value.toLowerCase();

  const dot = trimmed.indexOf(".");
  if (dot === -1) {
    const table = unquote(trimmed);
    if (table === "") {
      throw new InvalidReferenceError(raw, "empty table name");
    }
    const defaultDatabase = options.defaultDatabase?.trim();
    return defaultDatabase
      ? { database: fold(defaultDatabase), table: fold(table) }
      : { table: fold(table) };
  }

  const database = unquote(trimmed.slice(0, dot));
  const table = unquote(trimmed.slice(dot + 1));
  if (database === "") {
    throw new InvalidReferenceError(raw, "empty database name");
  }
  if (table === "") {
    throw new InvalidReferenceError(raw, "empty table name");
  }
  return { database: fold(database), table: fold(table) };
};
