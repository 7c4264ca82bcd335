import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { ScriptTargetPair } from "../db/Types.js";
import type { LineageRecord } from "../query/shared/LineageRecord.js";
import { tableKey } from "../tables/TableRef.js";
import { formatCsv, parseCsv } from "./csv.js";
import {
  fromLineageRows,
  type LineageTableOptions,
  toLineageRows,
} from "./lineageRows.js";

export const MAPPING_HEADER = ["script name", "target table"] as const;

const writeCsvFile = async (
  path: string,
  rows: readonly (readonly string[])[],
): Promise<void> => {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, formatCsv(rows), "utf-8");
};

/**
 * Write lineage records as a CSV lineage table, creating parent directories.
 */
export const writeLineageTable = async (
  path: string,
  records: readonly LineageRecord[],
  options: LineageTableOptions = {},
): Promise<void> => {
  await writeCsvFile(path, toLineageRows(records, options));
};

/**
 * Read a CSV lineage table.
 *
 * @throws LineageTableError when the table breaks the column contract
 */
export const readLineageTable = async (
  path: string,
  options: LineageTableOptions = {},
): Promise<LineageRecord[]> => {
  const text = await readFile(path, "utf-8");
  return fromLineageRows(parseCsv(text), options);
};

/**
 * Write the script→target mapping, one row per (script, target) pair.
 */
export const writeScriptTargetMapping = async (
  path: string,
  mapping: readonly ScriptTargetPair[],
): Promise<void> => {
  await writeCsvFile(path, [
    MAPPING_HEADER,
    ...mapping.map(({ scriptId, target }) => [scriptId, tableKey(target)]),
  ]);
};
