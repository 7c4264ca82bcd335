import { basename, dirname, extname, join } from "node:path";
import type { ResolvedLineageConfig } from "../config/Config.schemas.js";
import {
  readLineageTable,
  writeLineageTable,
} from "../lineage-table/lineageTableFiles.js";
import type { LineageLogger } from "../logging/LineageLogger.js";
import { expandLayers } from "../query/expand-layers/expandLayers.js";
import type { LineageRecord } from "../query/shared/LineageRecord.js";

/**
 * Default output path: "<input stem>_expanded.csv" beside the input.
 *
 * @example
 * defaultExpandedPath("out/lineage.csv") // "out/lineage_expanded.csv"
 */
export const defaultExpandedPath = (input: string): string =>
  join(dirname(input), `${basename(input, extname(input))}_expanded.csv`);

export interface ExpandRun {
  output: string;
  records: LineageRecord[];
  promoted: number;
}

/**
 * Read a lineage table, promote its layer-only tables to target rows and
 * write the expanded table.
 */
export const runExpand = async (
  input: string,
  output: string | undefined,
  config: ResolvedLineageConfig,
  logger: LineageLogger,
): Promise<ExpandRun> => {
  const options = {
    layerDelimiter: config.layerDelimiter,
    caseSensitive: config.caseSensitive,
  };
  const outputPath = output ?? defaultExpandedPath(input);

  const original = await readLineageTable(input, options);
  const records = expandLayers(original);
  await writeLineageTable(outputPath, records, options);

  const promoted = records.length - original.length;
  logger.success(`Promoted ${promoted} tables to ${outputPath}`);

  return { output: outputPath, records, promoted };
};
