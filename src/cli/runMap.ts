import type { ResolvedLineageConfig } from "../config/Config.schemas.js";
import {
  closeDatabase,
  openDatabase,
} from "../db/sqlite/sqliteConnection.utils.js";
import { writeScriptTargetMapping } from "../lineage-table/lineageTableFiles.js";
import type { LineageLogger } from "../logging/LineageLogger.js";
import { type BuiltIndex, buildIndex } from "./buildIndex.js";

/**
 * Scan the corpus and write the script→target mapping only.
 */
export const runMap = async (
  config: ResolvedLineageConfig,
  logger: LineageLogger,
): Promise<BuiltIndex> => {
  const db = openDatabase();
  try {
    const built = await buildIndex(db, config, logger);
    await writeScriptTargetMapping(config.output.mapping, built.result.mapping);
    logger.success(
      `Wrote ${built.result.mapping.length} mapping rows to ${config.output.mapping}`,
    );
    return built;
  } finally {
    closeDatabase(db);
  }
};
