import type { ResolvedLineageConfig } from "../config/Config.schemas.js";
import { createSqliteReader } from "../db/sqlite/createSqliteReader.js";
import {
  closeDatabase,
  openDatabase,
} from "../db/sqlite/sqliteConnection.utils.js";
import {
  writeLineageTable,
  writeScriptTargetMapping,
} from "../lineage-table/lineageTableFiles.js";
import type { LineageLogger } from "../logging/LineageLogger.js";
import type { LineageRecord } from "../query/shared/LineageRecord.js";
import { traceTargets } from "../query/trace-lineage/traceLineage.js";
import { InvalidReferenceError } from "../tables/InvalidReferenceError.js";
import { normalizeTableName } from "../tables/normalizeTableName.js";
import { type TableRef, tableKey } from "../tables/TableRef.js";
import { type BuiltIndex, buildIndex } from "./buildIndex.js";

export interface TraceRun extends BuiltIndex {
  records: LineageRecord[];
}

/**
 * Parse requested target names. A malformed name is logged and skipped;
 * the remaining targets are still traced.
 */
const parseTargets = (
  names: readonly string[],
  config: ResolvedLineageConfig,
  logger: LineageLogger,
): TableRef[] => {
  const targets: TableRef[] = [];
  for (const name of names) {
    try {
      targets.push(normalizeTableName(name, config));
    } catch (e) {
      if (!(e instanceof InvalidReferenceError)) {
        throw e;
      }
      logger.error(e.message);
    }
  }
  return targets;
};

const describeRecord = (record: LineageRecord): string[] => {
  const key = tableKey(record.target);
  const notes: string[] = [];
  if (record.truncated) {
    notes.push(`${key}: stopped at the depth limit`);
  }
  if (record.cyclic) {
    notes.push(`${key}: lineage contains a cycle`);
  }
  for (const { reference, candidates } of record.ambiguities) {
    notes.push(
      `${key}: '${tableKey(reference)}' matches ${candidates.map(tableKey).join(", ")}`,
    );
  }
  return notes;
};

/**
 * Scan the corpus, write the script→target mapping, trace the configured
 * targets (every indexed target when none is configured) and write the
 * lineage table.
 */
export const runTrace = async (
  config: ResolvedLineageConfig,
  logger: LineageLogger,
): Promise<TraceRun> => {
  const db = openDatabase();
  try {
    const built = await buildIndex(db, config, logger);
    await writeScriptTargetMapping(config.output.mapping, built.result.mapping);

    const reader = createSqliteReader(db);
    const targets =
      config.targets === undefined
        ? reader.listTargets()
        : parseTargets(config.targets, config, logger);
    const records = traceTargets(reader, targets, {
      maxDepth: config.maxDepth,
    });

    for (const record of records) {
      for (const note of describeRecord(record)) {
        logger.warn(note);
      }
    }

    await writeLineageTable(config.output.lineage, records, {
      layerDelimiter: config.layerDelimiter,
    });
    logger.success(
      `Traced ${records.length} targets to ${config.output.lineage}`,
    );

    return { ...built, records };
  } finally {
    closeDatabase(db);
  }
};
