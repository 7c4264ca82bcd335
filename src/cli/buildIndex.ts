import type Database from "better-sqlite3";
import type { ResolvedLineageConfig } from "../config/Config.schemas.js";
import { CONFIG_FILE_NAME } from "../config/configLoader.utils.js";
import { createSqliteWriter } from "../db/sqlite/createSqliteWriter.js";
import type { Diagnostic, IndexResult } from "../db/Types.js";
import { indexScripts } from "../ingestion/indexScripts.js";
import { loadCorpus } from "../ingestion/loadCorpus.js";
import type { LineageLogger } from "../logging/LineageLogger.js";

export interface BuiltIndex {
  result: IndexResult;
  /** Loader and extractor diagnostics, sorted by script id */
  diagnostics: Diagnostic[];
}

const byScriptId = (a: Diagnostic, b: Diagnostic): number =>
  a.scriptId < b.scriptId ? -1 : a.scriptId > b.scriptId ? 1 : 0;

/**
 * Load the corpus under the configured root and index it into `db`.
 * Every diagnostic is logged as a warning.
 *
 * @throws Error when no root is configured or the root cannot be read
 */
export const buildIndex = async (
  db: Database.Database,
  config: ResolvedLineageConfig,
  logger: LineageLogger,
): Promise<BuiltIndex> => {
  if (config.root === undefined) {
    throw new Error(
      `No script root: pass --root or set "root" in ${CONFIG_FILE_NAME}`,
    );
  }

  const corpus = await loadCorpus(config.root, {
    concurrency: config.concurrency,
    logger,
  });
  const result = indexScripts(corpus.scripts, createSqliteWriter(db), {
    defaultDatabase: config.defaultDatabase,
    caseSensitive: config.caseSensitive,
    sessionNames: config.sessionNames,
  });

  const diagnostics = [...corpus.diagnostics, ...result.diagnostics].sort(
    byScriptId,
  );
  for (const diagnostic of diagnostics) {
    logger.warn(`${diagnostic.scriptId}: ${diagnostic.message}`);
  }

  logger.success(
    `Indexed ${result.scriptsIndexed}/${result.scriptsScanned} scripts, ${result.targetsIndexed} targets in ${result.durationMs}ms`,
  );

  return { result, diagnostics };
};
