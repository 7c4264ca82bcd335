import type Database from "better-sqlite3";
import type { TableRef } from "../../tables/TableRef.js";
import type { DbWriter } from "../DbWriter.js";
import type { ScriptRecord } from "../Types.js";

interface TableRow {
  scriptId: string;
  database: string;
  tableName: string;
}

const toRow = (scriptId: string, ref: TableRef): TableRow => ({
  scriptId,
  database: ref.database ?? "",
  tableName: ref.table,
});

/**
 * Create a DbWriter implementation backed by SQLite.
 *
 * @param db - better-sqlite3 database instance
 * @returns DbWriter implementation
 */
export const createSqliteWriter = (db: Database.Database): DbWriter => {
  const insertScriptStmt = db.prepare(
    "INSERT INTO scripts (script_id, kind) VALUES (@scriptId, @kind)",
  );
  const insertTargetStmt = db.prepare(`
    INSERT OR IGNORE INTO script_targets (script_id, database, table_name)
    VALUES (@scriptId, @database, @tableName)
  `);
  const insertSourceStmt = db.prepare(`
    INSERT OR IGNORE INTO script_sources (script_id, database, table_name)
    VALUES (@scriptId, @database, @tableName)
  `);

  // Transaction wrapper: one write for the whole corpus
  const addScriptsTransaction = db.transaction((records: ScriptRecord[]) => {
    for (const record of records) {
      insertScriptStmt.run({ scriptId: record.scriptId, kind: record.kind });
      for (const target of record.targets) {
        insertTargetStmt.run(toRow(record.scriptId, target));
      }
      for (const source of record.sources) {
        insertSourceStmt.run(toRow(record.scriptId, source));
      }
    }
  });

  return {
    addScripts(records: ScriptRecord[]): void {
      addScriptsTransaction(records);
    },
  };
};
