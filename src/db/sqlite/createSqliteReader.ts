import type Database from "better-sqlite3";
import { SCRIPT_KINDS, type ScriptKind } from "../../extraction/ScriptKind.js";
import {
  compareTableRefs,
  type TableRef,
  toSortedSet,
} from "../../tables/TableRef.js";
import type { DbReader } from "../DbReader.js";
import type { ScriptRecord, ScriptTargetPair } from "../Types.js";

/**
 * Raw script row from SQLite.
 */
interface ScriptRow {
  script_id: string;
  kind: string;
}

/**
 * Raw table row from SQLite ('' database = partial ref).
 */
interface TableRow {
  database: string;
  table_name: string;
}

interface ScriptTargetRow extends TableRow {
  script_id: string;
}

const rowToTableRef = (row: TableRow): TableRef =>
  row.database === ""
    ? { table: row.table_name }
    : { database: row.database, table: row.table_name };

const isScriptKind = (value: string): value is ScriptKind =>
  SCRIPT_KINDS.some((kind) => kind === value);

/**
 * Create a DbReader implementation backed by SQLite.
 *
 * @example
 * const reader = createSqliteReader(db);
 * const producers = reader.producersOf({ database: "mart", table: "sales" });
 */
export const createSqliteReader = (db: Database.Database): DbReader => {
  const producersStmt = db.prepare<[string, string], ScriptRow>(`
    SELECT s.script_id, s.kind FROM scripts s
    JOIN script_targets t ON t.script_id = s.script_id
    WHERE t.database = ? AND t.table_name = ?
    ORDER BY s.seq
  `);
  const targetsOfStmt = db.prepare<[string], TableRow>(
    "SELECT database, table_name FROM script_targets WHERE script_id = ?",
  );
  const sourcesOfStmt = db.prepare<[string], TableRow>(
    "SELECT database, table_name FROM script_sources WHERE script_id = ?",
  );
  const targetsNamedStmt = db.prepare<[string], TableRow>(`
    SELECT DISTINCT database, table_name FROM script_targets
    WHERE table_name = ?
  `);
  const allTargetsStmt = db.prepare<[], TableRow>(
    "SELECT DISTINCT database, table_name FROM script_targets",
  );
  const scriptTargetsStmt = db.prepare<[], ScriptTargetRow>(
    "SELECT script_id, database, table_name FROM script_targets",
  );

  const rowToRecord = (row: ScriptRow): ScriptRecord => {
    if (!isScriptKind(row.kind)) {
      throw new Error(`Unknown script kind '${row.kind}' for ${row.script_id}`);
    }
    return {
      scriptId: row.script_id,
      kind: row.kind,
      targets: toSortedSet(targetsOfStmt.all(row.script_id).map(rowToTableRef)),
      sources: toSortedSet(sourcesOfStmt.all(row.script_id).map(rowToTableRef)),
    };
  };

  return {
    producersOf(ref: TableRef): ScriptRecord[] {
      return producersStmt.all(ref.database ?? "", ref.table).map(rowToRecord);
    },

    targetsNamed(table: string): TableRef[] {
      return toSortedSet(targetsNamedStmt.all(table).map(rowToTableRef));
    },

    listTargets(): TableRef[] {
      return toSortedSet(allTargetsStmt.all().map(rowToTableRef));
    },

    listScriptTargets(): ScriptTargetPair[] {
      return scriptTargetsStmt
        .all()
        .map((row) => ({ scriptId: row.script_id, target: rowToTableRef(row) }))
        .sort((a, b) => {
          if (a.scriptId !== b.scriptId) {
            return a.scriptId < b.scriptId ? -1 : 1;
          }
          return compareTableRefs(a.target, b.target);
        });
    },
  };
};
