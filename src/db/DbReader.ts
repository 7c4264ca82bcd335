import type { TableRef } from "../tables/TableRef.js";
import type { ScriptRecord, ScriptTargetPair } from "./Types.js";

/**
 * Read operations for the dependency index.
 * Used by: Bottom-Up Tracer, CLI
 *
 * @example
 * const reader = createSqliteReader(db);
 * const producers = reader.producersOf({ database: "mart", table: "sales" });
 */
export interface DbReader {
  /**
   * Scripts that declare the table as a target, in indexing order.
   * Matches the exact key: a partial ref only matches unqualified targets.
   */
  producersOf(ref: TableRef): ScriptRecord[];

  /**
   * Every indexed target whose table name equals `table`, whatever its
   * database. Used to resolve partial references.
   */
  targetsNamed(table: string): TableRef[];

  /**
   * All distinct indexed targets, sorted by key.
   */
  listTargets(): TableRef[];

  /**
   * One pair per (script, target), sorted by script id then target key.
   */
  listScriptTargets(): ScriptTargetPair[];
}
