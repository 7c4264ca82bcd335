import type { ScriptRecord } from "./Types.js";

/**
 * Write to the dependency index.
 * Used by: Index Builder
 */
export interface DbWriter {
  /**
   * Add script records in a single transaction.
   * A record becomes reachable from each of its targets.
   * Script ids are unique across the index.
   */
  addScripts(records: ScriptRecord[]): void;
}
