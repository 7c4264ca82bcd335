import type { TableRef } from "../../tables/TableRef.js";

/**
 * A partial reference that matched more than one indexed table.
 * Every candidate is traced; none is picked silently.
 */
export interface Ambiguity {
  reference: TableRef;
  candidates: TableRef[];
}

/**
 * Layered upstream lineage of one target table.
 *
 * `layers[0]` holds the sources of the target's producers, `layers[1]` the
 * sources of their producers, and so on. Each layer is sorted by key, and a
 * table appears only in the first layer where it was discovered.
 */
export interface LineageRecord {
  target: TableRef;
  layers: TableRef[][];

  /** The trace stopped at the depth limit with tables still to visit */
  truncated: boolean;

  /** The traversed producer graph contains a cycle */
  cyclic: boolean;

  ambiguities: Ambiguity[];
}
