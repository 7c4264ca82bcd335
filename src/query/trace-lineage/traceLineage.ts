import type { DbReader } from "../../db/DbReader.js";
import {
  isPartial,
  type TableRef,
  tableKey,
  toSortedSet,
} from "../../tables/TableRef.js";
import { hasCycle } from "../shared/hasCycle.js";
import type { Ambiguity, LineageRecord } from "../shared/LineageRecord.js";

/** Default bound on the number of layers in a trace */
export const DEFAULT_MAX_DEPTH = 100;

export interface TraceOptions {
  /** Maximum number of layers (default: 100) */
  maxDepth?: number;
}

/**
 * Trace the upstream lineage of a table, layer by layer.
 *
 * Breadth-first walk over producers: each layer holds the sources read by
 * the scripts producing the previous layer's tables, minus every table
 * already seen. A partial reference is resolved against all indexed targets
 * with the same table name; several matches are traced together and
 * reported as an ambiguity.
 *
 * Terminates on cyclic indexes: a table is never added twice. The record is
 * flagged `cyclic` when the traversed producer graph has a cycle, and
 * `truncated` when `maxDepth` layers were reached with tables left to visit.
 *
 * @example
 * traceLineage(reader, { database: "mart", table: "sales" })
 * // { target, layers: [[stage.sales_clean], [raw.orders]], truncated: false, ... }
 */
export const traceLineage = (
  reader: DbReader,
  target: TableRef,
  options: TraceOptions = {},
): LineageRecord => {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const ambiguities: Ambiguity[] = [];
  const visited = new Set<string>([tableKey(target)]);
  // key → keys it is derived from, over everything traversed
  const producerGraph = new Map<string, Set<string>>();

  const addEdge = (from: TableRef, to: TableRef): void => {
    const fromKey = tableKey(from);
    const edges = producerGraph.get(fromKey) ?? new Set<string>();
    edges.add(tableKey(to));
    producerGraph.set(fromKey, edges);
  };

  /** Indexed tables standing for `ref`: itself, or a partial ref's matches */
  const resolve = (ref: TableRef): TableRef[] => {
    if (!isPartial(ref)) {
      return [ref];
    }
    const candidates = reader.targetsNamed(ref.table);
    if (candidates.length > 1) {
      ambiguities.push({ reference: ref, candidates });
    }
    for (const candidate of candidates) {
      if (tableKey(candidate) !== tableKey(ref)) {
        addEdge(ref, candidate);
      }
      visited.add(tableKey(candidate));
    }
    return candidates;
  };

  const layers: TableRef[][] = [];
  let frontier: TableRef[] = [target];
  let truncated = false;

  while (frontier.length > 0) {
    const discovered = new Map<string, TableRef>();

    for (const table of frontier) {
      for (const resolved of resolve(table)) {
        for (const script of reader.producersOf(resolved)) {
          for (const source of script.sources) {
            addEdge(resolved, source);
            discovered.set(tableKey(source), source);
          }
        }
      }
    }

    const layer = toSortedSet(
      [...discovered.values()].filter((ref) => !visited.has(tableKey(ref))),
    );
    if (layer.length === 0) {
      break;
    }
    if (layers.length >= maxDepth) {
      truncated = true;
      break;
    }

    for (const ref of layer) {
      visited.add(tableKey(ref));
    }
    layers.push(layer);
    frontier = layer;
  }

  return {
    target,
    layers,
    truncated,
    cyclic: hasCycle(producerGraph),
    ambiguities,
  };
};

/**
 * Trace several targets independently.
 * Without targets, every indexed target is traced.
 */
export const traceTargets = (
  reader: DbReader,
  targets: readonly TableRef[] = reader.listTargets(),
  options: TraceOptions = {},
): LineageRecord[] =>
  targets.map((target) => traceLineage(reader, target, options));
