import { tableKey } from "../../tables/TableRef.js";
import type { LineageRecord } from "../shared/LineageRecord.js";

/**
 * Promote every table found only in some layer to a target row of its own.
 *
 * For a table first seen at layer N of a record, the new row's layers are a
 * copy of that record's layers after N: the upstream chain it already had
 * there. No index lookups are made. Output is the original records,
 * unchanged, followed by the promoted ones in discovery order.
 *
 * @example
 * expandLayers([{ target: db.final, layers: [[db.v1], [raw.a, raw.b]], ... }])
 * // [original, { target: db.v1, layers: [[raw.a, raw.b]], ... },
 * //  { target: raw.a, layers: [], ... }, { target: raw.b, layers: [], ... }]
 */
export const expandLayers = (
  records: readonly LineageRecord[],
): LineageRecord[] => {
  const known = new Set(records.map((record) => tableKey(record.target)));
  const promoted: LineageRecord[] = [];

  for (const record of records) {
    record.layers.forEach((layer, index) => {
      for (const table of layer) {
        const key = tableKey(table);
        if (known.has(key)) {
          continue;
        }
        known.add(key);
        promoted.push({
          target: table,
          layers: record.layers
            .slice(index + 1)
            .map((upstream) => [...upstream]),
          truncated: record.truncated,
          cyclic: false,
          ambiguities: [],
        });
      }
    });
  }

  return [...records, ...promoted];
};
