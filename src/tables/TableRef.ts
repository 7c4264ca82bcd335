/**
 * Identity of a table, optionally qualified with its database (schema).
 *
 * A ref without `database` is a partial reference: it stands for any
 * qualified table with the same `table` name.
 */
export interface TableRef {
  database?: string;
  table: string;
}

/**
 * Lookup key for a table ref: "db.table", or the bare table name for a
 * partial reference.
 *
 * @example
 * tableKey({ database: "raw", table: "orders" }) // "raw.orders"
 * tableKey({ table: "orders" }) // "orders"
 */
export const tableKey = (ref: TableRef): string =>
  ref.database === undefined ? ref.table : `${ref.database}.${ref.table}`;

export const isPartial = (ref: TableRef): boolean => ref.database === undefined;

export const compareTableRefs = (a: TableRef, b: TableRef): number => {
  const keyA = tableKey(a);
  const keyB = tableKey(b);
  return keyA < keyB ? -1 : keyA > keyB ? 1 : 0;
};

/**
 * Deduplicate refs by key and sort them, the canonical form of a layer or
 * of a script's target/source set.
 */
export const toSortedSet = (refs: Iterable<TableRef>): TableRef[] => {
  const byKey = new Map<string, TableRef>();
  for (const ref of refs) {
    byKey.set(tableKey(ref), ref);
  }
  return [...byKey.values()].sort(compareTableRefs);
};
