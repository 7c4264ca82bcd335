import type {
  Ambiguity,
  LineageRecord,
} from "../query/shared/LineageRecord.js";
import { InvalidReferenceError } from "../tables/InvalidReferenceError.js";
import { normalizeTableName } from "../tables/normalizeTableName.js";
import { type TableRef, tableKey } from "../tables/TableRef.js";
import { LineageTableError } from "./LineageTableError.js";

export const TARGET_COLUMN = "Target Table";
export const NOTES_COLUMN = "Notes";
export const DEFAULT_LAYER_DELIMITER = ";";

const NOTE_SEPARATOR = "; ";
const TRUNCATED_NOTE = "truncated";
const CYCLIC_NOTE = "cyclic";
const AMBIGUOUS_NOTE = /^ambiguous (.+?): (.+)$/;
const LAYER_COLUMN = /^Layer ([1-9]\d*)$/;

export const layerColumn = (n: number): string => `Layer ${n}`;

export interface LineageTableOptions {
  /** Single character between the tables of a layer cell (default: ";") */
  layerDelimiter?: string;
  /** Keep identifier case when reading (default: lower-case) */
  caseSensitive?: boolean;
}

const formatNotes = (record: LineageRecord): string => {
  const notes: string[] = [];
  if (record.truncated) {
    notes.push(TRUNCATED_NOTE);
  }
  if (record.cyclic) {
    notes.push(CYCLIC_NOTE);
  }
  for (const { reference, candidates } of record.ambiguities) {
    notes.push(
      `ambiguous ${tableKey(reference)}: ${candidates.map(tableKey).join(", ")}`,
    );
  }
  return notes.join(NOTE_SEPARATOR);
};

/**
 * Lay out lineage records as table rows, header first:
 * `Target Table`, `Layer 1` … `Layer N`, `Notes`, where N is the largest
 * layer count among the records.
 */
export const toLineageRows = (
  records: readonly LineageRecord[],
  options: LineageTableOptions = {},
): string[][] => {
  const separator = `${options.layerDelimiter ?? DEFAULT_LAYER_DELIMITER} `;
  const width = records.reduce(
    (max, record) => Math.max(max, record.layers.length),
    0,
  );
  const layerIndexes = Array.from({ length: width }, (_, i) => i);

  const header = [
    TARGET_COLUMN,
    ...layerIndexes.map((i) => layerColumn(i + 1)),
    NOTES_COLUMN,
  ];
  const rows = records.map((record) => [
    tableKey(record.target),
    ...layerIndexes.map(
      (i) => record.layers[i]?.map(tableKey).join(separator) ?? "",
    ),
    formatNotes(record),
  ]);

  return [header, ...rows];
};

/**
 * Column positions read from a header row.
 */
interface Columns {
  target: number;
  layers: number[];
  notes?: number;
}

const readHeader = (header: readonly string[]): Columns => {
  let target: number | undefined;
  let notes: number | undefined;
  const layers = new Map<number, number>();

  for (const [index, cell] of header.entries()) {
    const name = cell.trim();
    const layerNumber = LAYER_COLUMN.exec(name)?.[1];
    if (name === TARGET_COLUMN && target === undefined) {
      target = index;
    } else if (name === NOTES_COLUMN && notes === undefined) {
      notes = index;
    } else if (
      layerNumber !== undefined &&
      !layers.has(Number(layerNumber))
    ) {
      layers.set(Number(layerNumber), index);
    } else {
      throw new LineageTableError(1, `Unexpected column '${name}'`);
    }
  }

  if (target === undefined) {
    throw new LineageTableError(1, `Missing '${TARGET_COLUMN}' column`);
  }

  const ordered: number[] = [];
  for (let n = 1; n <= layers.size; n++) {
    const index = layers.get(n);
    if (index === undefined) {
      throw new LineageTableError(1, `Missing '${layerColumn(n)}' column`);
    }
    ordered.push(index);
  }

  return { target, layers: ordered, notes };
};

/**
 * Parse the Notes cell back into record flags and ambiguities.
 */
const readNotes = (
  cell: string,
  parse: (key: string) => TableRef,
  rowNumber: number,
): Pick<LineageRecord, "truncated" | "cyclic" | "ambiguities"> => {
  let truncated = false;
  let cyclic = false;
  const ambiguities: Ambiguity[] = [];

  for (const note of cell.split(";").map((part) => part.trim())) {
    if (note === "") {
      continue;
    }
    if (note === TRUNCATED_NOTE) {
      truncated = true;
      continue;
    }
    if (note === CYCLIC_NOTE) {
      cyclic = true;
      continue;
    }
    const [, reference, candidates] = AMBIGUOUS_NOTE.exec(note) ?? [];
    if (reference === undefined || candidates === undefined) {
      throw new LineageTableError(rowNumber, `Unknown note '${note}'`);
    }
    ambiguities.push({
      reference: parse(reference),
      candidates: candidates.split(",").map((key) => parse(key)),
    });
  }

  return { truncated, cyclic, ambiguities };
};

/**
 * Read lineage records from table rows (header first). Inverse of
 * `toLineageRows`: records written and read back are equal.
 *
 * Trailing empty layer cells are padding and are dropped; an empty cell
 * between filled ones is an empty layer.
 *
 * @throws LineageTableError on an unexpected header, a missing target, a
 * malformed table name or an unknown note
 */
export const fromLineageRows = (
  rows: readonly (readonly string[])[],
  options: LineageTableOptions = {},
): LineageRecord[] => {
  const [header, ...body] = rows;
  if (header === undefined) {
    throw new LineageTableError(1, "Missing header row");
  }
  const columns = readHeader(header);
  const delimiter = options.layerDelimiter ?? DEFAULT_LAYER_DELIMITER;

  return body.map((row, index) => {
    const rowNumber = index + 2;

    const parse = (key: string): TableRef => {
      try {
        return normalizeTableName(key, {
          caseSensitive: options.caseSensitive,
        });
      } catch (e) {
        if (e instanceof InvalidReferenceError) {
          throw new LineageTableError(rowNumber, e.message);
        }
        throw e;
      }
    };

    const extra = row.slice(header.length).find((cell) => cell.trim() !== "");
    if (extra !== undefined) {
      throw new LineageTableError(
        rowNumber,
        `Expected ${header.length} columns, found ${row.length}`,
      );
    }

    const targetCell = row[columns.target]?.trim() ?? "";
    if (targetCell === "") {
      throw new LineageTableError(rowNumber, "Missing target table");
    }

    const cells = columns.layers.map((column) => row[column]?.trim() ?? "");
    while (cells.length > 0 && cells.at(-1) === "") {
      cells.pop();
    }
    const layers = cells.map((cell) =>
      cell
        .split(delimiter)
        .map((key) => key.trim())
        .filter((key) => key !== "")
        .map(parse),
    );

    const notesCell =
      columns.notes === undefined ? "" : (row[columns.notes] ?? "");

    return {
      target: parse(targetCell),
      layers,
      ...readNotes(notesCell, parse, rowNumber),
    };
  });
};
