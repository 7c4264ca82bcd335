/**
 * Thrown when a lineage table does not follow the column contract.
 */
export class LineageTableError extends Error {
  /** 1-based row number in the file (the header is row 1) */
  readonly row: number;

  constructor(row: number, message: string) {
    super(`Row ${row}: ${message}`);
    this.name = "LineageTableError";
    this.row = row;
  }
}
