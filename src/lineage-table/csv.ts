const NEEDS_QUOTES = /[",\r\n]/;

const formatField = (field: string): string =>
  NEEDS_QUOTES.test(field) ? `"${field.replaceAll('"', '""')}"` : field;

/**
 * Format rows as CSV: fields quoted only when needed, "\n" line endings,
 * and a trailing newline.
 */
export const formatCsv = (rows: readonly (readonly string[])[]): string =>
  rows.map((row) => `${row.map(formatField).join(",")}\n`).join("");

/**
 * Parse CSV text into rows of fields.
 *
 * Accepts quoted fields with "" escapes and embedded line breaks, LF or
 * CRLF line endings, and a leading byte order mark. Blank lines are skipped.
 *
 * @throws Error when a quoted field is never closed
 */
export const parseCsv = (text: string): string[][] => {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let fieldQuoted = false;
  let inQuotes = false;
  let line = 1;
  let quoteLine = 1;

  const endField = (): void => {
    row.push(field);
    field = "";
    fieldQuoted = false;
  };

  const endRow = (): void => {
    const blank = row.length === 0 && field === "" && !fieldQuoted;
    endField();
    if (!blank) {
      rows.push(row);
    }
    row = [];
  };

  for (let i = text.startsWith("\uFEFF") ? 1 : 0; i < text.length; i++) {
    const char = text.charAt(i);

    if (inQuotes) {
      if (char === '"') {
        if (text.charAt(i + 1) === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (char === "\n") {
          line++;
        }
        field += char;
      }
      continue;
    }

    switch (char) {
      case '"':
        if (field === "" && !fieldQuoted) {
          inQuotes = true;
          fieldQuoted = true;
          quoteLine = line;
        } else {
          field += char;
        }
        break;
      case ",":
        endField();
        break;
      case "\r":
        if (text.charAt(i + 1) !== "\n") {
          endRow();
          line++;
        }
        break;
      case "\n":
        endRow();
        line++;
        break;
      default:
        field += char;
    }
  }

  if (inQuotes) {
    throw new Error(`Unterminated quoted field starting on line ${quoteLine}`);
  }
  if (row.length > 0 || field !== "" || fieldQuoted) {
    endRow();
  }

  return rows;
};
