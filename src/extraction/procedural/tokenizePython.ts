export type PyToken =
  | { type: "name"; value: string; line: number }
  | { type: "string"; value: string; formatted: boolean; line: number }
  | { type: "number"; value: string; line: number }
  | { type: "op"; value: string; line: number }
  | { type: "comment"; value: string; line: number }
  | { type: "newline"; line: number };

/**
 * Raised for input the tokenizer cannot make sense of.
 */
export class PythonSyntaxError extends Error {
  constructor(message: string, line: number) {
    super(`${message} (line ${line})`);
    this.name = "PythonSyntaxError";
  }
}

const NAME_START = /[\p{L}_]/u;
const NAME_CHAR = /[\p{L}\p{N}_]/u;
const STRING_PREFIX = /^[rRbBuUfF]{1,2}$/;
const TWO_CHAR_OPS = new Set([
  "==",
  "!=",
  "<=",
  ">=",
  ":=",
  "+=",
  "-=",
  "*=",
  "/=",
  "%=",
  "&=",
  "|=",
  "^=",
  "**",
  "//",
  "->",
]);

/**
 * Tokenize Python source into names, strings, numbers, operators, comments
 * and logical-line ends. Newlines inside brackets or after a backslash
 * continuation do not end a logical line.
 *
 * @throws PythonSyntaxError on an unterminated triple-quoted string
 */
export const tokenizePython = (text: string): PyToken[] => {
  const tokens: PyToken[] = [];
  let i = 0;
  let line = 1;
  let depth = 0;

  const readString = (quoteStart: number, prefix: string): void => {
    const quote = text.charAt(quoteStart);
    const triple = text.startsWith(quote.repeat(3), quoteStart);
    const delimiter = triple ? quote.repeat(3) : quote;
    const startLine = line;
    let j = quoteStart + delimiter.length;
    let value = "";

    for (;;) {
      if (j >= text.length) {
        if (triple) {
          throw new PythonSyntaxError(
            "Unterminated triple-quoted string",
            startLine,
          );
        }
        break;
      }
      const c = text.charAt(j);
      if (c === "\\") {
        value += text.slice(j, j + 2);
        if (text.charAt(j + 1) === "\n") {
          line++;
        }
        j += 2;
      } else if (text.startsWith(delimiter, j)) {
        j += delimiter.length;
        break;
      } else if (c === "\n" && !triple) {
        // Unterminated single-line string ends at the line break
        break;
      } else {
        if (c === "\n") {
          line++;
        }
        value += c;
        j++;
      }
    }

    tokens.push({
      type: "string",
      value,
      formatted: /f/i.test(prefix),
      line: startLine,
    });
    i = j;
  };

  while (i < text.length) {
    const ch = text.charAt(i);

    if (ch === "\n") {
      if (depth === 0) {
        tokens.push({ type: "newline", line });
      }
      line++;
      i++;
    } else if (ch === "\\" && text.charAt(i + 1) === "\n") {
      line++;
      i += 2;
    } else if (/\s/.test(ch)) {
      i++;
    } else if (ch === "#") {
      const end = text.indexOf("\n", i);
      const stop = end === -1 ? text.length : end;
      tokens.push({ type: "comment", value: text.slice(i + 1, stop), line });
      i = stop;
    } else if (ch === "'" || ch === '"') {
      readString(i, "");
    } else if (NAME_START.test(ch)) {
      let end = i + 1;
      while (end < text.length && NAME_CHAR.test(text.charAt(end))) {
        end++;
      }
      const word = text.slice(i, end);
      const after = text.charAt(end);
      if ((after === "'" || after === '"') && STRING_PREFIX.test(word)) {
        readString(end, word);
      } else {
        tokens.push({ type: "name", value: word, line });
        i = end;
      }
    } else if (/[0-9]/.test(ch)) {
      let end = i + 1;
      while (end < text.length && /[\w.]/.test(text.charAt(end))) {
        end++;
      }
      tokens.push({ type: "number", value: text.slice(i, end), line });
      i = end;
    } else {
      const pair = text.slice(i, i + 2);
      const value = TWO_CHAR_OPS.has(pair) ? pair : ch;
      if ("([{".includes(value)) {
        depth++;
      } else if (")]}".includes(value)) {
        depth = Math.max(0, depth - 1);
      }
      tokens.push({ type: "op", value, line });
      i += value.length;
    }
  }

  return tokens;
};
