export type SqlToken =
  | { type: "word"; value: string; quoted: boolean }
  | { type: "string" }
  | { type: "punct"; value: string };

const WORD_CHAR = /[\p{L}\p{N}_$]/u;

const CLOSING_QUOTE: Record<string, string> = {
  '"': '"',
  "`": "`",
  "[": "]",
};

/**
 * Split SQL text into words, string literals and punctuation.
 * Comments are dropped. Single-quoted text is a string literal; backtick,
 * double-quote and bracket quoting produce quoted words (identifiers).
 */
export const tokenizeSql = (text: string): SqlToken[] => {
  const tokens: SqlToken[] = [];
  let i = 0;

  while (i < text.length) {
    const ch = text.charAt(i);
    const next = text.charAt(i + 1);

    if (/\s/.test(ch)) {
      i++;
    } else if (ch === "-" && next === "-") {
      const end = text.indexOf("\n", i);
      i = end === -1 ? text.length : end + 1;
    } else if (ch === "/" && next === "*") {
      const end = text.indexOf("*/", i + 2);
      i = end === -1 ? text.length : end + 2;
    } else if (ch === "'") {
      i++;
      while (i < text.length) {
        const c = text.charAt(i);
        if (c === "\\") {
          i += 2;
        } else if (c === "'" && text.charAt(i + 1) === "'") {
          i += 2;
        } else if (c === "'") {
          i++;
          break;
        } else {
          i++;
        }
      }
      tokens.push({ type: "string" });
    } else if (ch in CLOSING_QUOTE) {
      const close = CLOSING_QUOTE[ch] ?? ch;
      let value = "";
      i++;
      while (i < text.length) {
        const c = text.charAt(i);
        if (c === close && text.charAt(i + 1) === close && close !== "]") {
          value += c;
          i += 2;
        } else if (c === close) {
          i++;
          break;
        } else {
          value += c;
          i++;
        }
      }
      tokens.push({ type: "word", value, quoted: true });
    } else if (WORD_CHAR.test(ch)) {
      let end = i + 1;
      while (end < text.length && WORD_CHAR.test(text.charAt(end))) {
        end++;
      }
      tokens.push({ type: "word", value: text.slice(i, end), quoted: false });
      i = end;
    } else {
      tokens.push({ type: "punct", value: ch });
      i++;
    }
  }

  return tokens;
};

/**
 * True when the token is an unquoted word equal to one of the keywords
 * (case-insensitive).
 */
export const isKeyword = (
  token: SqlToken | undefined,
  ...keywords: string[]
): boolean =>
  token?.type === "word" &&
  !token.quoted &&
  keywords.includes(token.value.toUpperCase());

export const isPunct = (token: SqlToken | undefined, value: string): boolean =>
  token?.type === "punct" && token.value === value;
