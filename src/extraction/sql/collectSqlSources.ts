import { lastTwoParts, uniqueNames } from "../uniqueNames.js";
import { isKeyword, isPunct, type SqlToken } from "./tokenizeSql.js";

/**
 * Words after which "(" opens a subquery or a grouping, not a function call.
 * A FROM directly inside a function call (EXTRACT(YEAR FROM d)) is not a
 * table position.
 */
const GROUPING_KEYWORDS = [
  "FROM",
  "JOIN",
  "IN",
  "EXISTS",
  "AS",
  "ON",
  "WHERE",
  "AND",
  "OR",
  "NOT",
  "SELECT",
  "UNION",
  "ALL",
  "ANY",
  "SOME",
  "VALUES",
  "THEN",
  "ELSE",
  "WHEN",
  "LATERAL",
  "USING",
  "WITH",
  "HAVING",
  "BY",
  "DISTINCT",
  "RECURSIVE",
  "RETURN",
];

/** Words that end a table name in a FROM list rather than alias it */
const CLAUSE_KEYWORDS = [
  "WHERE",
  "JOIN",
  "INNER",
  "LEFT",
  "RIGHT",
  "FULL",
  "CROSS",
  "OUTER",
  "NATURAL",
  "SEMI",
  "ANTI",
  "ON",
  "USING",
  "GROUP",
  "ORDER",
  "HAVING",
  "LIMIT",
  "OFFSET",
  "FETCH",
  "UNION",
  "EXCEPT",
  "INTERSECT",
  "MINUS",
  "WINDOW",
  "LATERAL",
  "TABLESAMPLE",
  "QUALIFY",
  "CLUSTER",
  "DISTRIBUTE",
  "SORT",
  "PIVOT",
  "UNPIVOT",
  "WITH",
  "SELECT",
  "FROM",
  "AS",
  "INSERT",
  "VALUES",
  "FOR",
  "START",
  "CONNECT",
];

export interface QualifiedName {
  parts: string[];
  /** Index of the first token after the name */
  next: number;
}

/**
 * Read a dotted identifier starting at `start`: word ("." word)*.
 */
export const readQualifiedName = (
  tokens: readonly SqlToken[],
  start: number,
): QualifiedName | undefined => {
  const first = tokens[start];
  if (first?.type !== "word") {
    return undefined;
  }
  const parts = [first.value];
  let next = start + 1;
  while (isPunct(tokens[next], ".")) {
    const part = tokens[next + 1];
    if (part?.type !== "word") {
      break;
    }
    parts.push(part.value);
    next += 2;
  }
  return { parts, next };
};

/**
 * The CTE name declared by the `AS (` at `asIndex`, if any: `WITH x AS (`,
 * `, y AS (`, or either with a column list, `WITH x (a, b) AS (`.
 */
const cteNameBefore = (
  tokens: readonly SqlToken[],
  asIndex: number,
): Extract<SqlToken, { type: "word" }> | undefined => {
  let index = asIndex - 1;
  if (isPunct(tokens[index], ")")) {
    let depth = 0;
    for (; index >= 0; index--) {
      if (isPunct(tokens[index], ")")) {
        depth++;
      } else if (isPunct(tokens[index], "(") && --depth === 0) {
        break;
      }
    }
    index--;
  }
  const name = tokens[index];
  const before = tokens[index - 1];
  return name?.type === "word" &&
    (isKeyword(before, "WITH", "RECURSIVE") || isPunct(before, ","))
    ? name
    : undefined;
};

const collectCteNames = (
  tokens: readonly SqlToken[],
  start: number,
  end: number,
): Set<string> => {
  const names = new Set<string>();
  for (let i = start; i < end; i++) {
    if (isKeyword(tokens[i], "AS") && isPunct(tokens[i + 1], "(")) {
      const name = cteNameBefore(tokens, i);
      if (name !== undefined) {
        names.add(name.value.toLowerCase());
      }
    }
  }
  return names;
};

/** `IS [NOT] DISTINCT FROM` compares values; its FROM names no table */
const isDistinctPredicate = (
  tokens: readonly SqlToken[],
  fromIndex: number,
): boolean =>
  isKeyword(tokens[fromIndex - 1], "DISTINCT") &&
  isKeyword(tokens[fromIndex - 2], "IS", "NOT");

/**
 * Read one table reference at `start`. Returns undefined for subqueries,
 * table-valued functions and keywords.
 */
const readTable = (
  tokens: readonly SqlToken[],
  start: number,
): QualifiedName | undefined => {
  const token = tokens[start];
  if (token?.type !== "word") {
    return undefined;
  }
  if (
    !token.quoted &&
    (CLAUSE_KEYWORDS.includes(token.value.toUpperCase()) ||
      isKeyword(token, "UNNEST", "TABLE"))
  ) {
    return undefined;
  }
  const name = readQualifiedName(tokens, start);
  if (name === undefined || isPunct(tokens[name.next], "(")) {
    return undefined;
  }
  return name;
};

/** Skip an optional alias (`AS x` or a bare non-keyword word) */
const skipAlias = (tokens: readonly SqlToken[], index: number): number => {
  if (isKeyword(tokens[index], "AS")) {
    return tokens[index + 1]?.type === "word" ? index + 2 : index + 1;
  }
  const token = tokens[index];
  if (
    token?.type === "word" &&
    (token.quoted || !CLAUSE_KEYWORDS.includes(token.value.toUpperCase()))
  ) {
    return index + 1;
  }
  return index;
};

/**
 * Table names read by the SQL between `start` and `end` (token indexes):
 * every name after FROM or JOIN, comma-separated FROM lists included,
 * nested subqueries included, CTE names excluded.
 *
 * @example
 * collectSqlSources(tokenizeSql("SELECT * FROM raw.a x, raw.b JOIN raw.c ON 1=1"))
 * // ["raw.a", "raw.b", "raw.c"]
 */
export const collectSqlSources = (
  tokens: readonly SqlToken[],
  start = 0,
  end = tokens.length,
): string[] => {
  const cteNames = collectCteNames(tokens, start, end);
  const sources: string[] = [];
  const parens: Array<"call" | "group"> = [];

  const addSource = (name: QualifiedName): void => {
    const joined = lastTwoParts(name.parts);
    if (name.parts.length > 1 || !cteNames.has(joined.toLowerCase())) {
      sources.push(joined);
    }
  };

  for (let i = start; i < end; i++) {
    const token = tokens[i];
    if (isPunct(token, "(")) {
      const previous = tokens[i - 1];
      const isCall =
        previous?.type === "word" &&
        (previous.quoted ||
          !GROUPING_KEYWORDS.includes(previous.value.toUpperCase()));
      parens.push(isCall ? "call" : "group");
      continue;
    }
    if (isPunct(token, ")")) {
      parens.pop();
      continue;
    }
    if (parens.at(-1) === "call") {
      continue;
    }

    if (isKeyword(token, "JOIN")) {
      const table = readTable(tokens, i + 1);
      if (table !== undefined) {
        addSource(table);
      }
    } else if (isKeyword(token, "FROM") && !isDistinctPredicate(tokens, i)) {
      let table = readTable(tokens, i + 1);
      while (table !== undefined && table.next <= end) {
        addSource(table);
        const afterAlias = skipAlias(tokens, table.next);
        table = isPunct(tokens[afterAlias], ",")
          ? readTable(tokens, afterAlias + 1)
          : undefined;
      }
    }
  }

  return uniqueNames(sources);
};
