import type { ExtractionResult } from "../ScriptKind.js";
import { lastTwoParts } from "../uniqueNames.js";
import {
  collectSqlSources,
  readQualifiedName,
} from "./collectSqlSources.js";
import { isKeyword, isPunct, type SqlToken, tokenizeSql } from "./tokenizeSql.js";

const VIEW_MODIFIERS = [
  "TEMP",
  "TEMPORARY",
  "MATERIALIZED",
  "SECURE",
  "GLOBAL",
  "LOCAL",
  "RECURSIVE",
  "FORCE",
];

interface ViewStatement {
  name: string;
  /** Token range of the statement body, after the view name */
  bodyStart: number;
  bodyEnd: number;
}

/**
 * Match `CREATE [OR REPLACE] [modifiers] VIEW [IF NOT EXISTS] <name>` at `start`.
 */
const matchCreateView = (
  tokens: readonly SqlToken[],
  start: number,
): { name: string; next: number } | undefined => {
  if (!isKeyword(tokens[start], "CREATE")) {
    return undefined;
  }
  let i = start + 1;
  if (isKeyword(tokens[i], "OR") && isKeyword(tokens[i + 1], "REPLACE")) {
    i += 2;
  }
  while (isKeyword(tokens[i], ...VIEW_MODIFIERS)) {
    i++;
  }
  if (!isKeyword(tokens[i], "VIEW")) {
    return undefined;
  }
  i++;
  if (
    isKeyword(tokens[i], "IF") &&
    isKeyword(tokens[i + 1], "NOT") &&
    isKeyword(tokens[i + 2], "EXISTS")
  ) {
    i += 3;
  }
  const name = readQualifiedName(tokens, i);
  return name === undefined
    ? undefined
    : { name: lastTwoParts(name.parts), next: name.next };
};

/** Index of the first top-level ";" at or after `start` */
const findStatementEnd = (tokens: readonly SqlToken[], start: number): number => {
  let depth = 0;
  for (let i = start; i < tokens.length; i++) {
    if (isPunct(tokens[i], "(")) {
      depth++;
    } else if (isPunct(tokens[i], ")")) {
      depth = Math.max(0, depth - 1);
    } else if (depth === 0 && isPunct(tokens[i], ";")) {
      return i;
    }
  }
  return tokens.length;
};

const findFirstView = (tokens: readonly SqlToken[]): ViewStatement | undefined => {
  for (let i = 0; i < tokens.length; i++) {
    const match = matchCreateView(tokens, i);
    if (match !== undefined) {
      return {
        name: match.name,
        bodyStart: match.next,
        bodyEnd: findStatementEnd(tokens, match.next),
      };
    }
  }
  return undefined;
};

/**
 * Extract the view created by a SQL script (its sole target) and the tables
 * its defining query reads.
 * Comments and string literals are never scanned for table names.
 */
export const extractSqlViewReferences = (text: string): ExtractionResult => {
  const tokens = tokenizeSql(text);
  const view = findFirstView(tokens);

  if (view === undefined) {
    return {
      success: false,
      code: "NoTargetFound",
      error: "No CREATE VIEW statement found",
    };
  }

  const target = view.name.toLowerCase();
  const sources = collectSqlSources(tokens, view.bodyStart, view.bodyEnd).filter(
    (source) => source.toLowerCase() !== target,
  );

  return { success: true, targets: [view.name], sources };
};
