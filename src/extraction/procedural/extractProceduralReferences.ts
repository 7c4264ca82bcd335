import type { ExtractionOptions, ExtractionResult } from "../ScriptKind.js";
import { collectSqlSources } from "../sql/collectSqlSources.js";
import { tokenizeSql } from "../sql/tokenizeSql.js";
import { lastTwoParts, uniqueNames } from "../uniqueNames.js";
import { parseOutputHeader } from "./parseOutputHeader.js";
import { PythonSyntaxError, type PyToken, tokenizePython } from "./tokenizePython.js";

/** DataFrameWriter methods whose first argument is the table written */
const WRITE_METHODS = new Set(["insertInto", "saveAsTable"]);

const TABLE_NAME = /^[\p{L}\p{N}_$]+(\.[\p{L}\p{N}_$]+){0,2}$/u;

const isOp = (token: PyToken | undefined, value: string): boolean =>
  token?.type === "op" && token.value === value;

const isName = (token: PyToken | undefined, value?: string): boolean =>
  token?.type === "name" && (value === undefined || token.value === value);

const startsStatement = (token: PyToken | undefined): boolean =>
  token === undefined || token.type === "newline" || isOp(token, ";");

const endsArgument = (token: PyToken | undefined): boolean =>
  isOp(token, ",") || isOp(token, ")");

/** A string usable as a literal: plain, or an f-string without fields */
const literalValue = (token: PyToken | undefined): string | undefined => {
  if (token?.type !== "string") {
    return undefined;
  }
  if (token.formatted && /[{}]/.test(token.value)) {
    return undefined;
  }
  return token.value;
};

const toTableName = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  if (trimmed === undefined || !TABLE_NAME.test(trimmed)) {
    return undefined;
  }
  return lastTwoParts(trimmed.split("."));
};

/**
 * Walks the token stream, tracking `name = "literal"` assignments so call
 * arguments given as variables can be resolved.
 */
const scanCalls = (
  tokens: readonly PyToken[],
  sessionNames: ReadonlySet<string>,
): { writes: string[]; reads: string[] } => {
  const variables = new Map<string, string>();
  const writes: string[] = [];
  const reads: string[] = [];

  /** First positional argument at `index`: a literal or a known variable */
  const argumentAt = (index: number): string | undefined => {
    const token = tokens[index];
    if (!endsArgument(tokens[index + 1])) {
      return undefined;
    }
    if (token?.type === "name") {
      return variables.get(token.value);
    }
    return literalValue(token);
  };

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === undefined) {
      continue;
    }

    if (
      token.type === "name" &&
      isOp(tokens[i + 1], "=") &&
      startsStatement(tokens[i - 1])
    ) {
      const value = literalValue(tokens[i + 2]);
      if (value !== undefined && startsStatement(tokens[i + 3])) {
        variables.set(token.value, value);
      } else {
        variables.delete(token.value);
      }
      continue;
    }

    const method = tokens[i + 1];
    if (
      isOp(token, ".") &&
      method?.type === "name" &&
      WRITE_METHODS.has(method.value) &&
      isOp(tokens[i + 2], "(")
    ) {
      const table = toTableName(argumentAt(i + 3));
      if (table !== undefined) {
        writes.push(table);
      }
      continue;
    }

    if (
      token.type !== "name" ||
      !sessionNames.has(token.value) ||
      isOp(tokens[i - 1], ".") ||
      !isOp(tokens[i + 1], ".")
    ) {
      continue;
    }

    // spark.read.table(...) reads like spark.table(...)
    const call =
      isName(tokens[i + 2], "read") && isOp(tokens[i + 3], ".") ? i + 4 : i + 2;
    if (!isOp(tokens[call + 1], "(")) {
      continue;
    }

    if (isName(tokens[call], "table")) {
      const table = toTableName(argumentAt(call + 2));
      if (table !== undefined) {
        reads.push(table);
      }
    } else if (isName(tokens[call], "sql") && call === i + 2) {
      const query = argumentAt(call + 2);
      if (query !== undefined) {
        reads.push(...collectSqlSources(tokenizeSql(query)));
      }
    }
  }

  return { writes, reads };
};

/**
 * Extract target and source tables from a Spark script without running it.
 *
 * Targets come from `.insertInto(...)` / `.saveAsTable(...)` calls and from
 * "Output table(s):" header comment sections. Sources come from
 * `spark.table(...)`, `spark.read.table(...)` and the SQL passed to
 * `spark.sql(...)`. A table written by the script is never one of its sources.
 */
export const extractProceduralReferences = (
  text: string,
  options: ExtractionOptions,
): ExtractionResult => {
  let tokens: PyToken[];
  try {
    tokens = tokenizePython(text);
  } catch (e) {
    if (e instanceof PythonSyntaxError) {
      return { success: false, code: "Unparseable", error: e.message };
    }
    throw e;
  }

  const code = tokens.filter((token) => token.type !== "comment");
  const { writes, reads } = scanCalls(code, new Set(options.sessionNames));
  const targets = uniqueNames([...parseOutputHeader(tokens), ...writes]);
  const targetKeys = new Set(targets.map((target) => target.toLowerCase()));
  const sources = uniqueNames(reads).filter(
    (source) => !targetKeys.has(source.toLowerCase()),
  );

  return { success: true, targets, sources };
};
