import type { PyToken } from "./tokenizePython.js";

type HeaderLine =
  | { kind: "comment"; text: string }
  | { kind: "blank" }
  | { kind: "code" };

const QUALIFIED_NAME =
  /(?<![\p{L}\p{N}_.])([\p{L}\p{N}_]+)\.([\p{L}\p{N}_]+)(?=[\s,;)\]#-]|$)/gu;

const LABELS =
  /^(input|job|jobs|user|used|usage|purpose|revision|revisions|history|company|author|date|data|datastage|sas|view)\b(?!\.)/i;

/**
 * Strip invisible characters and leading comment decoration.
 */
const cleanCommentText = (text: string): string =>
  text
    .replace(/[\uFEFF\u200B]/g, "")
    .replace(/\u00A0/g, " ")
    .trimEnd()
    .replace(/^[\s#/*\-|>]+/, "");

const isBanner = (rawComment: string): boolean =>
  /^[#=*\-\s]{4,}$/.test(rawComment) && /[#=*-]{4,}/.test(rawComment);

const isOutputHeader = (text: string): boolean =>
  /^output\s+tables?\b/i.test(text);

/** A bare label ending with a colon or dash, e.g. "Change log:" */
const LABEL_LINE = /^[\p{L}][\p{L}\p{N} _/()-]*\s*[:\uFF1A\-\u2013\u2014]\s*$/u;

const isSectionBreak = (text: string): boolean =>
  LABELS.test(text) || LABEL_LINE.test(text);

/**
 * Group tokens by source line: comment-only, blank or code.
 */
const classifyLines = (tokens: readonly PyToken[]): Map<number, HeaderLine> => {
  const lines = new Map<number, HeaderLine>();
  for (const token of tokens) {
    if (token.type === "newline") {
      continue;
    }
    if (token.type === "comment") {
      if (lines.get(token.line)?.kind !== "code") {
        lines.set(token.line, { kind: "comment", text: token.value });
      }
    } else {
      lines.set(token.line, { kind: "code" });
    }
  }
  return lines;
};

/**
 * Parse every "Output table(s):" section of the comment header.
 * A section holds the `db.table` tokens of the comment lines that follow it,
 * up to the first code line, banner or other header label.
 *
 * @example
 * // # Output table(s):
 * // #   rpt.daily_sales (append)
 * parseOutputHeader(tokenizePython(source)) // ["rpt.daily_sales"]
 */
export const parseOutputHeader = (tokens: readonly PyToken[]): string[] => {
  const lines = classifyLines(tokens);
  let lastLine = 0;
  for (const number of lines.keys()) {
    lastLine = Math.max(lastLine, number);
  }
  const outputs: string[] = [];
  let inSection = false;

  for (let number = 1; number <= lastLine; number++) {
    const line: HeaderLine = lines.get(number) ?? { kind: "blank" };

    if (line.kind === "code") {
      inSection = false;
      continue;
    }
    if (line.kind === "blank") {
      continue;
    }

    const text = cleanCommentText(line.text);
    if (isOutputHeader(text)) {
      inSection = true;
      continue;
    }
    if (!inSection) {
      continue;
    }
    if (isBanner(line.text) || isSectionBreak(text)) {
      inSection = false;
      continue;
    }
    for (const match of text.matchAll(QUALIFIED_NAME)) {
      outputs.push(`${match[1]}.${match[2]}`);
    }
  }

  return outputs;
};
