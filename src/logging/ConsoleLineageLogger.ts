import chalk from "chalk";
import type { Diagnostic, DiagnosticKind } from "../db/Types.js";
import type { LineageLogger, ProgressSummary } from "./LineageLogger.js";

const PREFIX = chalk.dim("[lineage]");
const REWRITE_LINE = "\x1b[1A\x1b[2K\r"; // cursor up one line, clear it

/** Where the logger writes; process.stderr by default */
export interface LogStream {
  isTTY?: boolean;
  write(text: string): unknown;
}

/** "1 ReadError, 2 UnsupportedScript", kinds in name order */
const countDiagnostics = (diagnostics: readonly Diagnostic[]): string => {
  const counts = new Map<DiagnosticKind, number>();
  for (const { kind } of diagnostics) {
    counts.set(kind, (counts.get(kind) ?? 0) + 1);
  }
  return [...counts]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([kind, count]) => `${count} ${kind}`)
    .join(", ");
};

/**
 * Colored line logger. On a terminal the read progress is redrawn in
 * place; elsewhere only the summary line is written.
 */
export const createConsoleLineageLogger = (
  stream: LogStream = process.stderr,
): LineageLogger => {
  const live = stream.isTTY === true;
  let label = "";
  let total = 0;
  let progressShown = false;

  const print = (text: string): void => {
    if (progressShown) {
      stream.write(REWRITE_LINE);
      progressShown = false;
    }
    stream.write(`${PREFIX} ${text}\n`);
  };

  const showProgress = (current: number): void => {
    if (live) {
      print(`${chalk.cyan("→")} Reading ${label}... ${current}/${total} files`);
      progressShown = true;
    }
  };

  return {
    startProgress(fileCount: number, progressLabel: string): void {
      label = progressLabel;
      total = fileCount;
      showProgress(0);
    },

    updateProgress(current: number): void {
      showProgress(current);
    },

    completeProgress(summary: ProgressSummary): void {
      const counts = countDiagnostics(summary.diagnostics);
      print(
        `${chalk.green("✓")} ${label}: read ${summary.scriptsLoaded} of ${summary.filesRead} files` +
          (counts === "" ? "" : chalk.yellow(` (${counts})`)),
      );
    },

    success(message: string): void {
      print(`${chalk.green("✓")} ${message}`);
    },

    info(message: string): void {
      print(message);
    },

    warn(message: string): void {
      print(`${chalk.yellow("⚠")} ${message}`);
    },

    error(message: string): void {
      print(`${chalk.red("✗")} ${message}`);
    },
  };
};
