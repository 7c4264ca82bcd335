import { describe, expect, it } from "vitest";
import { createConsoleLineageLogger } from "./ConsoleLineageLogger.js";

const ANSI = /\x1b\[[0-9;]*[A-Za-z]/g;

const recordingStream = (isTTY: boolean) => {
  const chunks: string[] = [];
  return {
    isTTY,
    chunks,
    /** Chunks with color and cursor codes removed */
    plain: (): string[] => chunks.map((chunk) => chunk.replace(ANSI, "")),
    write(text: string): boolean {
      chunks.push(text);
      return true;
    },
  };
};

describe(createConsoleLineageLogger.name, () => {
  it("summarizes the read with diagnostic counts", () => {
    const stream = recordingStream(false);
    const logger = createConsoleLineageLogger(stream);

    logger.startProgress(3, "corpus");
    logger.updateProgress(1);
    logger.completeProgress({
      filesRead: 3,
      scriptsLoaded: 2,
      diagnostics: [
        { kind: "UnsupportedScript", scriptId: "a.sas", message: "" },
        { kind: "ReadError", scriptId: "b.sql", message: "" },
        { kind: "UnsupportedScript", scriptId: "c.sas", message: "" },
      ],
    });

    expect(stream.plain()).toEqual([
      "[lineage] ✓ corpus: read 2 of 3 files (1 ReadError, 2 UnsupportedScript)\n",
    ]);
  });

  it("omits the counts when nothing went wrong", () => {
    const stream = recordingStream(false);
    const logger = createConsoleLineageLogger(stream);

    logger.startProgress(1, "corpus");
    logger.completeProgress({ filesRead: 1, scriptsLoaded: 1, diagnostics: [] });

    expect(stream.plain()).toEqual(["[lineage] ✓ corpus: read 1 of 1 files\n"]);
  });

  it("redraws progress in place on a terminal", () => {
    const stream = recordingStream(true);
    const logger = createConsoleLineageLogger(stream);

    logger.startProgress(2, "corpus");
    logger.updateProgress(2);
    logger.warn("views/x.sql: No target table found");
    logger.info("done");

    expect(stream.chunks[1]).toBe("\x1b[1A\x1b[2K\r");
    expect(stream.plain()).toEqual([
      "[lineage] → Reading corpus... 0/2 files\n",
      "\r",
      "[lineage] → Reading corpus... 2/2 files\n",
      "\r",
      "[lineage] ⚠ views/x.sql: No target table found\n",
      "[lineage] done\n",
    ]);
  });
});
