import { readFile, stat } from "node:fs/promises";
import { cpus } from "node:os";
import { basename, join, resolve } from "node:path";
import { from, lastValueFrom } from "rxjs";
import { mergeMap, tap, toArray } from "rxjs/operators";
import type { Diagnostic } from "../db/Types.js";
import type { ScriptKind } from "../extraction/ScriptKind.js";
import type { LineageLogger } from "../logging/LineageLogger.js";
import { classifyScript } from "./classifyScript.js";
import { decodeScriptText } from "./decodeScriptText.js";
import { listScriptFiles } from "./listScriptFiles.js";

/** Default concurrency based on CPU cores (minimum 2) */
export const DEFAULT_CONCURRENCY = Math.max(2, cpus().length);

/**
 * A script read from the corpus, ready for extraction.
 */
export interface ScriptSource {
  /** Root-relative path with forward slashes */
  scriptId: string;
  kind: ScriptKind;
  text: string;
}

export interface LoadCorpusOptions {
  /** Maximum number of files read at once */
  concurrency?: number;
  /** Logger for progress reporting */
  logger: LineageLogger;
}

export interface Corpus {
  /** Readable scripts, sorted by id */
  scripts: ScriptSource[];
  /** Unsupported and unreadable files, sorted by id */
  diagnostics: Diagnostic[];
}

interface PendingScript {
  scriptId: string;
  kind: ScriptKind;
}

const byScriptId = (a: { scriptId: string }, b: { scriptId: string }): number =>
  a.scriptId < b.scriptId ? -1 : a.scriptId > b.scriptId ? 1 : 0;

/**
 * Load every script under `root`.
 *
 * Files are read concurrently. A file or subdirectory that cannot be read
 * becomes a ReadError diagnostic and the scan goes on; a root that cannot
 * be read is fatal.
 *
 * @throws when `root` does not exist or is not a directory
 */
export const loadCorpus = async (
  root: string,
  options: LoadCorpusOptions,
): Promise<Corpus> => {
  const { logger } = options;
  const absoluteRoot = resolve(root);

  const rootStats = await stat(absoluteRoot);
  if (!rootStats.isDirectory()) {
    throw new Error(`Script root is not a directory: ${absoluteRoot}`);
  }

  const listing = await listScriptFiles(absoluteRoot);
  const files = listing.files;
  const diagnostics: Diagnostic[] = [...listing.diagnostics];
  const pending: PendingScript[] = [];

  for (const file of files) {
    const classification = classifyScript(file);
    if (classification === undefined) {
      continue;
    }
    if (classification.supported) {
      pending.push({ scriptId: file, kind: classification.kind });
    } else {
      diagnostics.push({
        kind: "UnsupportedScript",
        scriptId: file,
        message: `${classification.dialect} scripts are not supported yet`,
      });
    }
  }

  logger.startProgress(pending.length, basename(absoluteRoot));

  let filesRead = 0;
  const results = await lastValueFrom(
    from(pending).pipe(
      mergeMap(async ({ scriptId, kind }) => {
        try {
          const bytes = await readFile(join(absoluteRoot, scriptId));
          return {
            success: true as const,
            script: { scriptId, kind, text: decodeScriptText(bytes) },
          };
        } catch (e) {
          const message = e instanceof Error ? e.message : String(e);
          return {
            success: false as const,
            diagnostic: {
              kind: "ReadError" as const,
              scriptId,
              message: `Failed to read ${scriptId}: ${message}`,
            },
          };
        }
      }, options.concurrency ?? DEFAULT_CONCURRENCY),
      tap(() => {
        filesRead++;
        logger.updateProgress(filesRead);
      }),
      toArray(),
    ),
    { defaultValue: [] },
  );

  const scripts: ScriptSource[] = [];
  for (const result of results) {
    if (result.success) {
      scripts.push(result.script);
    } else {
      diagnostics.push(result.diagnostic);
    }
  }

  logger.completeProgress({
    filesRead,
    scriptsLoaded: scripts.length,
    diagnostics,
  });

  return {
    scripts: scripts.sort(byScriptId),
    diagnostics: diagnostics.sort(byScriptId),
  };
};
