import type { DbWriter } from "../db/DbWriter.js";
import type {
  Diagnostic,
  IndexResult,
  ScriptRecord,
  ScriptTargetPair,
} from "../db/Types.js";
import {
  DEFAULT_SESSION_NAMES,
  extractScriptReferences,
} from "../extraction/extractScriptReferences.js";
import { InvalidReferenceError } from "../tables/InvalidReferenceError.js";
import {
  type NormalizeOptions,
  normalizeTableName,
} from "../tables/normalizeTableName.js";
import {
  compareTableRefs,
  type TableRef,
  tableKey,
  toSortedSet,
} from "../tables/TableRef.js";
import type { ScriptSource } from "./loadCorpus.js";

/**
 * Options for building the dependency index.
 */
export interface IndexScriptsOptions extends NormalizeOptions {
  /** Receiver names treated as a Spark session (default: ["spark"]) */
  sessionNames?: readonly string[];
}

const compareMappingRows = (
  a: ScriptTargetPair,
  b: ScriptTargetPair,
): number => {
  if (a.scriptId !== b.scriptId) {
    return a.scriptId < b.scriptId ? -1 : 1;
  }
  return compareTableRefs(a.target, b.target);
};

/**
 * Build the dependency index from a corpus of scripts.
 *
 * Each script is extracted and its table names normalized. Scripts with at
 * least one target are written to the index in one transaction, reachable
 * from each of their targets. Scripts without targets, and scripts the
 * extractor cannot parse, are reported as diagnostics.
 *
 * @returns Indexing statistics and the script→target mapping
 */
export const indexScripts = (
  scripts: Iterable<ScriptSource>,
  dbWriter: DbWriter,
  options: IndexScriptsOptions = {},
): IndexResult => {
  const startTime = Date.now();
  const sessionNames = options.sessionNames ?? DEFAULT_SESSION_NAMES;
  const records: ScriptRecord[] = [];
  const diagnostics: Diagnostic[] = [];
  let scriptsScanned = 0;

  for (const script of scripts) {
    scriptsScanned++;
    const { scriptId } = script;

    const result = extractScriptReferences(script.kind, script.text, {
      sessionNames,
    });
    if (!result.success) {
      diagnostics.push({ kind: result.code, scriptId, message: result.error });
      continue;
    }

    const normalize = (names: string[]): TableRef[] => {
      const refs: TableRef[] = [];
      for (const name of names) {
        try {
          refs.push(normalizeTableName(name, options));
        } catch (e) {
          if (!(e instanceof InvalidReferenceError)) {
            throw e;
          }
          diagnostics.push({
            kind: "Unparseable",
            scriptId,
            message: e.message,
          });
        }
      }
      return toSortedSet(refs);
    };

    const targets = normalize(result.targets);
    if (targets.length === 0) {
      diagnostics.push({
        kind: "NoTargetFound",
        scriptId,
        message: "No target table found",
      });
      continue;
    }

    const targetKeys = new Set(targets.map(tableKey));
    const sources = normalize(result.sources).filter(
      (source) => !targetKeys.has(tableKey(source)),
    );

    records.push({ scriptId, kind: script.kind, targets, sources });
  }

  dbWriter.addScripts(records);

  const mapping = records
    .flatMap((record) =>
      record.targets.map((target) => ({ scriptId: record.scriptId, target })),
    )
    .sort(compareMappingRows);

  return {
    scriptsScanned,
    scriptsIndexed: records.length,
    targetsIndexed: new Set(mapping.map((row) => tableKey(row.target))).size,
    mapping,
    diagnostics,
    durationMs: Date.now() - startTime,
  };
};
