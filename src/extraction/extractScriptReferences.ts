import { extractProceduralReferences } from "./procedural/extractProceduralReferences.js";
import type {
  ExtractionOptions,
  ExtractionResult,
  ReferenceExtractor,
  ScriptKind,
} from "./ScriptKind.js";
import { extractSqlViewReferences } from "./sql/extractSqlViewReferences.js";

const EXTRACTORS: Record<ScriptKind, ReferenceExtractor> = {
  SqlView: extractSqlViewReferences,
  ProceduralScript: extractProceduralReferences,
};

export const DEFAULT_SESSION_NAMES = ["spark"] as const;

/**
 * Extract the tables a script writes (targets) and reads (sources).
 * Pure: the script is never executed, and the same text always yields the
 * same result.
 */
export const extractScriptReferences = (
  kind: ScriptKind,
  text: string,
  options: ExtractionOptions = { sessionNames: DEFAULT_SESSION_NAMES },
): ExtractionResult => EXTRACTORS[kind](text, options);
