/** Kinds of script the extractor understands */
export const SCRIPT_KINDS = ["SqlView", "ProceduralScript"] as const;

export type ScriptKind = (typeof SCRIPT_KINDS)[number];

export type ExtractionFailureCode = "NoTargetFound" | "Unparseable";

/**
 * Outcome of extracting table references from one script.
 * Names are returned as written (unquoted); normalization happens at indexing.
 */
export type ExtractionResult =
  | { success: true; targets: string[]; sources: string[] }
  | { success: false; code: ExtractionFailureCode; error: string };

export interface ExtractionOptions {
  /** Receiver names treated as a Spark session (`spark.table(...)`) */
  sessionNames: readonly string[];
}

export type ReferenceExtractor = (
  text: string,
  options: ExtractionOptions,
) => ExtractionResult;
