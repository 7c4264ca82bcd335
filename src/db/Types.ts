import type { ScriptKind } from "../extraction/ScriptKind.js";
import type { TableRef } from "../tables/TableRef.js";

// Script Record
export interface ScriptRecord {
  /** Root-relative path with forward slashes, e.g. "views/mart/sales.sql" */
  scriptId: string;

  kind: ScriptKind;

  /** Tables the script writes (sorted, unique) */
  targets: TableRef[];

  /** Tables the script reads (sorted, unique, never one of its targets) */
  sources: TableRef[];
}

// One row of the script→target mapping artifact
export interface ScriptTargetPair {
  scriptId: string;
  target: TableRef;
}

// Per-file problems reported during a scan
export type DiagnosticKind =
  | "NoTargetFound"
  | "Unparseable"
  | "UnsupportedScript"
  | "ReadError";

export interface Diagnostic {
  kind: DiagnosticKind;
  scriptId: string;
  message: string;
}

// Index Result
export interface IndexResult {
  /** Number of scripts handed to the extractor */
  scriptsScanned: number;

  /** Number of scripts with at least one target */
  scriptsIndexed: number;

  /** Number of distinct targets in the index */
  targetsIndexed: number;

  /** One entry per (script, target) pair, sorted by script then target */
  mapping: ScriptTargetPair[];

  /** Non-fatal problems, one per affected script */
  diagnostics: Diagnostic[];

  /** Duration in milliseconds */
  durationMs: number;
}
