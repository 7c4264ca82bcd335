import { extname } from "node:path";
import type { ScriptKind } from "../extraction/ScriptKind.js";

export type ScriptClassification =
  | { supported: true; kind: ScriptKind }
  | { supported: false; dialect: string };

const SUPPORTED = new Map<string, ScriptKind>([
  [".sql", "SqlView"],
  [".py", "ProceduralScript"],
]);

/** Script dialects found in corpora that no extractor handles yet */
const UNSUPPORTED = new Map<string, string>([[".sas", "SAS"]]);

/**
 * Classify a script by file extension (case-insensitive).
 * Returns undefined for files that are not scripts at all.
 *
 * @example
 * classifyScript("views/sales.SQL") // { supported: true, kind: "SqlView" }
 * classifyScript("jobs/load.sas") // { supported: false, dialect: "SAS" }
 * classifyScript("README.md") // undefined
 */
export const classifyScript = (
  path: string,
): ScriptClassification | undefined => {
  const extension = extname(path).toLowerCase();
  const kind = SUPPORTED.get(extension);
  if (kind !== undefined) {
    return { supported: true, kind };
  }
  const dialect = UNSUPPORTED.get(extension);
  if (dialect !== undefined) {
    return { supported: false, dialect };
  }
  return undefined;
};
