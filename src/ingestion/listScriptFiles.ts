import { readdir } from "node:fs/promises";
import { join } from "node:path";
import type { Diagnostic } from "../db/Types.js";

const SKIPPED_DIRECTORIES = new Set(["node_modules"]);

const isSkippedDirectory = (name: string): boolean =>
  name.startsWith(".") || SKIPPED_DIRECTORIES.has(name);

export interface ScriptFileListing {
  /** Root-relative paths with forward slashes, sorted */
  files: string[];
  /** One ReadError per subdirectory that could not be listed */
  diagnostics: Diagnostic[];
}

/**
 * List every file under `root`. Skips node_modules and dot directories.
 * Symbolic links are listed as files and never followed as directories.
 * A subdirectory that cannot be listed becomes a diagnostic.
 *
 * @throws when `root` cannot be read
 */
export const listScriptFiles = async (
  root: string,
): Promise<ScriptFileListing> => {
  const files: string[] = [];
  const diagnostics: Diagnostic[] = [];

  const walk = async (relativeDir: string): Promise<void> => {
    const entries = await readdir(join(root, relativeDir), {
      withFileTypes: true,
    });
    for (const entry of entries) {
      const relativePath =
        relativeDir === "" ? entry.name : `${relativeDir}/${entry.name}`;
      if (entry.isDirectory()) {
        if (!isSkippedDirectory(entry.name)) {
          await walkSubdirectory(relativePath);
        }
      } else if (entry.isFile() || entry.isSymbolicLink()) {
        files.push(relativePath);
      }
    }
  };

  const walkSubdirectory = async (relativeDir: string): Promise<void> => {
    try {
      await walk(relativeDir);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      diagnostics.push({
        kind: "ReadError",
        scriptId: relativeDir,
        message: `Failed to list ${relativeDir}: ${message}`,
      });
    }
  };

  await walk("");
  return {
    files: files.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0)),
    diagnostics,
  };
};
