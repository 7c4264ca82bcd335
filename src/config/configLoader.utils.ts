import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { DEFAULT_SESSION_NAMES } from "../extraction/extractScriptReferences.js";
import { DEFAULT_CONCURRENCY } from "../ingestion/loadCorpus.js";
import { DEFAULT_LAYER_DELIMITER } from "../lineage-table/lineageRows.js";
import { DEFAULT_MAX_DEPTH } from "../query/trace-lineage/traceLineage.js";
import {
  type LineageConfig,
  LineageConfigSchema,
  type ResolvedLineageConfig,
} from "./Config.schemas.js";

/**
 * Supported config file name, looked up in the working directory.
 */
export const CONFIG_FILE_NAME = "lineage.config.json" as const;

export const DEFAULT_LINEAGE_OUTPUT = "lineage.csv";
export const DEFAULT_MAPPING_OUTPUT = "script_target_mapping.csv";

/**
 * Find a config file in the given directory.
 *
 * @returns Path to config file, or null if not found
 */
export const findConfigFile = (directory: string): string | null => {
  const configPath = join(directory, CONFIG_FILE_NAME);
  return existsSync(configPath) ? configPath : null;
};

/**
 * Parse and validate config content.
 *
 * @throws Error if JSON is invalid or config structure is invalid
 */
export const parseConfig = (content: string): LineageConfig => {
  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(content);
  } catch {
    throw new Error("Invalid JSON");
  }

  return LineageConfigSchema.parse(rawConfig);
};

/**
 * Load and validate a JSON config file.
 */
export const loadConfig = (configPath: string): LineageConfig => {
  if (!existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }

  try {
    const content = readFileSync(configPath, "utf-8");
    return parseConfig(content);
  } catch (e) {
    if (e instanceof Error && e.message === "Invalid JSON") {
      throw new Error(`Failed to parse JSON config: ${configPath}`);
    }
    throw e;
  }
};

const definedEntries = (value: object): Record<string, unknown> =>
  Object.fromEntries(
    Object.entries(value).filter(([, entry]) => entry !== undefined),
  );

/**
 * Merge command-line overrides over file config, validate the result and
 * apply defaults. Undefined overrides leave the file value in place.
 *
 * @throws ZodError when the merged config is invalid
 */
export const resolveConfig = (
  fileConfig: LineageConfig,
  overrides: LineageConfig = {},
): ResolvedLineageConfig => {
  const merged = LineageConfigSchema.parse({
    ...definedEntries(fileConfig),
    ...definedEntries(overrides),
    output: {
      ...definedEntries(fileConfig.output ?? {}),
      ...definedEntries(overrides.output ?? {}),
    },
  });

  return {
    root: merged.root,
    targets: merged.targets,
    defaultDatabase: merged.defaultDatabase,
    maxDepth: merged.maxDepth ?? DEFAULT_MAX_DEPTH,
    caseSensitive: merged.caseSensitive ?? false,
    layerDelimiter: merged.layerDelimiter ?? DEFAULT_LAYER_DELIMITER,
    sessionNames: merged.sessionNames ?? [...DEFAULT_SESSION_NAMES],
    concurrency: merged.concurrency ?? DEFAULT_CONCURRENCY,
    output: {
      lineage: merged.output?.lineage ?? DEFAULT_LINEAGE_OUTPUT,
      mapping: merged.output?.mapping ?? DEFAULT_MAPPING_OUTPUT,
    },
  };
};

/**
 * Load the config named on the command line, or the one in `directory`,
 * or an empty config when there is none.
 */
export const loadConfigOrDefault = (
  configPath: string | undefined,
  directory: string,
): LineageConfig => {
  const path = configPath ?? findConfigFile(directory);
  return path === null ? {} : loadConfig(path);
};
