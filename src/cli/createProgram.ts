import { Command, InvalidArgumentError } from "commander";
import type {
  LineageConfig,
  ResolvedLineageConfig,
} from "../config/Config.schemas.js";
import {
  loadConfigOrDefault,
  resolveConfig,
} from "../config/configLoader.utils.js";
import { createConsoleLineageLogger } from "../logging/ConsoleLineageLogger.js";
import type { LineageLogger } from "../logging/LineageLogger.js";
import { silentLogger } from "../logging/SilentLineageLogger.js";
import { runExpand } from "./runExpand.js";
import { runMap } from "./runMap.js";
import { runTrace } from "./runTrace.js";

interface CommonOptions {
  config?: string;
  quiet?: boolean;
}

interface TraceCommandOptions extends CommonOptions {
  root?: string;
  defaultDatabase?: string;
  maxDepth?: number;
  caseSensitive?: boolean;
  out?: string;
  mappingOut?: string;
}

interface MapCommandOptions extends CommonOptions {
  root?: string;
  out?: string;
}

interface ExpandCommandOptions extends CommonOptions {
  output?: string;
}

export interface ProgramOptions {
  /** Directory searched for lineage.config.json (default: process.cwd()) */
  cwd?: string;
  /** Logger used unless --quiet is given (default: console logger) */
  logger?: LineageLogger;
}

const parsePositiveInt = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
};

/**
 * Build the table-lineage command line.
 *
 * @example
 * ```bash
 * table-lineage trace mart.sales --root ./scripts
 * table-lineage map --root ./scripts --out mapping.csv
 * table-lineage expand lineage.csv
 * ```
 */
export const createProgram = (options: ProgramOptions = {}): Command => {
  const cwd = options.cwd ?? process.cwd();

  const loggerFor = (quiet: boolean | undefined): LineageLogger =>
    quiet ? silentLogger : (options.logger ?? createConsoleLineageLogger());

  const configFor = (
    commandOptions: CommonOptions,
    overrides: LineageConfig,
  ): ResolvedLineageConfig =>
    resolveConfig(loadConfigOrDefault(commandOptions.config, cwd), overrides);

  const program = new Command();

  program
    .name("table-lineage")
    .description("Bottom-up table lineage for SQL views and Spark scripts")
    .version("0.1.0");

  program
    .command("trace")
    .description("Index the scripts and trace the lineage of target tables")
    .argument("[targets...]", "Tables to trace (default: every indexed target)")
    .option("--root <dir>", "Directory holding the scripts")
    .option("--default-database <name>", "Database applied to bare names")
    .option("--max-depth <n>", "Maximum number of layers", parsePositiveInt)
    .option("--case-sensitive", "Keep identifier case")
    .option("--out <path>", "Lineage table to write")
    .option("--mapping-out <path>", "Script→target mapping to write")
    .option("--config <path>", "Config file")
    .option("--quiet", "Suppress output")
    .action(async (targets: string[], commandOptions: TraceCommandOptions) => {
      const config = configFor(commandOptions, {
        root: commandOptions.root,
        targets: targets.length > 0 ? targets : undefined,
        defaultDatabase: commandOptions.defaultDatabase,
        maxDepth: commandOptions.maxDepth,
        caseSensitive: commandOptions.caseSensitive,
        output: {
          lineage: commandOptions.out,
          mapping: commandOptions.mappingOut,
        },
      });
      await runTrace(config, loggerFor(commandOptions.quiet));
    });

  program
    .command("map")
    .description("Index the scripts and write the script→target mapping")
    .option("--root <dir>", "Directory holding the scripts")
    .option("--out <path>", "Script→target mapping to write")
    .option("--config <path>", "Config file")
    .option("--quiet", "Suppress output")
    .action(async (commandOptions: MapCommandOptions) => {
      const config = configFor(commandOptions, {
        root: commandOptions.root,
        output: { mapping: commandOptions.out },
      });
      await runMap(config, loggerFor(commandOptions.quiet));
    });

  program
    .command("expand")
    .description("Promote layer tables of a lineage table to target rows")
    .argument("<input>", "Lineage table to expand")
    .option("--output <path>", "Expanded table (default: <input>_expanded.csv)")
    .option("--config <path>", "Config file")
    .option("--quiet", "Suppress output")
    .action(async (input: string, commandOptions: ExpandCommandOptions) => {
      const config = configFor(commandOptions, {});
      await runExpand(
        input,
        commandOptions.output,
        config,
        loggerFor(commandOptions.quiet),
      );
    });

  return program;
};
