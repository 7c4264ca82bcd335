#!/usr/bin/env node

/**
 * table-lineage entry point
 *
 * Usage:
 *   table-lineage trace [targets...] --root ./scripts   # Index and trace
 *   table-lineage map --root ./scripts                  # Mapping only
 *   table-lineage expand lineage.csv                    # Promote layer tables
 */

import { createProgram } from "./src/cli/createProgram.js";
import { formatError } from "./src/cli/formatError.js";
import { createConsoleLineageLogger } from "./src/logging/ConsoleLineageLogger.js";

const logger = createConsoleLineageLogger();

createProgram({ logger })
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    logger.error(formatError(err));
    process.exitCode = 1;
  });
