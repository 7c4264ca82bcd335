import { z } from "zod";

// --- Schemas ---

export const OutputConfigSchema = z.object({
  /** Lineage table path (default: 'lineage.csv') */
  lineage: z.string().min(1).optional(),
  /** Script→target mapping path (default: 'script_target_mapping.csv') */
  mapping: z.string().min(1).optional(),
});

/** Lineage configuration schema (lineage.config.json) */
export const LineageConfigSchema = z.object({
  /** Directory holding the script corpus */
  root: z.string().min(1).optional(),
  /** Tables to trace (default: every indexed target) */
  targets: z.array(z.string().min(1)).optional(),
  /** Database applied to bare table names */
  defaultDatabase: z.string().min(1).optional(),
  /** Maximum number of layers per trace (default: 100) */
  maxDepth: z.number().int().positive().optional(),
  /** Keep identifier case (default: false, names are lower-cased) */
  caseSensitive: z.boolean().optional(),
  /**
   * Single character between the tables of a layer cell (default: ';').
   * Never a character that can appear in a table name.
   */
  layerDelimiter: z
    .string()
    .length(1, "layerDelimiter must be a single character")
    .regex(
      /^[^\p{L}\p{N}_$.\s]$/u,
      "layerDelimiter must not be a letter, digit, '_', '$', '.' or whitespace",
    )
    .optional(),
  /** Receiver names treated as a Spark session (default: ['spark']) */
  sessionNames: z
    .array(z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "Invalid session name"))
    .min(1)
    .optional(),
  /** Maximum number of files read at once (default: CPU count, minimum 2) */
  concurrency: z.number().int().positive().optional(),
  /** Output file paths */
  output: OutputConfigSchema.optional(),
});

// --- Inferred Types ---

export type LineageConfig = z.infer<typeof LineageConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;

/**
 * Configuration with every default applied.
 */
export interface ResolvedLineageConfig {
  root?: string;
  targets?: string[];
  defaultDatabase?: string;
  maxDepth: number;
  caseSensitive: boolean;
  layerDelimiter: string;
  sessionNames: string[];
  concurrency: number;
  output: Required<OutputConfig>;
}
