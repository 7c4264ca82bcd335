import {
  mkdirSync,
  mkdtempSync,
  readFileSync,
  rmSync,
  writeFileSync,
} from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { LineageLogger } from "../logging/LineageLogger.js";
import { silentLogger } from "../logging/SilentLineageLogger.js";
import { createProgram } from "./createProgram.js";

const recordingLogger = (): LineageLogger & {
  errors: string[];
  warnings: string[];
} => {
  const errors: string[] = [];
  const warnings: string[] = [];
  return {
    ...silentLogger,
    errors,
    warnings,
    warn(message: string): void {
      warnings.push(message);
    },
    error(message: string): void {
      errors.push(message);
    },
  };
};

describe(createProgram.name, () => {
  let dir: string;
  let root: string;

  const write = (relativePath: string, content: string): void => {
    const path = join(root, relativePath);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, content);
  };

  const run = async (
    args: string[],
    logger: LineageLogger = silentLogger,
  ): Promise<void> => {
    await createProgram({ cwd: dir, logger })
      .exitOverride()
      .parseAsync(args, { from: "user" });
  };

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "table-lineage-cli-"));
    root = join(dir, "scripts");
    write(
      "views/v1.sql",
      "CREATE VIEW db.V1 AS SELECT * FROM raw.A JOIN raw.B ON A.k = B.k;",
    );
    write(
      "jobs/s2.py",
      ['df = spark.table("db.v1")', 'df.write.insertInto("db.Final")', ""].join(
        "\n",
      ),
    );
    write("legacy/report.sas", "data work.x; set raw.y; run;");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("traces a target and writes the lineage table and mapping", async () => {
    const lineage = join(dir, "out", "lineage.csv");
    const mapping = join(dir, "out", "mapping.csv");

    await run([
      "trace",
      "db.final",
      "--root",
      root,
      "--out",
      lineage,
      "--mapping-out",
      mapping,
      "--quiet",
    ]);

    expect(readFileSync(lineage, "utf-8")).toBe(
      "Target Table,Layer 1,Layer 2,Notes\ndb.final,db.v1,raw.a; raw.b,\n",
    );
    expect(readFileSync(mapping, "utf-8")).toBe(
      "script name,target table\njobs/s2.py,db.final\nviews/v1.sql,db.v1\n",
    );
  });

  it("traces every indexed target when none is given", async () => {
    const lineage = join(dir, "lineage.csv");

    await run([
      "trace",
      "--root",
      root,
      "--out",
      lineage,
      "--mapping-out",
      join(dir, "mapping.csv"),
      "--quiet",
    ]);

    expect(readFileSync(lineage, "utf-8")).toBe(
      "Target Table,Layer 1,Layer 2,Notes\ndb.final,db.v1,raw.a; raw.b,\ndb.v1,raw.a; raw.b,,\n",
    );
  });

  it("logs a malformed target and traces the others", async () => {
    const logger = recordingLogger();
    const lineage = join(dir, "lineage.csv");

    await run(
      [
        "trace",
        "db.",
        "db.v1",
        "--root",
        root,
        "--out",
        lineage,
        "--mapping-out",
        join(dir, "mapping.csv"),
      ],
      logger,
    );

    expect(logger.errors).toEqual([
      "Invalid table reference 'db.': empty table name",
    ]);
    expect(logger.warnings).toEqual([
      "legacy/report.sas: SAS scripts are not supported yet",
    ]);
    expect(readFileSync(lineage, "utf-8")).toBe(
      "Target Table,Layer 1,Notes\ndb.v1,raw.a; raw.b,\n",
    );
  });

  it("writes the mapping only with map", async () => {
    const mapping = join(dir, "mapping.csv");

    await run(["map", "--root", root, "--out", mapping, "--quiet"]);

    expect(readFileSync(mapping, "utf-8")).toBe(
      "script name,target table\njobs/s2.py,db.final\nviews/v1.sql,db.v1\n",
    );
  });

  it("reads root and outputs from the config file", async () => {
    const mapping = join(dir, "from-config.csv");
    writeFileSync(
      join(dir, "lineage.config.json"),
      JSON.stringify({ root, output: { mapping } }),
    );

    await run(["map", "--quiet"]);

    expect(readFileSync(mapping, "utf-8")).toBe(
      "script name,target table\njobs/s2.py,db.final\nviews/v1.sql,db.v1\n",
    );
  });

  it("fails without a script root", async () => {
    await expect(run(["map", "--quiet"])).rejects.toThrow(
      'No script root: pass --root or set "root" in lineage.config.json',
    );
  });

  it("expands a lineage table next to its input", async () => {
    const lineage = join(dir, "lineage.csv");
    writeFileSync(
      lineage,
      "Target Table,Layer 1,Layer 2,Notes\ndb.final,db.v1,raw.a; raw.b,\n",
    );

    await run(["expand", lineage, "--quiet"]);

    expect(readFileSync(join(dir, "lineage_expanded.csv"), "utf-8")).toBe(
      [
        "Target Table,Layer 1,Layer 2,Notes",
        "db.final,db.v1,raw.a; raw.b,",
        "db.v1,raw.a; raw.b,,",
        "raw.a,,,",
        "raw.b,,,",
        "",
      ].join("\n"),
    );
  });

  it("expands to the given output path", async () => {
    const lineage = join(dir, "lineage.csv");
    const output = join(dir, "out", "expanded.csv");
    writeFileSync(lineage, "Target Table,Layer 1\ndb.a,raw.b\n");

    await run(["expand", lineage, "--output", output, "--quiet"]);

    expect(readFileSync(output, "utf-8")).toBe(
      "Target Table,Layer 1,Notes\ndb.a,raw.b,\nraw.b,,\n",
    );
  });

  it("rejects a lineage table with unknown notes", async () => {
    const lineage = join(dir, "lineage.csv");
    writeFileSync(lineage, "Target Table,Notes\ndb.a,stale\n");

    await expect(run(["expand", lineage, "--quiet"])).rejects.toThrow(
      "Row 2: Unknown note 'stale'",
    );
  });
});
