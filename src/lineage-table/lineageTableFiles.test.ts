import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { LineageRecord } from "../query/shared/LineageRecord.js";
import {
  readLineageTable,
  writeLineageTable,
  writeScriptTargetMapping,
} from "./lineageTableFiles.js";

const RECORD: LineageRecord = {
  target: { database: "db", table: "final" },
  layers: [
    [{ database: "db", table: "v1" }],
    [
      { database: "raw", table: "a" },
      { database: "raw", table: "b" },
    ],
  ],
  truncated: false,
  cyclic: false,
  ambiguities: [],
};

describe("lineage table files", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "table-lineage-files-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe(writeLineageTable.name, () => {
    it("writes CSV and creates parent directories", async () => {
      const path = join(dir, "out", "nested", "lineage.csv");

      await writeLineageTable(path, [RECORD]);

      expect(readFileSync(path, "utf-8")).toBe(
        "Target Table,Layer 1,Layer 2,Notes\ndb.final,db.v1,raw.a; raw.b,\n",
      );
    });
  });

  describe(readLineageTable.name, () => {
    it("reads back a written table", async () => {
      const path = join(dir, "lineage.csv");

      await writeLineageTable(path, [RECORD]);

      expect(await readLineageTable(path)).toEqual([RECORD]);
    });

    it("reads a CRLF table with quoted cells", async () => {
      const path = join(dir, "lineage.csv");
      writeFileSync(
        path,
        'Target Table,Layer 1\r\ndb.v1,"raw.a; raw.b"\r\n',
        "utf-8",
      );

      expect(await readLineageTable(path)).toEqual([
        {
          target: { database: "db", table: "v1" },
          layers: [
            [
              { database: "raw", table: "a" },
              { database: "raw", table: "b" },
            ],
          ],
          truncated: false,
          cyclic: false,
          ambiguities: [],
        },
      ]);
    });
  });

  describe(writeScriptTargetMapping.name, () => {
    it("writes one row per script and target", async () => {
      const path = join(dir, "mapping.csv");

      await writeScriptTargetMapping(path, [
        { scriptId: "jobs/etl.py", target: { database: "mart", table: "a" } },
        { scriptId: "jobs/etl.py", target: { database: "mart", table: "b" } },
        { scriptId: "views/v.sql", target: { table: "v" } },
      ]);

      expect(readFileSync(path, "utf-8")).toBe(
        "script name,target table\njobs/etl.py,mart.a\njobs/etl.py,mart.b\nviews/v.sql,v\n",
      );
    });
  });
});
