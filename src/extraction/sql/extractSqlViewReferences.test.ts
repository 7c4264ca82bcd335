import { describe, expect, it } from "vitest";
import { extractSqlViewReferences } from "./extractSqlViewReferences.js";

const VIEW_SCRIPT = `--#########################################
--Purpose : DDL for creating view mart.sales_summary
--Usage   : beeline -f mart.sales_summary.sql
--#########################################

CREATE VIEW mart.sales_summary AS
SELECT
    region,
    amount
FROM stage.sales_clean
WHERE load_dt = (
    SELECT MAX(load_dt) FROM stage.sales_clean
)
;
`;

describe(extractSqlViewReferences.name, () => {
  it("extracts the created view and the tables it reads", () => {
    expect(extractSqlViewReferences(VIEW_SCRIPT)).toEqual({
      success: true,
      targets: ["mart.sales_summary"],
      sources: ["stage.sales_clean"],
    });
  });

  it("accepts OR REPLACE, modifiers and IF NOT EXISTS", () => {
    expect(
      extractSqlViewReferences(
        "create or replace temporary view if not exists mart.v as select * from raw.a join raw.b on a.k = b.k",
      ),
    ).toEqual({ success: true, targets: ["mart.v"], sources: ["raw.a", "raw.b"] });
  });

  it("accepts a view without a database", () => {
    expect(extractSqlViewReferences("CREATE VIEW v AS SELECT * FROM raw.a")).toEqual(
      { success: true, targets: ["v"], sources: ["raw.a"] },
    );
  });

  it("only scans the statement that creates the view", () => {
    expect(
      extractSqlViewReferences(
        "CREATE VIEW mart.v AS SELECT * FROM raw.a; SELECT * FROM raw.other;",
      ),
    ).toEqual({ success: true, targets: ["mart.v"], sources: ["raw.a"] });
  });

  it("fails with NoTargetFound when no view is created", () => {
    expect(extractSqlViewReferences("SELECT * FROM raw.a")).toEqual({
      success: false,
      code: "NoTargetFound",
      error: "No CREATE VIEW statement found",
    });
  });

  it("does not take a view mentioned in a comment as the target", () => {
    expect(
      extractSqlViewReferences("-- CREATE VIEW mart.old AS SELECT 1\nSELECT 1"),
    ).toMatchObject({ success: false, code: "NoTargetFound" });
  });

  it("returns the same result for the same text", () => {
    expect(extractSqlViewReferences(VIEW_SCRIPT)).toEqual(
      extractSqlViewReferences(VIEW_SCRIPT),
    );
  });
});
