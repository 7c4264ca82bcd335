import { describe, expect, it } from "vitest";
import { defaultExpandedPath } from "./runExpand.js";

describe(defaultExpandedPath.name, () => {
  it("appends _expanded to the input stem", () => {
    expect(defaultExpandedPath("out/lineage.csv")).toBe(
      "out/lineage_expanded.csv",
    );
  });

  it("writes beside an input in the working directory", () => {
    expect(defaultExpandedPath("lineage.csv")).toBe("lineage_expanded.csv");
  });

  it("adds .csv to an input without extension", () => {
    expect(defaultExpandedPath("/tmp/lineage")).toBe(
      "/tmp/lineage_expanded.csv",
    );
  });
});
