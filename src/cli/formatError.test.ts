import { describe, expect, it } from "vitest";
import { LineageConfigSchema } from "../config/Config.schemas.js";
import { formatError } from "./formatError.js";

describe(formatError.name, () => {
  it("lists schema issues with their paths", () => {
    const result = LineageConfigSchema.safeParse({ layerDelimiter: "::" });
    if (result.success) {
      throw new Error("expected a schema violation");
    }

    expect(formatError(result.error)).toBe(
      "Invalid configuration: layerDelimiter: layerDelimiter must be a single character",
    );
  });

  it("uses the message of other errors", () => {
    expect(formatError(new Error("Config file not found: x.json"))).toBe(
      "Config file not found: x.json",
    );
  });

  it("stringifies non-errors", () => {
    expect(formatError("boom")).toBe("boom");
  });
});
