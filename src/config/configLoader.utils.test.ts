import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DEFAULT_CONCURRENCY } from "../ingestion/loadCorpus.js";
import {
  CONFIG_FILE_NAME,
  findConfigFile,
  loadConfig,
  loadConfigOrDefault,
  parseConfig,
  resolveConfig,
} from "./configLoader.utils.js";

describe("configLoader.utils", () => {
  describe("CONFIG_FILE_NAME", () => {
    it("is lineage.config.json", () => {
      expect(CONFIG_FILE_NAME).toBe("lineage.config.json");
    });
  });

  describe(parseConfig.name, () => {
    it("parses valid config", () => {
      const config = {
        root: "./scripts",
        targets: ["mart.sales"],
        maxDepth: 10,
        sessionNames: ["spark", "ss"],
        output: { lineage: "out/lineage.csv" },
      };

      expect(parseConfig(JSON.stringify(config))).toEqual(config);
    });

    it("parses an empty object", () => {
      expect(parseConfig("{}")).toEqual({});
    });

    it("throws on invalid JSON", () => {
      expect(() => parseConfig("{ invalid }")).toThrow("Invalid JSON");
    });

    it("throws on a multi-character layer delimiter", () => {
      expect(() =>
        parseConfig(JSON.stringify({ layerDelimiter: "::" })),
      ).toThrow("layerDelimiter must be a single character");
    });

    it("throws on a layer delimiter that can appear in a table name", () => {
      for (const layerDelimiter of [".", "x", "7", "_", " "]) {
        expect(() => parseConfig(JSON.stringify({ layerDelimiter }))).toThrow(
          "layerDelimiter must not be a letter, digit",
        );
      }
    });

    it("accepts punctuation as layer delimiter", () => {
      expect(parseConfig(JSON.stringify({ layerDelimiter: "|" }))).toEqual({
        layerDelimiter: "|",
      });
    });

    it("throws on a non-positive max depth", () => {
      expect(() => parseConfig(JSON.stringify({ maxDepth: 0 }))).toThrow();
    });

    it("throws on an invalid session name", () => {
      expect(() =>
        parseConfig(JSON.stringify({ sessionNames: ["spark.read"] })),
      ).toThrow("Invalid session name");
    });
  });

  describe(resolveConfig.name, () => {
    it("applies defaults", () => {
      expect(resolveConfig({})).toEqual({
        root: undefined,
        targets: undefined,
        defaultDatabase: undefined,
        maxDepth: 100,
        caseSensitive: false,
        layerDelimiter: ";",
        sessionNames: ["spark"],
        concurrency: DEFAULT_CONCURRENCY,
        output: {
          lineage: "lineage.csv",
          mapping: "script_target_mapping.csv",
        },
      });
    });

    it("lets overrides win over file values", () => {
      const resolved = resolveConfig(
        { root: "./a", maxDepth: 5, caseSensitive: true },
        { root: "./b", maxDepth: undefined },
      );

      expect(resolved.root).toBe("./b");
      expect(resolved.maxDepth).toBe(5);
      expect(resolved.caseSensitive).toBe(true);
    });

    it("merges output paths key by key", () => {
      const resolved = resolveConfig(
        { output: { lineage: "file.csv", mapping: "map.csv" } },
        { output: { lineage: "cli.csv" } },
      );

      expect(resolved.output).toEqual({
        lineage: "cli.csv",
        mapping: "map.csv",
      });
    });

    it("validates the merged config", () => {
      expect(() => resolveConfig({}, { maxDepth: -1 })).toThrow();
    });
  });

  describe("config files", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "table-lineage-config-"));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("finds the config file in a directory", () => {
      writeFileSync(join(dir, CONFIG_FILE_NAME), "{}");

      expect(findConfigFile(dir)).toBe(join(dir, CONFIG_FILE_NAME));
    });

    it("returns null when there is no config file", () => {
      expect(findConfigFile(dir)).toBeNull();
    });

    it("loads a config file", () => {
      const path = join(dir, "custom.json");
      writeFileSync(path, JSON.stringify({ defaultDatabase: "mart" }));

      expect(loadConfig(path)).toEqual({ defaultDatabase: "mart" });
    });

    it("names the file when its JSON is malformed", () => {
      const path = join(dir, "broken.json");
      writeFileSync(path, "{");

      expect(() => loadConfig(path)).toThrow(
        `Failed to parse JSON config: ${path}`,
      );
    });

    it("throws when the file does not exist", () => {
      const path = join(dir, "missing.json");

      expect(() => loadConfig(path)).toThrow(`Config file not found: ${path}`);
    });

    it("falls back to an empty config", () => {
      expect(loadConfigOrDefault(undefined, dir)).toEqual({});
    });

    it("prefers an explicit path over the directory's config", () => {
      writeFileSync(
        join(dir, CONFIG_FILE_NAME),
        JSON.stringify({ maxDepth: 1 }),
      );
      const path = join(dir, "other.json");
      writeFileSync(path, JSON.stringify({ maxDepth: 2 }));

      expect(loadConfigOrDefault(path, dir)).toEqual({ maxDepth: 2 });
    });
  });
});
