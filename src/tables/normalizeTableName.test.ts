import { describe, expect, it } from "vitest";
import { InvalidReferenceError } from "./InvalidReferenceError.js";
import { normalizeTableName } from "./normalizeTableName.js";

describe(normalizeTableName.name, () => {
  it("splits a qualified name on the first dot", () => {
    expect(normalizeTableName("sales.orders")).toEqual({
      database: "sales",
      table: "orders",
    });
  });

  it("keeps everything after the first dot as the table name", () => {
    expect(normalizeTableName("a.b.c")).toEqual({ database: "a", table: "b.c" });
  });

  it("leaves the database unset for a bare name", () => {
    const ref = normalizeTableName("orders");

    expect(ref.table).toBe("orders");
    expect(ref.database).toBeUndefined();
  });

  it("applies the default database to a bare name", () => {
    expect(normalizeTableName("orders", { defaultDatabase: "stage" })).toEqual({
      database: "stage",
      table: "orders",
    });
  });

  it("does not override an explicit database with the default", () => {
    expect(
      normalizeTableName("sales.orders", { defaultDatabase: "stage" }),
    ).toEqual({ database: "sales", table: "orders" });
  });

  it("lower-cases both parts by default", () => {
    expect(normalizeTableName("Sales.ORDERS")).toEqual({
      database: "sales",
      table: "orders",
    });
  });

  it("keeps case when case-sensitive", () => {
    expect(normalizeTableName("Sales.ORDERS", { caseSensitive: true })).toEqual(
      { database: "Sales", table: "ORDERS" },
    );
  });

  it("strips identifier quotes and surrounding whitespace", () => {
    expect(normalizeTableName("  `sales`.[orders] ")).toEqual({
      database: "sales",
      table: "orders",
    });
  });

  it("rejects an empty name", () => {
    expect(() => normalizeTableName("   ")).toThrow(InvalidReferenceError);
  });

  it("rejects an empty part", () => {
    expect(() => normalizeTableName("sales.")).toThrow(
      "Invalid table reference 'sales.': empty table name",
    );
    expect(() => normalizeTableName(".orders")).toThrow(
      "Invalid table reference '.orders': empty database name",
    );
  });

  it("returns the input as the table for any dot-free name", () => {
    for (const name of ["x", "weird name", "t_1", "表"]) {
      expect(normalizeTableName(name, { caseSensitive: true })).toEqual({
        table: name,
      });
    }
  });
});
