import { describe, expect, it, vi } from "vitest";

import { mapDataset } from "../dataset-mapper";
import type { NameMappingRecord } from "../types";

const mappings: Record<string, NameMappingRecord> = {
  shop: { tables: { orders: "t1" }, columns: { total: "c1" } },
};

describe("mapDataset", () => {
  it("adds a mapped field for every query field", () => {
    const { rows, stats } = mapDataset(
      [{ dbid: "shop", q1: "SELECT total FROM orders", q2: "SELECT 1" }],
      mappings,
      { strategy: "textual" },
    );

    expect(rows).toEqual([
      {
        dbid: "shop",
        q1: "SELECT total FROM orders",
        q2: "SELECT 1",
        q1_mapped: "SELECT c1 FROM t1",
        q2_mapped: "SELECT 1",
      },
    ]);
    expect(stats).toEqual({
      q1: { mapped: 1, failed: 0, skipped: 0 },
      q2: { mapped: 1, failed: 0, skipped: 0 },
    });
  });

  it("keeps original columns first, then the derived ones", () => {
    const { rows } = mapDataset(
      [{ dbid: "shop", q1: "SELECT 1", q2: "SELECT 2" }],
      mappings,
    );

    expect(Object.keys(rows[0] ?? {})).toEqual([
      "dbid",
      "q1",
      "q2",
      "q1_mapped",
      "q2_mapped",
    ]);
  });

  it("passes queries through unchanged when the database has no mapping", () => {
    const onMissingMapping = vi.fn();

    const { rows } = mapDataset(
      [
        { dbid: "library", q1: "SELECT  title FROM books", q2: "" },
        { dbid: "library", q1: "SELECT 1", q2: "" },
      ],
      mappings,
      { onMissingMapping },
    );

    expect(rows.map((row) => row.q1_mapped)).toEqual([
      "SELECT  title FROM books",
      "SELECT 1",
    ]);
    expect(onMissingMapping).toHaveBeenCalledTimes(1);
    expect(onMissingMapping).toHaveBeenCalledWith("library");
  });

  it("leaves the derived field empty for empty or absent sources", () => {
    const { rows, stats } = mapDataset(
      [{ dbid: "shop", q1: "" }],
      mappings,
    );

    expect(rows[0]?.q1_mapped).toBeNull();
    expect(rows[0]?.q2_mapped).toBeNull();
    expect(stats.q1).toEqual({ mapped: 0, failed: 0, skipped: 1 });
    expect(stats.q2).toEqual({ mapped: 0, failed: 0, skipped: 1 });
  });

  it("records a failure and keeps going when a query does not parse", () => {
    const onFailure = vi.fn();

    const { rows, stats } = mapDataset(
      [
        { dbid: "shop", q1: "SELEC total FRM orders" },
        { dbid: "shop", q1: "SELECT total FROM orders" },
      ],
      mappings,
      { queryFields: ["q1"], onFailure },
    );

    expect(rows[0]?.q1_mapped).toBeNull();
    expect(rows[1]?.q1_mapped).toEqual(expect.any(String));
    expect(stats.q1).toEqual({ mapped: 1, failed: 1, skipped: 0 });
    expect(onFailure).toHaveBeenCalledTimes(1);
    expect(onFailure).toHaveBeenCalledWith(
      expect.objectContaining({
        rowIndex: 0,
        field: "q1",
        databaseId: "shop",
        error: expect.objectContaining({ code: "PARSE_ERROR" }),
      }),
    );
  });

  it("reports progress at the configured interval", () => {
    const onProgress = vi.fn();
    const input = Array.from({ length: 5 }, () => ({
      dbid: "shop",
      q1: "SELECT 1",
    }));

    mapDataset(input, mappings, {
      queryFields: ["q1"],
      progressInterval: 2,
      onProgress,
    });

    expect(onProgress.mock.calls).toEqual([
      [2, 5],
      [4, 5],
    ]);
  });

  it("reads custom id and query fields", () => {
    const { rows } = mapDataset(
      [{ database: "shop", sql: "SELECT total FROM orders" }],
      mappings,
      { databaseIdField: "database", queryFields: ["sql"], strategy: "textual" },
    );

    expect(rows[0]?.sql_mapped).toBe("SELECT c1 FROM t1");
  });
});
