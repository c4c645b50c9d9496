import { describe, expect, it } from "vitest";

import { MAX_CONTEXT_VALUE_LENGTH, safeContext } from "../index";

describe("safeContext", () => {
  it("returns undefined without a context", () => {
    expect(safeContext(undefined)).toBeUndefined();
  });

  it("returns undefined when every field is unset", () => {
    expect(safeContext({ path: undefined })).toBeUndefined();
  });

  it("keeps paths, database ids and row indexes as they are", () => {
    expect(
      safeContext({
        operation: "mapDataset",
        databaseId: "music_shop",
        path: "/data/questions.json",
        rowIndex: 3,
        field: undefined,
      }),
    ).toEqual({
      operation: "mapDataset",
      databaseId: "music_shop",
      path: "/data/questions.json",
      rowIndex: 3,
    });
  });

  it("shortens long status messages and says how much was cut", () => {
    const sql = `SELECT ${"a, ".repeat(200)}b FROM t`;

    const result = safeContext({ statusMessage: sql });

    expect(result?.statusMessage).toBe(
      `${sql.slice(0, MAX_CONTEXT_VALUE_LENGTH)}... [+${sql.length - MAX_CONTEXT_VALUE_LENGTH} chars]`,
    );
  });

  it("leaves a value of exactly the limit alone", () => {
    const text = "x".repeat(MAX_CONTEXT_VALUE_LENGTH);

    expect(safeContext({ statusMessage: text })).toEqual({
      statusMessage: text,
    });
  });
});
