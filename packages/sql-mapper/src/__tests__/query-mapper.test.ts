import { describe, expect, it } from "vitest";

import { createIdentifierMapping } from "../identifier-mapping";
import { mapQuery } from "../query-mapper";

describe("mapQuery", () => {
  const mapping = createIdentifierMapping({
    tables: { users: "t1" },
    columns: { name: "c2" },
  });

  it("uses the structural strategy by default", () => {
    const result = mapQuery("SELECT name FROM users", mapping);

    expect(result.success && result.strategy).toBe("structural");
  });

  it("substitutes text with the textual strategy", () => {
    expect(
      mapQuery("SELECT name FROM users", mapping, { strategy: "textual" }),
    ).toEqual({ success: true, sql: "SELECT c2 FROM t1", strategy: "textual" });
  });

  it("fails on invalid SQL with the structural strategy", () => {
    const result = mapQuery("SELEC name FRM users", mapping);

    expect(result.success).toBe(false);
  });

  it("falls back to text substitution when parsing fails", () => {
    expect(
      mapQuery("SELEC name FRM users", mapping, {
        strategy: "structural-with-fallback",
      }),
    ).toEqual({
      success: true,
      sql: "SELEC c2 FRM t1",
      strategy: "textual",
    });
  });

  it("keeps the structural result when parsing succeeds", () => {
    const result = mapQuery("SELECT name FROM users", mapping, {
      strategy: "structural-with-fallback",
    });

    expect(result.success && result.strategy).toBe("structural");
  });
});
