import { mapQueryStructural } from "./structural-mapper";
import { mapQueryTextual } from "./textual-mapper";
import type { IdentifierMapping, MapQueryOptions, MapResult } from "./types";

/**
 * Rename the mapped tables and columns of one SQL statement.
 *
 * - `structural` (default): parse, rewrite identifier nodes, serialize.
 * - `textual`: word-boundary substitution on the raw text.
 * - `structural-with-fallback`: structural, then textual if that fails.
 */
export function mapQuery(
  sql: string,
  mapping: IdentifierMapping,
  options: MapQueryOptions = {},
): MapResult {
  const { strategy = "structural", pretty = false } = options;

  switch (strategy) {
    case "textual":
      return mapQueryTextual(sql, mapping);
    case "structural-with-fallback": {
      const result = mapQueryStructural(sql, mapping, pretty);
      return result.success ? result : mapQueryTextual(sql, mapping);
    }
    case "structural":
      return mapQueryStructural(sql, mapping, pretty);
  }
}
