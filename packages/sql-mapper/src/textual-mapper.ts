import { byLengthDescending, errorMessage, escapeRegExp } from "./sql-utils";
import type { IdentifierMapping, MapResult } from "./types";

/**
 * Whole-token, backtick-quoted and double-quoted forms of one identifier,
 * applied in that order.
 */
function identifierPatterns(name: string): RegExp[] {
  const escaped = escapeRegExp(name);
  return [
    new RegExp(`\\b${escaped}\\b`, "gi"),
    new RegExp(`\`${escaped}\``, "gi"),
    new RegExp(`"${escaped}"`, "gi"),
  ];
}

/**
 * Substitute mapped identifiers directly in SQL text.
 *
 * Tables are replaced before columns; within each group longer names go
 * first so that `AB` is never rewritten through a shorter `A`. Every pattern
 * runs against the output of the previous one. String literals are not
 * recognised and are rewritten like any other text.
 */
export function substituteIdentifiers(
  sql: string,
  mapping: IdentifierMapping,
): string {
  let mapped = sql;

  for (const entries of [mapping.tables, mapping.columns]) {
    for (const [original, replacement] of byLengthDescending(entries)) {
      for (const pattern of identifierPatterns(original)) {
        // A replacer function keeps `$` sequences in the replacement literal.
        mapped = mapped.replace(pattern, () => replacement);
      }
    }
  }

  return mapped;
}

export function mapQueryTextual(
  sql: string,
  mapping: IdentifierMapping,
): MapResult {
  try {
    return {
      success: true,
      sql: substituteIdentifiers(sql, mapping),
      strategy: "textual",
    };
  } catch (err) {
    return {
      success: false,
      error: {
        code: "SUBSTITUTION_ERROR",
        message: errorMessage(err, "Failed to substitute identifiers"),
        sql,
        details: err,
      },
    };
  }
}
