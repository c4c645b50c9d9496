import type {
  IdentifierMapping,
  NameMapping,
  NameMappingRecord,
} from "./types";

function normalizeKeys(mapping: NameMapping | undefined): Map<string, string> {
  const normalized = new Map<string, string>();
  if (!mapping) {
    return normalized;
  }

  for (const [original, replacement] of Object.entries(mapping)) {
    // An empty name would match at every word boundary in textual mode.
    if (original.length === 0) {
      continue;
    }
    // Later entries win when two keys differ only in case.
    normalized.set(original.toUpperCase(), replacement);
  }

  return normalized;
}

/**
 * Builds the case-insensitive lookup used by the query mappers.
 *
 * @example
 * const mapping = createIdentifierMapping({
 *   tables: { Orders: "t1" },
 *   columns: { order_id: "c1" },
 * });
 * mapping.tables.get("ORDERS"); // "t1"
 */
export function createIdentifierMapping(
  record: Partial<NameMappingRecord> = {},
): IdentifierMapping {
  return {
    tables: normalizeKeys(record.tables),
    columns: normalizeKeys(record.columns),
  };
}

export const EMPTY_IDENTIFIER_MAPPING: IdentifierMapping =
  createIdentifierMapping();
