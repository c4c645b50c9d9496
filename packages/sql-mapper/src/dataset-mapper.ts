import {
  createIdentifierMapping,
  EMPTY_IDENTIFIER_MAPPING,
} from "./identifier-mapping";
import { mapQuery } from "./query-mapper";
import type {
  DatasetRow,
  FieldStats,
  IdentifierMapping,
  MapDatasetOptions,
  MapDatasetResult,
  NameMappingRecord,
} from "./types";

export const DEFAULT_DATABASE_ID_FIELD = "dbid";
export const DEFAULT_QUERY_FIELDS: readonly string[] = ["q1", "q2"];
export const DEFAULT_PROGRESS_INTERVAL = 1000;

export function mappedFieldName(field: string): string {
  return `${field}_mapped`;
}

/**
 * Map every query field of every row with the mapping of the row's database.
 *
 * Rows whose database has no mapping pass through the identity mapping.
 * A field that is empty, or that fails to map, gets a null `<field>_mapped`
 * value; neither stops the batch. Output rows keep input order and the
 * original columns, followed by any derived column not already present.
 */
export function mapDataset(
  rows: readonly DatasetRow[],
  mappings: Readonly<Record<string, NameMappingRecord>>,
  options: MapDatasetOptions = {},
): MapDatasetResult {
  const {
    databaseIdField = DEFAULT_DATABASE_ID_FIELD,
    queryFields = DEFAULT_QUERY_FIELDS,
    progressInterval = DEFAULT_PROGRESS_INTERVAL,
    strategy,
    pretty,
    onProgress,
    onFailure,
    onMissingMapping,
  } = options;

  const lookups = new Map<string, IdentifierMapping>(
    Object.entries(mappings).map(([databaseId, record]) => [
      databaseId,
      createIdentifierMapping(record),
    ]),
  );
  const reportedMissing = new Set<string>();

  const stats: Record<string, FieldStats> = {};
  for (const field of queryFields) {
    stats[field] = { mapped: 0, failed: 0, skipped: 0 };
  }
  const count = (field: string, outcome: keyof FieldStats): void => {
    const fieldStats = stats[field];
    if (fieldStats) {
      fieldStats[outcome]++;
    }
  };

  const output = rows.map((row, rowIndex) => {
    const databaseId = String(row[databaseIdField] ?? "");
    let mapping = lookups.get(databaseId);
    if (!mapping) {
      if (!reportedMissing.has(databaseId)) {
        reportedMissing.add(databaseId);
        onMissingMapping?.(databaseId);
      }
      mapping = EMPTY_IDENTIFIER_MAPPING;
    }

    const mappedRow: DatasetRow = { ...row };
    for (const field of queryFields) {
      const source = row[field];
      const target = mappedFieldName(field);

      if (typeof source !== "string" || source === "") {
        mappedRow[target] = null;
        count(field, "skipped");
        continue;
      }

      const result = mapQuery(source, mapping, { strategy, pretty });
      if (result.success) {
        mappedRow[target] = result.sql;
        count(field, "mapped");
      } else {
        mappedRow[target] = null;
        count(field, "failed");
        onFailure?.({ rowIndex, field, databaseId, error: result.error });
      }
    }

    if (progressInterval > 0 && (rowIndex + 1) % progressInterval === 0) {
      onProgress?.(rowIndex + 1, rows.length);
    }

    return mappedRow;
  });

  return { rows: output, stats };
}
