/**
 * Original identifier -> replacement identifier, as supplied by callers and
 * as persisted in mapping files.
 */
export type NameMapping = Record<string, string>;

/**
 * Table and column mappings as stored per database.
 */
export interface NameMappingRecord {
  tables: NameMapping;
  columns: NameMapping;
}

/**
 * Lookup form of a NameMappingRecord. Keys are upper-cased; values keep the
 * casing the caller supplied.
 */
export interface IdentifierMapping {
  readonly tables: ReadonlyMap<string, string>;
  readonly columns: ReadonlyMap<string, string>;
}

export type MappingStrategy =
  | "structural"
  | "textual"
  | "structural-with-fallback";

export interface MapQueryOptions {
  strategy?: MappingStrategy;
  /** Run structural output through the SQL formatter. */
  pretty?: boolean;
}

export type MapErrorCode = "PARSE_ERROR" | "SUBSTITUTION_ERROR";

export interface MapError {
  code: MapErrorCode;
  message: string;
  sql?: string;
  details?: unknown;
}

export type MapResult =
  | { success: true; sql: string; strategy: "structural" | "textual" }
  | { success: false; error: MapError };

export interface ExtractResult {
  tables: Set<string>;
  columns: Set<string>;
}

export type AnonymizeResult =
  | { success: true; schema: string; mapping: NameMapping }
  | { success: false; error: MapError };

/**
 * One dataset record. Values come from a tabular file, so everything is text;
 * derived `<field>_mapped` values are null when nothing was produced.
 */
export type DatasetRow = Record<string, string | null | undefined>;

export interface FieldStats {
  mapped: number;
  failed: number;
  skipped: number;
}

export interface RowFailure {
  rowIndex: number;
  field: string;
  databaseId: string;
  error: MapError;
}

export interface MapDatasetOptions extends MapQueryOptions {
  databaseIdField?: string;
  queryFields?: readonly string[];
  progressInterval?: number;
  onProgress?: (processed: number, total: number) => void;
  onFailure?: (failure: RowFailure) => void;
  onMissingMapping?: (databaseId: string) => void;
}

export interface MapDatasetResult {
  rows: DatasetRow[];
  stats: Record<string, FieldStats>;
}
