// Types
export type {
  AnonymizeResult,
  DatasetRow,
  ExtractResult,
  FieldStats,
  IdentifierMapping,
  MapDatasetOptions,
  MapDatasetResult,
  MapError,
  MapErrorCode,
  MappingStrategy,
  MapQueryOptions,
  MapResult,
  NameMapping,
  NameMappingRecord,
  RowFailure,
} from "./types";

// Mapping lookups
export {
  createIdentifierMapping,
  EMPTY_IDENTIFIER_MAPPING,
} from "./identifier-mapping";

// Query mapping
export { mapQuery } from "./query-mapper";
export { mapQueryStructural } from "./structural-mapper";
export { mapQueryTextual, substituteIdentifiers } from "./textual-mapper";
export { extractTablesAndColumns } from "./extract";

// Schema anonymization
export { anonymizeSchema, splitNameMapping } from "./schema-anonymizer";

// Datasets
export {
  DEFAULT_DATABASE_ID_FIELD,
  DEFAULT_PROGRESS_INTERVAL,
  DEFAULT_QUERY_FIELDS,
  mapDataset,
  mappedFieldName,
} from "./dataset-mapper";
