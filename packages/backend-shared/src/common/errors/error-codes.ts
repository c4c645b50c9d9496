export enum ErrorCode {
  // SQL mapping
  SQL_PARSE_FAILED = "SQL_PARSE_FAILED",
  SQL_SUBSTITUTION_FAILED = "SQL_SUBSTITUTION_FAILED",
  SCHEMA_PARSE_FAILED = "SCHEMA_PARSE_FAILED",

  // Mapping files
  MAPPING_FILE_INVALID = "MAPPING_FILE_INVALID",
  MAPPING_FILE_WRITE_FAILED = "MAPPING_FILE_WRITE_FAILED",

  // Datasets
  DATASET_READ_FAILED = "DATASET_READ_FAILED",
  DATASET_WRITE_FAILED = "DATASET_WRITE_FAILED",

  // Infrastructure
  CONFIG_ERROR = "CONFIG_ERROR",
  UNKNOWN = "UNKNOWN",
}
