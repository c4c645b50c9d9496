import { ErrorCode } from "./error-codes";

/**
 * Operator-facing message for each error code.
 *
 * Kept generic: identifiers, paths and SQL text belong in the error context,
 * which the fatal report prints through safeContext.
 */
export const ErrorMessages: Record<ErrorCode, string> = {
  [ErrorCode.SQL_PARSE_FAILED]: "SQL statement could not be parsed.",
  [ErrorCode.SQL_SUBSTITUTION_FAILED]:
    "Identifiers in the SQL statement could not be rewritten.",
  [ErrorCode.SCHEMA_PARSE_FAILED]: "Schema could not be parsed.",

  [ErrorCode.MAPPING_FILE_INVALID]:
    "Mapping file is missing or does not match the expected format.",
  [ErrorCode.MAPPING_FILE_WRITE_FAILED]: "Mapping file could not be written.",

  [ErrorCode.DATASET_READ_FAILED]: "Dataset could not be read.",
  [ErrorCode.DATASET_WRITE_FAILED]: "Dataset could not be written.",

  [ErrorCode.CONFIG_ERROR]: "Configuration error.",
  [ErrorCode.UNKNOWN]: "An unexpected error occurred.",
};
