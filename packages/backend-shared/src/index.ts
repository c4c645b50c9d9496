export {
  AppError,
  ErrorCode,
  type ErrorContext,
  ErrorMessages,
  MAX_CONTEXT_VALUE_LENGTH,
  safeContext,
  toAppError,
} from "./common/errors";
export * from "./config";
export * from "./logger";
