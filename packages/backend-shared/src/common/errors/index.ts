export { AppError, type ErrorContext } from "./app-error";
export { ErrorCode } from "./error-codes";
export { ErrorMessages } from "./error-messages";
export { MAX_CONTEXT_VALUE_LENGTH, safeContext } from "./log-context";
export { toAppError } from "./wrap-error";
