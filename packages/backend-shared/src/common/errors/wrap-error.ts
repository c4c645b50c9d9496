import { AppError, type ErrorContext } from "./app-error";
import { ErrorCode } from "./error-codes";

/**
 * Converts unknown errors to AppError. Existing AppErrors pass through
 * unchanged; anything else becomes UNKNOWN with the original as cause.
 */
export function toAppError(error: unknown, context?: ErrorContext): AppError {
  if (error instanceof AppError) {
    return error;
  }
  return new AppError(ErrorCode.UNKNOWN, error, context);
}

