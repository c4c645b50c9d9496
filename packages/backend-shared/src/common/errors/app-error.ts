import { ErrorCode } from "./error-codes";
import { ErrorMessages } from "./error-messages";

/**
 * Debugging context for error tracing. Printed through safeContext, never part of
 * the message.
 */
export interface ErrorContext {
  operation?: string;
  databaseId?: string;
  path?: string;
  field?: string;
  rowIndex?: number;
  statusMessage?: string;
}

/**
 * Centralized error class for application domain errors.
 *
 * The message is derived from the code so that every operator-facing text
 * lives in error-messages.ts.
 *
 * @param code - Error code from ErrorCode enum
 * @param cause - Original error for error chaining
 * @param context - Debugging context (logged, never part of the message)
 */
export class AppError extends Error {
  constructor(
    readonly code: ErrorCode,
    readonly cause?: unknown,
    readonly context?: ErrorContext,
  ) {
    super(ErrorMessages[code]);
    this.name = "AppError";
  }
}
