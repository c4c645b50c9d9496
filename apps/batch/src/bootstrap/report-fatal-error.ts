import {
  AppError,
  ErrorCode,
  safeContext,
  toAppError,
} from "@idmap/backend-shared";
import { ZodError } from "zod";

function toReportedError(error: unknown): AppError {
  if (error instanceof ZodError) {
    // The issue list below says more than the ZodError message.
    return new AppError(ErrorCode.CONFIG_ERROR, undefined, {
      operation: "validateEnv",
      statusMessage: error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; "),
    });
  }
  return toAppError(error);
}

/**
 * Prints a command failure to stderr. Runs outside the application context,
 * which may not have started, so it cannot rely on the pino logger.
 * @param setExitCode - Injectable exit code setter for testability
 */
export function reportFatalError(
  error: unknown,
  setExitCode: (code: number) => void = (code) => {
    process.exitCode = code;
  },
  write: (line: string) => void = (line) => console.error(line),
): void {
  const reported = toReportedError(error);

  write(`[FATAL] ${reported.message}`);
  write(`  Code:    ${reported.code}`);
  if (reported.cause instanceof Error) {
    write(`  Cause:   ${reported.cause.message}`);
  }
  const context = safeContext(reported.context);
  if (context) {
    write(`  Context: ${JSON.stringify(context)}`);
  }

  setExitCode(1);
}
