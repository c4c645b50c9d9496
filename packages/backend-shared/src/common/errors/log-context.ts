import type { ErrorContext } from "./app-error";

/** Longest context value printed as-is; statusMessage can carry a whole issue list or SQL text. */
export const MAX_CONTEXT_VALUE_LENGTH = 300;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function shorten(value: unknown): unknown {
  if (typeof value !== "string" || value.length <= MAX_CONTEXT_VALUE_LENGTH) {
    return value;
  }
  const dropped = value.length - MAX_CONTEXT_VALUE_LENGTH;
  return `${value.slice(0, MAX_CONTEXT_VALUE_LENGTH)}... [+${dropped} chars]`;
}

/**
 * Error context ready for a single report line: unset fields dropped, long
 * text shortened. Paths, database ids and row indexes pass through unchanged.
 * Returns undefined when nothing is left to print.
 */
export function safeContext(
  ctx: ErrorContext | undefined,
): Record<string, unknown> | undefined {
  if (!isRecord(ctx)) {
    return undefined;
  }
  const entries = Object.entries(ctx)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => [key, shorten(value)]);
  return entries.length > 0 ? Object.fromEntries(entries) : undefined;
}
