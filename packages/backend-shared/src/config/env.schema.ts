import { z } from "zod";

// =============================================================================
// Capability Schemas (grouped by module/feature dependency)
// =============================================================================

/**
 * Infrastructure schema - shared by every entry point.
 * Contains runtime mode and logging configuration.
 */
export const infrastructureSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  LOG_FORMAT: z.enum(["json", "text"]).default("text"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal"])
    .optional(),
});

/**
 * Mapping schema - how query fields are rewritten during a dataset run.
 */
export const mappingSchema = z.object({
  MAPPING_STRATEGY: z
    .enum(["structural", "textual", "structural-with-fallback"])
    .default("structural"),
  PRETTY_SQL: z
    .enum(["true", "false"])
    .default("false")
    .transform((v: "true" | "false") => v === "true"),
  PROGRESS_INTERVAL: z.coerce.number().int().nonnegative().default(1000),
});

/**
 * Dataset schema - which columns of the input dataset are read.
 */
export const datasetSchema = z.object({
  DATABASE_ID_FIELD: z.string().min(1).default("dbid"),
  QUERY_FIELDS: z
    .string()
    .default("q1,q2")
    .transform((v: string) =>
      v
        .split(",")
        .map((field) => field.trim())
        .filter((field) => field.length > 0),
    )
    .refine((fields: string[]) => fields.length > 0, {
      message: "QUERY_FIELDS must name at least one column",
    }),
});

// =============================================================================
// Entry-point Schemas (composed from capabilities)
// =============================================================================

export const batchEnvSchema = infrastructureSchema
  .merge(mappingSchema)
  .merge(datasetSchema);

export type BatchEnv = z.infer<typeof batchEnvSchema>;

export function validateBatchEnv(env: Record<string, unknown>): BatchEnv {
  return batchEnvSchema.parse(env);
}
