import { z } from "zod";

const nameMapSchema = z.record(z.string(), z.string());

/**
 * One database's entry in the mapping file. Fields this tool does not know
 * about are kept when the file is rewritten.
 */
export const mappingRecordSchema = z
  .object({
    mapping: z
      .object({
        tables: nameMapSchema.default({}),
        columns: nameMapSchema.default({}),
      })
      .optional(),
    schema: z.string().optional(),
    anonymizedSchema: z.string().optional(),
  })
  .passthrough();

/** Mapping file: database identifier -> record. */
export const mappingFileSchema = z.record(z.string(), mappingRecordSchema);

export type MappingRecord = z.infer<typeof mappingRecordSchema>;
export type MappingFile = z.infer<typeof mappingFileSchema>;
