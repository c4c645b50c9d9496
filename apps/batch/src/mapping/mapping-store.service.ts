import { readFile, writeFile } from "node:fs/promises";

import { Injectable, Logger } from "@nestjs/common";
import { AppError, ErrorCode } from "@idmap/backend-shared";
import type { NameMappingRecord } from "@idmap/sql-mapper";

import { type MappingFile, mappingFileSchema } from "./mapping-file.schema";

/**
 * Projects a mapping file to the per-database lookup the dataset mapper
 * takes. Databases without a `mapping` entry are left out, so their queries
 * pass through unchanged.
 */
export function toIdentifierMappings(
  file: MappingFile,
): Record<string, NameMappingRecord> {
  const mappings: Record<string, NameMappingRecord> = {};
  for (const [databaseId, record] of Object.entries(file)) {
    if (record.mapping) {
      mappings[databaseId] = {
        tables: record.mapping.tables,
        columns: record.mapping.columns,
      };
    }
  }
  return mappings;
}

@Injectable()
export class MappingStoreService {
  private readonly logger = new Logger(MappingStoreService.name);

  async load(path: string): Promise<MappingFile> {
    const context = { operation: "loadMappings", path };

    let raw: string;
    try {
      raw = await readFile(path, "utf8");
    } catch (error: unknown) {
      throw new AppError(ErrorCode.MAPPING_FILE_INVALID, error, context);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error: unknown) {
      throw new AppError(ErrorCode.MAPPING_FILE_INVALID, error, context);
    }

    const parsed = mappingFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new AppError(ErrorCode.MAPPING_FILE_INVALID, parsed.error, {
        ...context,
        statusMessage: parsed.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join("; "),
      });
    }

    this.logger.debug(
      `Loaded ${Object.keys(parsed.data).length} database mapping(s) from ${path}`,
    );
    return parsed.data;
  }

  async save(path: string, file: MappingFile): Promise<void> {
    try {
      await writeFile(path, `${JSON.stringify(file, null, 2)}\n`, "utf8");
    } catch (error: unknown) {
      throw new AppError(ErrorCode.MAPPING_FILE_WRITE_FAILED, error, {
        operation: "saveMappings",
        path,
      });
    }

    this.logger.debug(`Wrote ${Object.keys(file).length} database mapping(s) to ${path}`);
  }
}
