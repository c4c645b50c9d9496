import { Injectable, Logger } from "@nestjs/common";
import { ErrorCode } from "@idmap/backend-shared";
import { anonymizeSchema, splitNameMapping } from "@idmap/sql-mapper";

import type { MappingFile } from "./mapping-file.schema";
import { MappingStoreService } from "./mapping-store.service";

export interface AnonymizationSummary {
  anonymized: number;
  failed: number;
  /** Databases without a schema text. */
  skipped: number;
}

@Injectable()
export class SchemaAnonymizationService {
  private readonly logger = new Logger(SchemaAnonymizationService.name);

  constructor(private readonly store: MappingStoreService) {}

  /**
   * Anonymize the schema of every database in a mapping file and store the
   * resulting mapping. A database whose schema does not parse keeps its
   * previous entry.
   */
  async anonymizeFile(
    inputPath: string,
    outputPath: string = inputPath,
  ): Promise<AnonymizationSummary> {
    const file = await this.store.load(inputPath);
    const updated: MappingFile = {};
    const summary: AnonymizationSummary = {
      anonymized: 0,
      failed: 0,
      skipped: 0,
    };

    for (const [databaseId, record] of Object.entries(file)) {
      if (record.schema === undefined) {
        updated[databaseId] = record;
        summary.skipped++;
        continue;
      }

      const result = anonymizeSchema(record.schema);
      if (!result.success) {
        this.logger.warn({
          message: "Schema could not be parsed; keeping previous mapping",
          errorCode: ErrorCode.SCHEMA_PARSE_FAILED,
          databaseId,
          error: result.error.message,
        });
        updated[databaseId] = record;
        summary.failed++;
        continue;
      }

      updated[databaseId] = {
        ...record,
        mapping: splitNameMapping(result.mapping),
        anonymizedSchema: result.schema,
      };
      summary.anonymized++;
    }

    await this.store.save(outputPath, updated);

    this.logger.log(
      `Anonymized ${summary.anonymized} schema(s): ${summary.failed} failed, ${summary.skipped} without schema`,
    );
    return summary;
  }
}
