import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { type BatchEnv, ErrorCode } from "@idmap/backend-shared";
import {
  type FieldStats,
  mapDataset,
  mappedFieldName,
  type MapErrorCode,
  type RowFailure,
} from "@idmap/sql-mapper";

import { MappingStoreService, toIdentifierMappings } from "../mapping/mapping-store.service";
import { DatasetIoService } from "./dataset-io.service";

const MAP_ERROR_CODES: Record<MapErrorCode, ErrorCode> = {
  PARSE_ERROR: ErrorCode.SQL_PARSE_FAILED,
  SUBSTITUTION_ERROR: ErrorCode.SQL_SUBSTITUTION_FAILED,
};

export interface DatasetMappingSummary {
  rows: number;
  outputPath: string;
  stats: Record<string, FieldStats>;
}

@Injectable()
export class DatasetMappingService {
  private readonly logger = new Logger(DatasetMappingService.name);

  constructor(
    private readonly store: MappingStoreService,
    private readonly io: DatasetIoService,
    private readonly config: ConfigService<BatchEnv, true>,
  ) {}

  /**
   * Map the query fields of a dataset with the per-database mappings and
   * write the result, by default over the input file.
   */
  async mapFile(
    datasetPath: string,
    mappingsPath: string,
    outputPath: string = datasetPath,
  ): Promise<DatasetMappingSummary> {
    const mappings = toIdentifierMappings(await this.store.load(mappingsPath));
    const dataset = await this.io.read(datasetPath);

    const databaseIdField = this.config.get("DATABASE_ID_FIELD", { infer: true });
    const queryFields = this.config.get("QUERY_FIELDS", { infer: true });

    for (const field of [databaseIdField, ...queryFields]) {
      if (!dataset.columns.includes(field)) {
        this.logger.warn(`Column "${field}" not found in ${datasetPath}`);
      }
    }

    const result = mapDataset(dataset.rows, mappings, {
      databaseIdField,
      queryFields,
      strategy: this.config.get("MAPPING_STRATEGY", { infer: true }),
      pretty: this.config.get("PRETTY_SQL", { infer: true }),
      progressInterval: this.config.get("PROGRESS_INTERVAL", { infer: true }),
      onProgress: (processed, total) => {
        this.logger.log(`Mapped ${processed}/${total} rows`);
      },
      onMissingMapping: (databaseId) => {
        this.logger.warn({
          message: "No mapping for database; queries are copied unchanged",
          databaseId,
        });
      },
      onFailure: (failure: RowFailure) => {
        this.logger.warn({
          message: "Query could not be mapped",
          errorCode: MAP_ERROR_CODES[failure.error.code],
          databaseId: failure.databaseId,
          rowIndex: failure.rowIndex,
          field: failure.field,
          error: failure.error.message,
        });
      },
    });

    const derived = queryFields
      .map(mappedFieldName)
      .filter((column) => !dataset.columns.includes(column));
    await this.io.write(outputPath, [...dataset.columns, ...derived], result.rows);

    for (const [field, stats] of Object.entries(result.stats)) {
      this.logger.log(
        `${field}: ${stats.mapped} mapped, ${stats.failed} failed, ${stats.skipped} empty`,
      );
    }

    return { rows: result.rows.length, outputPath, stats: result.stats };
  }
}
