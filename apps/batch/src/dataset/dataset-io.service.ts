import { readFile, writeFile } from "node:fs/promises";

import { Injectable, Logger } from "@nestjs/common";
import { AppError, ErrorCode } from "@idmap/backend-shared";
import type { DatasetRow } from "@idmap/sql-mapper";
import { parse } from "csv-parse";
import { stringify } from "csv-stringify";

export interface Dataset {
  /** Header names in file order. */
  columns: string[];
  rows: DatasetRow[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toRows(records: unknown): DatasetRow[] {
  if (!Array.isArray(records)) {
    return [];
  }
  return records.filter(isRecord).map((record) =>
    Object.fromEntries(
      Object.entries(record).map(([key, value]) => [
        key,
        typeof value === "string" ? value : null,
      ]),
    ),
  );
}

function parseCsv(text: string): Promise<Dataset> {
  return new Promise((resolve, reject) => {
    let header: string[] = [];
    parse(
      text,
      {
        bom: true,
        skip_empty_lines: true,
        columns: (names: string[]) => {
          header = names;
          return names;
        },
      },
      (error, records: unknown) => {
        if (error) {
          reject(error);
          return;
        }
        resolve({ columns: header, rows: toRows(records) });
      },
    );
  });
}

function stringifyCsv(
  columns: readonly string[],
  rows: readonly DatasetRow[],
): Promise<string> {
  return new Promise((resolve, reject) => {
    // null and undefined cells are written as empty fields.
    stringify([...rows], { header: true, columns: [...columns] }, (error, output) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(output);
    });
  });
}

/** Reads and writes header-first, comma-delimited datasets. */
@Injectable()
export class DatasetIoService {
  private readonly logger = new Logger(DatasetIoService.name);

  async read(path: string): Promise<Dataset> {
    try {
      const dataset = await parseCsv(await readFile(path, "utf8"));
      this.logger.debug(`Read ${dataset.rows.length} row(s) from ${path}`);
      return dataset;
    } catch (error: unknown) {
      throw new AppError(ErrorCode.DATASET_READ_FAILED, error, {
        operation: "readDataset",
        path,
      });
    }
  }

  async write(
    path: string,
    columns: readonly string[],
    rows: readonly DatasetRow[],
  ): Promise<void> {
    try {
      await writeFile(path, await stringifyCsv(columns, rows), "utf8");
    } catch (error: unknown) {
      throw new AppError(ErrorCode.DATASET_WRITE_FAILED, error, {
        operation: "writeDataset",
        path,
      });
    }
    this.logger.debug(`Wrote ${rows.length} row(s) to ${path}`);
  }
}
