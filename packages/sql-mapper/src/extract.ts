import { readColumnName, walkAst } from "./ast-visitor";
import { parseSql } from "./sql-utils";
import type { ExtractResult } from "./types";

/**
 * Collect the upper-cased name of every table and column referenced anywhere
 * in a statement. Returns two empty sets when the SQL does not parse.
 */
export function extractTablesAndColumns(sql: string): ExtractResult {
  const tables = new Set<string>();
  const columns = new Set<string>();

  try {
    walkAst(parseSql(sql), (visited) => {
      if (visited.kind === "TableReference") {
        tables.add(visited.node.table.toUpperCase());
      } else if (visited.kind === "ColumnReference") {
        const name = readColumnName(visited.node);
        if (name !== "*") {
          columns.add(name.toUpperCase());
        }
      }
    });
  } catch {
    return { tables: new Set(), columns: new Set() };
  }

  return { tables, columns };
}
