import {
  type ColumnReferenceNode,
  readColumnName,
  type TableReferenceNode,
  walkAst,
  writeColumnName,
} from "./ast-visitor";
import {
  errorMessage,
  formatSql,
  type ParsedStatements,
  parseSql,
  serializeSql,
} from "./sql-utils";
import type { IdentifierMapping, MapResult } from "./types";

interface IdentifierNodes {
  tables: TableReferenceNode[];
  columns: ColumnReferenceNode[];
}

function collectIdentifierNodes(ast: ParsedStatements): IdentifierNodes {
  const nodes: IdentifierNodes = { tables: [], columns: [] };

  walkAst(ast, (visited) => {
    switch (visited.kind) {
      case "TableReference":
        nodes.tables.push(visited.node);
        break;
      case "ColumnReference":
        nodes.columns.push(visited.node);
        break;
      case "ColumnDefinition":
      case "CreateTableStatement":
      case "Other":
        break;
    }
  });

  return nodes;
}

/**
 * Rewrites identifier nodes in place and returns how many were replaced.
 *
 * Every node is collected before any is touched, and the table pass runs to
 * completion before the column pass, so qualifier lookups always see the
 * original qualifier text.
 */
function rewriteIdentifiers(
  nodes: IdentifierNodes,
  mapping: IdentifierMapping,
): number {
  let replaced = 0;

  for (const ref of nodes.tables) {
    const replacement = mapping.tables.get(ref.table.toUpperCase());
    if (replacement !== undefined) {
      ref.table = replacement;
      replaced++;
    }
  }

  for (const ref of nodes.columns) {
    if (ref.table) {
      const qualifier = mapping.tables.get(ref.table.toUpperCase());
      if (qualifier !== undefined) {
        ref.table = qualifier;
        replaced++;
      }
    }

    const name = readColumnName(ref);
    if (name === "*") {
      continue;
    }
    const replacement = mapping.columns.get(name.toUpperCase());
    if (replacement !== undefined) {
      writeColumnName(ref, replacement);
      replaced++;
    }
  }

  return replaced;
}

/**
 * Map identifiers by parsing the statement, replacing table and column
 * reference nodes, and serializing the tree back to SQLite SQL.
 *
 * When nothing matched and no formatting was requested the input text is
 * returned unchanged.
 */
export function mapQueryStructural(
  sql: string,
  mapping: IdentifierMapping,
  pretty = false,
): MapResult {
  let ast: ParsedStatements;

  try {
    ast = parseSql(sql);
  } catch (err) {
    return {
      success: false,
      error: {
        code: "PARSE_ERROR",
        message: errorMessage(err, "Failed to parse SQL"),
        sql,
      },
    };
  }

  try {
    const replaced = rewriteIdentifiers(collectIdentifierNodes(ast), mapping);
    if (replaced === 0 && !pretty) {
      return { success: true, sql, strategy: "structural" };
    }

    const serialized = serializeSql(ast);
    return {
      success: true,
      sql: pretty ? formatSql(serialized) : serialized,
      strategy: "structural",
    };
  } catch (err) {
    return {
      success: false,
      error: {
        code: "SUBSTITUTION_ERROR",
        message: errorMessage(err, "Failed to rewrite SQL"),
        sql,
        details: err,
      },
    };
  }
}
