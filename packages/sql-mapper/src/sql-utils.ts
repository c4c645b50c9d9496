import { type AST, Parser } from "node-sql-parser";
import { format } from "sql-formatter";

const parser = new Parser();
export const DIALECT = "sqlite";

export type ParsedStatements = AST | AST[];

/**
 * Parse SQL text with the SQLite grammar. Throws the parser's error on
 * invalid input; callers decide how to report it.
 */
export function parseSql(sql: string): ParsedStatements {
  return parser.astify(sql, { database: DIALECT });
}

export function toStatementList(ast: ParsedStatements): AST[] {
  return Array.isArray(ast) ? ast : [ast];
}

export function serializeSql(ast: ParsedStatements): string {
  return parser.sqlify(ast, { database: DIALECT });
}

export function formatSql(sql: string): string {
  return format(sql, {
    language: "sqlite",
    keywordCase: "upper",
    tabWidth: 2,
  });
}

export function errorMessage(err: unknown, fallback: string): string {
  return err instanceof Error ? err.message : fallback;
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Remove identifier quoting from a name.
 * "`Orders`" -> "Orders", "\"Orders\"" -> "Orders", "[Orders]" -> "Orders"
 */
export function stripIdentifierQuotes(name: string): string {
  if (name.length < 2) {
    return name;
  }
  const first = name[0];
  const last = name[name.length - 1];
  if (
    (first === "`" && last === "`") ||
    (first === '"' && last === '"') ||
    (first === "[" && last === "]")
  ) {
    return name.slice(1, -1);
  }
  return name;
}

/**
 * Orders mapping entries so that longer original names are substituted
 * before any shorter name they contain. Ties keep insertion order.
 */
export function byLengthDescending(
  entries: Iterable<[string, string]>,
): Array<[string, string]> {
  return [...entries].sort((a, b) => b[0].length - a[0].length);
}
