import {
  classifyNode,
  type CreateTableNode,
  isRecord,
  readColumnName,
} from "./ast-visitor";
import {
  byLengthDescending,
  errorMessage,
  escapeRegExp,
  type ParsedStatements,
  parseSql,
  serializeSql,
  stripIdentifierQuotes,
  toStatementList,
} from "./sql-utils";
import type { AnonymizeResult, NameMapping, NameMappingRecord } from "./types";

const CREATE_TABLE_SUBJECT =
  /^\s*CREATE\s+(?:TEMP(?:ORARY)?\s+)?TABLE\s+(?:IF\s+NOT\s+EXISTS\s+)?(.*)$/is;

/**
 * Assigns `<prefix><n>` names in first-seen order. One instance lives for a
 * single anonymizeSchema call.
 */
class NameAllocator {
  private readonly assigned = new Map<string, string>();

  constructor(private readonly prefix: string) {}

  assign(name: string): void {
    if (name.length > 0 && !this.assigned.has(name)) {
      this.assigned.set(name, `${this.prefix}${this.assigned.size + 1}`);
    }
  }

  entries(): Array<[string, string]> {
    return [...this.assigned.entries()];
  }
}

/**
 * Resolve a CREATE TABLE statement's own name. Precedence:
 * 1. `table` holds the name directly
 * 2. `table` holds a list of table items; the first item's name
 * 3. the first whitespace-delimited token after `CREATE TABLE` in the
 *    serialized statement, quotes removed
 *
 * The SQLite grammar yields the list form; the others cover grammars that
 * emit a bare name or none at all. `statementText` is only called for the
 * last step.
 */
export function resolveTableName(
  stmt: CreateTableNode,
  statementText: () => string,
): string | null {
  if (typeof stmt.table === "string") {
    return stmt.table;
  }

  const items = Array.isArray(stmt.table) ? stmt.table : [stmt.table];
  const first: unknown = items[0];
  if (isRecord(first) && typeof first.table === "string") {
    return first.table;
  }

  const subject = CREATE_TABLE_SUBJECT.exec(statementText());
  const token = subject?.[1]?.trim().split(/[\s(]+/)[0];
  return token ? stripIdentifierQuotes(token) : null;
}

function substituteNames(
  text: string,
  entries: Array<[string, string]>,
): string {
  let result = text;
  for (const [original, replacement] of byLengthDescending(entries)) {
    const pattern = new RegExp(`\\b${escapeRegExp(original)}\\b`, "g");
    result = result.replace(pattern, () => replacement);
  }
  return result;
}

/**
 * Replace every table and column declared in a schema with a synthetic name
 * (`t1`, `t2`, … and `c1`, `c2`, …) in first-declared order.
 *
 * Only CREATE TABLE statements contribute names. A column declared in several
 * tables keeps the name it got first. Names match exactly (case-sensitive) in
 * the rewritten text.
 *
 * @example
 * anonymizeSchema("CREATE TABLE a (x INT); CREATE TABLE b (y INT, x INT);");
 * // { success: true,
 * //   schema: "CREATE TABLE t1 (c1 INT); CREATE TABLE t2 (c2 INT, c1 INT);",
 * //   mapping: { a: "t1", b: "t2", x: "c1", y: "c2" } }
 */
export function anonymizeSchema(schemaSql: string): AnonymizeResult {
  let ast: ParsedStatements;

  try {
    ast = parseSql(schemaSql);
  } catch (err) {
    return {
      success: false,
      error: {
        code: "PARSE_ERROR",
        message: errorMessage(err, "Failed to parse schema"),
        sql: schemaSql,
      },
    };
  }

  const tables = new NameAllocator("t");
  const columns = new NameAllocator("c");

  for (const statement of toStatementList(ast)) {
    if (!isRecord(statement)) {
      continue;
    }
    const visited = classifyNode(statement);
    if (visited.kind !== "CreateTableStatement") {
      continue;
    }

    const tableName = resolveTableName(visited.node, () =>
      serializeSql(statement),
    );
    if (tableName) {
      tables.assign(tableName);
    }

    for (const definition of visited.node.create_definitions ?? []) {
      if (!isRecord(definition)) {
        continue;
      }
      const classified = classifyNode(definition);
      if (classified.kind === "ColumnDefinition") {
        columns.assign(readColumnName(classified.node.column));
      }
    }
  }

  const tableEntries = tables.entries();
  const columnEntries = columns.entries();
  const schema = substituteNames(
    substituteNames(schemaSql, tableEntries),
    columnEntries,
  );

  return {
    success: true,
    schema,
    mapping: Object.fromEntries([...tableEntries, ...columnEntries]),
  };
}

/**
 * Split a merged anonymizer mapping into tables and columns by the prefix of
 * the synthetic name.
 */
export function splitNameMapping(mapping: NameMapping): NameMappingRecord {
  const record: NameMappingRecord = { tables: {}, columns: {} };
  for (const [original, synthetic] of Object.entries(mapping)) {
    if (/^t\d+$/.test(synthetic)) {
      record.tables[original] = synthetic;
    } else if (/^c\d+$/.test(synthetic)) {
      record.columns[original] = synthetic;
    }
  }
  return record;
}
