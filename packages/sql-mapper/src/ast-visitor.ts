/**
 * Column name as node-sql-parser emits it: a bare string, or (for newer
 * grammars) an expression wrapper around the identifier value.
 */
export type ColumnName = string | { expr: { type: string; value: string } };

/** FROM / JOIN / INSERT / UPDATE / REFERENCES table item. */
export interface TableReferenceNode {
  table: string;
  db?: string | null;
  as?: string | null;
  [key: string]: unknown;
}

export interface NamedColumnNode {
  column: ColumnName;
  [key: string]: unknown;
}

/**
 * A `column_ref` expression, or the target of an `UPDATE ... SET` assignment,
 * which the parser stores as `{ column, value, table }` without a type.
 */
export interface ColumnReferenceNode extends NamedColumnNode {
  table?: string | null;
}

/** One column inside CREATE TABLE (...). */
export interface ColumnDefinitionNode {
  resource: "column";
  column: NamedColumnNode;
  [key: string]: unknown;
}

export interface CreateTableNode {
  type: "create";
  keyword: "table";
  table?: unknown;
  create_definitions?: unknown[];
  [key: string]: unknown;
}

export type AstNode =
  | { kind: "TableReference"; node: TableReferenceNode }
  | { kind: "ColumnReference"; node: ColumnReferenceNode }
  | { kind: "ColumnDefinition"; node: ColumnDefinitionNode }
  | { kind: "CreateTableStatement"; node: CreateTableNode }
  | { kind: "Other"; node: Record<string, unknown> };

export type AstVisitor = (visited: AstNode) => void;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isColumnName(value: unknown): value is ColumnName {
  if (typeof value === "string") {
    return true;
  }
  return (
    isRecord(value) &&
    isRecord(value.expr) &&
    typeof value.expr.value === "string"
  );
}

function isNamedColumn(
  value: Record<string, unknown>,
): value is NamedColumnNode {
  return isColumnName(value.column);
}

function hasQualifier(value: Record<string, unknown>): boolean {
  return (
    value.table === undefined ||
    value.table === null ||
    typeof value.table === "string"
  );
}

function isColumnReference(
  value: Record<string, unknown>,
  assignmentTarget: boolean,
): value is ColumnReferenceNode {
  return (
    (value.type === "column_ref" || assignmentTarget) &&
    isNamedColumn(value) &&
    hasQualifier(value)
  );
}

function isColumnDefinition(
  value: Record<string, unknown>,
): value is ColumnDefinitionNode {
  return (
    value.resource === "column" &&
    isRecord(value.column) &&
    isNamedColumn(value.column)
  );
}

function isCreateTable(value: Record<string, unknown>): value is CreateTableNode {
  return value.type === "create" && value.keyword === "table";
}

function isTableReference(
  value: Record<string, unknown>,
): value is TableReferenceNode {
  return typeof value.table === "string" && value.type !== "column_ref";
}

/**
 * @param assignmentTarget - the node is an item of an UPDATE statement's
 * `set` list
 */
export function classifyNode(
  node: Record<string, unknown>,
  assignmentTarget = false,
): AstNode {
  if (isCreateTable(node)) {
    return { kind: "CreateTableStatement", node };
  }
  if (isColumnReference(node, assignmentTarget)) {
    return { kind: "ColumnReference", node };
  }
  if (isColumnDefinition(node)) {
    return { kind: "ColumnDefinition", node };
  }
  if (isTableReference(node)) {
    return { kind: "TableReference", node };
  }
  return { kind: "Other", node };
}

/**
 * Depth-first, pre-order walk over every object in a parsed statement tree,
 * including subqueries, joins, CTEs and nested expressions.
 */
export function walkAst(root: unknown, visit: AstVisitor): void {
  const seen = new WeakSet<object>();
  const assignments = new WeakSet<object>();

  const walk = (value: unknown): void => {
    if (Array.isArray(value)) {
      for (const item of value) {
        walk(item);
      }
      return;
    }
    if (!isRecord(value) || seen.has(value)) {
      return;
    }
    seen.add(value);

    visit(classifyNode(value, assignments.has(value)));

    // Pre-order: the statement is seen before its SET items.
    if (value.type === "update" && Array.isArray(value.set)) {
      for (const item of value.set) {
        if (isRecord(item)) {
          assignments.add(item);
        }
      }
    }

    for (const child of Object.values(value)) {
      walk(child);
    }
  };

  walk(root);
}

export function readColumnName(node: NamedColumnNode): string {
  return typeof node.column === "string" ? node.column : node.column.expr.value;
}

export function writeColumnName(node: NamedColumnNode, name: string): void {
  if (typeof node.column === "string") {
    node.column = name;
  } else {
    node.column.expr.value = name;
  }
}
