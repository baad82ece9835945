/**
 * Check that the tables and columns a statement references exist in the
 * schema snapshot.
 *
 * Resolution follows SELECT scopes. An unqualified column resolves against
 * the FROM entries of its own SELECT, then of the enclosing ones
 * (correlated subqueries). Select-list aliases resolve only in ORDER BY,
 * GROUP BY and HAVING of the SELECT that defines them. Derived tables and
 * CTEs expose their output columns to the query that reads them. A table
 * given an alias is reachable through the alias only. Comparison ignores
 * case.
 */

import type { SchemaSnapshot, TableInfo } from '../db/types.js';
import { functionName, identValue, isNode, type AstNode } from './ast.js';

export interface IdentifierReport {
  /** Referenced base tables, schema-qualified */
  tables: string[];
  /** Identifiers that do not resolve, as written */
  unknown: string[];
}

/** Output columns of a derived source; null when they cannot be known (`*`). */
type ColumnSet = Set<string> | null;

type Source = { kind: 'table'; table: TableInfo } | { kind: 'derived'; columns: ColumnSet };

interface Scope {
  sources: Source[];
  qualifiers: Map<string, Source>;
}

// Keywords the parser can surface as bare column references.
const PSEUDO_COLUMNS = new Set([
  'current_date',
  'current_time',
  'current_timestamp',
  'localtime',
  'localtimestamp',
  'current_user',
  'session_user',
  'true',
  'false',
  'null',
]);

export function resolveIdentifiers(ast: AstNode, schema: SchemaSnapshot): IdentifierReport {
  const unknown: string[] = [];
  const referenced = new Map<string, TableInfo>();

  const addUnknown = (ident: string) => {
    if (!unknown.includes(ident)) unknown.push(ident);
  };

  function resolveSelect(select: AstNode, outer: readonly Scope[], inheritedCtes: ReadonlyMap<string, ColumnSet>): ColumnSet {
    const ctes = new Map(inheritedCtes);
    if (Array.isArray(select.with)) {
      for (const cte of select.with) {
        if (!isNode(cte)) continue;
        const name = identValue(cte.name)?.toLowerCase();
        if (!name) continue;
        const declared = declaredColumns(cte.columns);
        // recursive CTEs read themselves
        ctes.set(name, declared);
        const body = selectOf(cte.stmt);
        const produced = body ? resolveSelect(body, outer, ctes) : null;
        ctes.set(name, declared ?? produced);
      }
    }

    const scope: Scope = { sources: [], qualifiers: new Map() };
    const chain = [scope, ...outer];
    const deferred: unknown[] = [];

    if (Array.isArray(select.from)) {
      for (const entry of select.from) {
        if (!isNode(entry)) continue;
        const alias = identValue(entry.as)?.toLowerCase();
        const source = sourceOf(entry, outer, ctes, deferred);
        if (!source) continue;
        scope.sources.push(source.source);
        const qualifier = alias ?? source.name;
        if (qualifier) scope.qualifiers.set(qualifier, source.source);
        if (entry.on !== undefined) deferred.push(entry.on);
      }
    }

    const aliases = new Set<string>();
    if (Array.isArray(select.columns)) {
      for (const col of select.columns) {
        if (!isNode(col)) continue;
        const alias = identValue(col.as);
        if (alias) aliases.add(alias.toLowerCase());
      }
    }

    const check = (value: unknown, visibleAliases?: ReadonlySet<string>) =>
      visit(value, {
        onRef: (ref) => resolveRef(ref, chain, visibleAliases),
        onSelect: (sub) => resolveSelect(sub, chain, ctes),
      });

    check(select.columns);
    for (const expr of deferred) check(expr);
    check(select.where);
    check(select.groupby, aliases);
    check(select.having, aliases);
    check(select.orderby, aliases);

    const next = selectOf(select._next);
    if (next) resolveSelect(next, outer, inheritedCtes);

    return outputColumns(select.columns);
  }

  function sourceOf(
    entry: AstNode,
    outer: readonly Scope[],
    ctes: ReadonlyMap<string, ColumnSet>,
    deferred: unknown[],
  ): { source: Source; name?: string } | null {
    if (entry.expr !== undefined) {
      const sub = selectOf(entry.expr);
      if (sub) return { source: { kind: 'derived', columns: resolveSelect(sub, outer, ctes) } };
      // function call or VALUES list
      deferred.push(entry.expr);
      return { source: { kind: 'derived', columns: null } };
    }

    const tableName = identValue(entry.table);
    if (!tableName) return null;
    const schemaName = identValue(entry.schema) ?? identValue(entry.db);
    const lowerName = tableName.toLowerCase();

    if (!schemaName && ctes.has(lowerName)) {
      return { source: { kind: 'derived', columns: ctes.get(lowerName) ?? null }, name: lowerName };
    }

    const table = findTable(schema, tableName, schemaName);
    if (!table) {
      addUnknown(schemaName ? `${schemaName}.${tableName}` : tableName);
      return null;
    }
    referenced.set(`${table.schema}.${table.name}`, table);
    return { source: { kind: 'table', table }, name: table.name.toLowerCase() };
  }

  function resolveRef(ref: AstNode, chain: readonly Scope[], aliases?: ReadonlySet<string>): void {
    const column = identValue(ref.column);
    const qualifier = identValue(ref.table);
    const lowerQualifier = qualifier?.toLowerCase();

    if (!column || column === '*') {
      if (qualifier && lowerQualifier && !chain.some((s) => s.qualifiers.has(lowerQualifier))) {
        addUnknown(`${qualifier}.*`);
      }
      return;
    }
    const lower = column.toLowerCase();

    if (!qualifier || !lowerQualifier) {
      if (aliases?.has(lower) || PSEUDO_COLUMNS.has(lower)) return;
      if (!chain.some((scope) => scope.sources.some((source) => hasColumn(source, lower)))) {
        addUnknown(column);
      }
      return;
    }

    for (const scope of chain) {
      const source = scope.qualifiers.get(lowerQualifier);
      if (!source) continue;
      if (!hasColumn(source, lower)) addUnknown(`${qualifier}.${column}`);
      return;
    }
    addUnknown(`${qualifier}.${column}`);
  }

  if (ast.type === 'select') resolveSelect(ast, [], new Map());
  return { tables: Array.from(referenced.keys()), unknown };
}

interface Visitor {
  onRef(ref: AstNode): void;
  onSelect(select: AstNode): void;
}

/** Walk an expression, handing nested SELECTs off instead of descending. */
function visit(value: unknown, visitor: Visitor): void {
  if (Array.isArray(value)) {
    for (const item of value) visit(item, visitor);
    return;
  }
  if (!isNode(value)) return;
  if (value.type === 'select') {
    visitor.onSelect(value);
    return;
  }
  if (value.type === 'column_ref') {
    visitor.onRef(value);
    return;
  }
  for (const key of Object.keys(value)) visit(value[key], visitor);
}

function selectOf(value: unknown): AstNode | undefined {
  if (!isNode(value)) return undefined;
  if (value.type === 'select') return value;
  if (isNode(value.ast) && value.ast.type === 'select') return value.ast;
  return undefined;
}

function hasColumn(source: Source, lower: string): boolean {
  if (source.kind === 'table') {
    return source.table.columns.some((c) => c.name.toLowerCase() === lower);
  }
  return source.columns === null || source.columns.has(lower);
}

function declaredColumns(value: unknown): ColumnSet {
  if (!Array.isArray(value) || value.length === 0) return null;
  const names = value.map(identValue).filter((n): n is string => n !== undefined);
  return new Set(names.map((n) => n.toLowerCase()));
}

/** Names a SELECT exposes to an outer query, following PostgreSQL's naming. */
function outputColumns(columns: unknown): ColumnSet {
  if (!Array.isArray(columns)) return null;
  const names = new Set<string>();
  for (const col of columns) {
    if (col === '*') return null;
    if (!isNode(col)) continue;
    const alias = identValue(col.as);
    if (alias) {
      names.add(alias.toLowerCase());
      continue;
    }
    const expr = col.expr;
    if (!isNode(expr)) continue;
    if (expr.type === 'column_ref') {
      const column = identValue(expr.column);
      if (!column || column === '*') return null;
      names.add(column.toLowerCase());
    } else if (expr.type === 'function' || expr.type === 'aggr_func') {
      const name = functionName(expr);
      if (name) names.add(name.toLowerCase());
    }
  }
  return names;
}

function findTable(schema: SchemaSnapshot, name: string, schemaName?: string): TableInfo | undefined {
  const lowerName = name.toLowerCase();
  const lowerSchema = schemaName?.toLowerCase();
  return schema.tables.find(
    (t) =>
      t.name.toLowerCase() === lowerName &&
      (lowerSchema === undefined || t.schema.toLowerCase() === lowerSchema),
  );
}
