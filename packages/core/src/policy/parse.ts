/**
 * AST-based SQL parser. Uses node-sql-parser with the PostgreSQL dialect.
 */

import pkg from 'node-sql-parser';
import type { AST } from 'node-sql-parser';
import { isNode, type AstNode } from './ast.js';

const { Parser } = pkg;

const parser = new Parser();
const PG_OPT = { database: 'PostgresQL' } as const;

export type SqlKind =
  | 'select'
  | 'insert'
  | 'update'
  | 'delete'
  | 'create'
  | 'alter'
  | 'drop'
  | 'truncate'
  | 'unknown';

const KNOWN_KINDS: readonly SqlKind[] = [
  'select',
  'insert',
  'update',
  'delete',
  'create',
  'alter',
  'drop',
  'truncate',
];

export interface ParseResult {
  /** The parsed AST (first statement) */
  ast: AstNode;
  /** Same statement under the parser's own typing, for sqlify() */
  statement: AST;
  statementCount: number;
  kind: SqlKind;
  /** Input with trailing semicolons stripped */
  normalizedSql: string;
}

export type ParseOutcome = ({ ok: true } & ParseResult) | { ok: false; error: string };

export function normalizeSql(sql: string): string {
  return sql.trim().replace(/;+\s*$/, '');
}

export function parseSql(sql: string): ParseOutcome {
  const normalizedSql = normalizeSql(sql);

  if (!normalizedSql) {
    return { ok: false, error: 'Empty SQL statement' };
  }

  let astResult: AST | AST[];
  try {
    astResult = parser.astify(normalizedSql, PG_OPT);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    return { ok: false, error: `SQL parse error: ${msg}` };
  }

  const statements: AST[] = Array.isArray(astResult) ? astResult : [astResult];
  const first = statements[0];
  if (first === undefined || !isNode(first)) {
    return { ok: false, error: 'No statements found' };
  }

  const rawKind = typeof first.type === 'string' ? first.type.toLowerCase() : '';
  return {
    ok: true,
    ast: first,
    statement: first,
    statementCount: statements.length,
    kind: isKnownKind(rawKind) ? rawKind : 'unknown',
    normalizedSql,
  };
}

function isKnownKind(s: string): s is SqlKind {
  return KNOWN_KINDS.some((k) => k === s);
}

/** Render a statement back to PostgreSQL text. */
export function sqlify(statement: AST): string {
  return parser.sqlify(statement, PG_OPT);
}
