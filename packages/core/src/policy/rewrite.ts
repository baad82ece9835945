/**
 * LIMIT injection and clamping.
 *
 * Detection uses the AST. A missing LIMIT is appended to the original text
 * to keep its formatting; only clamping goes through sqlify. When an
 * appended LIMIT does not re-parse (LIMIT ALL, a parameter, a trailing
 * construct the parser rejects), the query is wrapped in a subquery.
 */

import type { AST } from 'node-sql-parser';
import { isNode, type AstNode } from './ast.js';
import { normalizeSql, parseSql, sqlify } from './parse.js';
import { translateLogger } from '../util/logger.js';

export interface LimitRewrite {
  sql: string;
  /** LIMIT in effect after the rewrite */
  limit: number;
  originalLimit: number | null;
  injected: boolean;
  clamped: boolean;
}

/**
 * Ensure a SELECT has a LIMIT no larger than `maxLimit`.
 *
 * - no LIMIT: `defaultLimit` is appended on a new line
 * - LIMIT within bounds: returned unchanged
 * - LIMIT above `maxLimit`: rewritten to `maxLimit`
 */
export function ensureLimit(sql: string, defaultLimit: number, maxLimit: number): LimitRewrite {
  const trimmed = normalizeSql(sql);
  const injectLimit = Math.min(defaultLimit, maxLimit);
  const parsed = parseSql(trimmed);

  if (!parsed.ok || parsed.kind !== 'select') {
    return {
      sql: wrapWithLimit(trimmed, injectLimit),
      limit: injectLimit,
      originalLimit: null,
      injected: true,
      clamped: false,
    };
  }

  const holder = findLimitHolder(parsed.ast);
  const existing = holder ? readLimit(holder) : null;

  if (existing === null) {
    // Newline, so a trailing `--` comment cannot swallow the clause.
    const appended = `${trimmed}\nLIMIT ${injectLimit}`;
    const check = parseSql(appended);
    const sqlOut = check.ok && limitOf(check.ast) === injectLimit ? appended : wrapWithLimit(trimmed, injectLimit);
    return { sql: sqlOut, limit: injectLimit, originalLimit: null, injected: true, clamped: false };
  }

  if (existing <= maxLimit) {
    return { sql: trimmed, limit: existing, originalLimit: existing, injected: false, clamped: false };
  }

  return {
    sql: clampLimit(parsed.statement, holder, trimmed, maxLimit),
    limit: maxLimit,
    originalLimit: existing,
    injected: false,
    clamped: true,
  };
}

/** Effective LIMIT of a parsed SELECT, or null when it has none. */
export function limitOf(ast: AstNode): number | null {
  const holder = findLimitHolder(ast);
  return holder ? readLimit(holder) : null;
}

function clampLimit(statement: AST, holder: AstNode | null, original: string, maxLimit: number): string {
  if (holder && writeLimit(holder, maxLimit)) {
    try {
      return sqlify(statement);
    } catch (err: unknown) {
      translateLogger.warn('sqlify failed while clamping LIMIT; wrapping instead', {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
  return wrapWithLimit(original, maxLimit);
}

function wrapWithLimit(sql: string, limit: number): string {
  return `SELECT * FROM (\n${sql}\n) AS limited_result\nLIMIT ${limit}`;
}

// A set operation chains its branches through `_next`; the trailing LIMIT
// may sit on the head or on the last branch depending on the parser release.
function findLimitHolder(ast: AstNode): AstNode | null {
  let node: unknown = ast;
  while (isNode(node)) {
    if (limitValues(node).length > 0) return node;
    node = node._next;
  }
  return null;
}

function limitValues(node: AstNode): unknown[] {
  const limit = node.limit;
  if (!isNode(limit) || !Array.isArray(limit.value)) return [];
  return limit.value;
}

// `LIMIT n OFFSET m` gives [n, m]; the MySQL form `LIMIT m, n` gives [m, n]
// with a ',' separator (spelled `seperator` by the parser).
function limitIndex(node: AstNode, values: unknown[]): number {
  const limit = node.limit;
  const separator = isNode(limit) ? (limit.seperator ?? limit.separator) : undefined;
  return separator === ',' && values.length === 2 ? 1 : 0;
}

function readLimit(node: AstNode): number | null {
  const values = limitValues(node);
  if (values.length === 0) return null;
  const entry = values[limitIndex(node, values)];
  if (isNode(entry) && entry.type === 'number' && typeof entry.value === 'number') {
    return entry.value;
  }
  return null;
}

function writeLimit(node: AstNode, value: number): boolean {
  const values = limitValues(node);
  const entry = values[limitIndex(node, values)];
  if (!isNode(entry) || typeof entry.value !== 'number') return false;
  entry.value = value;
  return true;
}
