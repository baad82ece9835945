/**
 * Read-only rules.
 *
 * The keyword scan runs on raw text before parsing, so a response that
 * mentions DROP TABLE is rejected even when it does not parse. The AST
 * rules catch what a SELECT can still do: call server-side functions with
 * side effects, or create a table through SELECT ... INTO.
 */

import { functionName, isNode, walkAst, type AstNode } from './ast.js';

export interface RuleViolation {
  rule: string;
  offending: string;
  reason: string;
}

export const FORBIDDEN_KEYWORDS = [
  'INSERT',
  'UPDATE',
  'DELETE',
  'DROP',
  'ALTER',
  'TRUNCATE',
  'CREATE',
  'GRANT',
  'REVOKE',
  'MERGE',
  'COPY',
] as const;

const KEYWORD_RE = new RegExp(`\\b(${FORBIDDEN_KEYWORDS.join('|')})\\b`, 'i');

const DANGEROUS_FUNCTIONS = new Set([
  'pg_sleep',
  'pg_terminate_backend',
  'pg_cancel_backend',
  'pg_reload_conf',
  'pg_advisory_lock',
  'set_config',
  'lo_import',
  'lo_export',
  'lo_unlink',
  'dblink',
  'dblink_exec',
  'pg_read_file',
  'pg_read_binary_file',
  'pg_write_file',
  'pg_ls_dir',
  'pg_stat_file',
  'nextval',
  'setval',
]);

/**
 * Find the first data-modifying keyword in the text, matched as a whole
 * word in any case. String literals and comments are scanned too.
 */
export function findForbiddenKeyword(sql: string): RuleViolation | null {
  const match = KEYWORD_RE.exec(sql);
  if (!match) return null;
  const keyword = match[1].toUpperCase();
  return {
    rule: 'read_only',
    offending: keyword,
    reason: `Data-modifying keyword "${keyword}" is not allowed.`,
  };
}

/** AST rules for a parsed SELECT. */
export function checkSelectAst(ast: AstNode): RuleViolation[] {
  const violations: RuleViolation[] = [];
  const seen = new Set<string>();

  walkAst(ast, (node) => {
    if (node.type === 'function' || node.type === 'aggr_func') {
      const name = functionName(node)?.toLowerCase();
      if (name && DANGEROUS_FUNCTIONS.has(name) && !seen.has(name)) {
        seen.add(name);
        violations.push({
          rule: 'dangerous_function',
          offending: name,
          reason: `Function "${name}" is not allowed.`,
        });
      }
    }
    if (node.type === 'select' && hasInto(node)) {
      violations.push({
        rule: 'select_into',
        offending: 'INTO',
        reason: 'SELECT ... INTO creates a table and is not allowed.',
      });
    }
  });

  return violations;
}

function hasInto(select: AstNode): boolean {
  const into = select.into;
  if (!isNode(into)) return false;
  // The parser leaves `{ position: null }` when there is no INTO clause.
  return into.position != null || into.expr != null || into.type != null;
}
