/**
 * SQL validator: the only producer of validated candidates.
 *
 * Checks run in this order: data-modifying keyword scan, parse, statement
 * kind, AST rules, schema identifiers, LIMIT rewrite. Unsafe statements
 * and schema mismatches are final; parse failures are reported as
 * SqlParseError so the translator can ask the model to correct them.
 */

import type { SchemaSnapshot } from '../db/types.js';
import { SchemaMismatchError, SqlParseError, UnsafeStatementError } from '../errors.js';
import { parseSql } from './parse.js';
import { checkSelectAst, findForbiddenKeyword } from './rules.js';
import { resolveIdentifiers } from './identifiers.js';
import { ensureLimit } from './rewrite.js';
import {
  defaultPolicyConfig,
  type CandidateSQL,
  type PolicyConfig,
  type ValidatedCandidate,
} from './types.js';

// Validated candidates are recognised by identity, so an object literal
// claiming `state: 'validated'` is still treated as unvalidated.
const issued = new WeakSet<ValidatedCandidate>();

export function isValidated(candidate: CandidateSQL): candidate is ValidatedCandidate {
  return candidate.state === 'validated' && issued.has(candidate);
}

export interface CandidateValidator {
  validate(candidate: CandidateSQL, schema: SchemaSnapshot): ValidatedCandidate;
  getConfig(): PolicyConfig;
}

export class SqlValidator implements CandidateValidator {
  private config: PolicyConfig;

  constructor(config?: Partial<PolicyConfig>) {
    this.config = { ...defaultPolicyConfig(), ...config };
    if (this.config.defaultLimit > this.config.maxLimit) {
      this.config.defaultLimit = this.config.maxLimit;
    }
  }

  /**
   * @throws UnsafeStatementError for anything but a single read-only SELECT
   * @throws SqlParseError when the text does not parse as one statement
   * @throws SchemaMismatchError when a table or column is not in the snapshot
   */
  validate(candidate: CandidateSQL, schema: SchemaSnapshot): ValidatedCandidate {
    if (isValidated(candidate)) return candidate;
    const sql = candidate.sql;

    const keyword = findForbiddenKeyword(sql);
    if (keyword) {
      throw new UnsafeStatementError(keyword.offending, keyword.reason);
    }

    const parsed = parseSql(sql);
    if (!parsed.ok) {
      throw new SqlParseError(parsed.error);
    }
    if (parsed.statementCount > 1) {
      throw new SqlParseError(
        `Multiple statements detected (${parsed.statementCount}). Return exactly one SELECT statement.`,
      );
    }
    if (parsed.kind !== 'select') {
      const kind = parsed.kind.toUpperCase();
      throw new UnsafeStatementError(kind, `Statement type "${kind}" is not allowed. Only SELECT is supported.`);
    }

    const violations = checkSelectAst(parsed.ast);
    if (violations.length > 0) {
      const first = violations[0];
      throw new UnsafeStatementError(first.offending, first.reason);
    }

    const identifiers = resolveIdentifiers(parsed.ast, schema);
    if (identifiers.unknown.length > 0) {
      throw new SchemaMismatchError(identifiers.unknown);
    }

    const rewrite = ensureLimit(parsed.normalizedSql, this.config.defaultLimit, this.config.maxLimit);
    const warnings: string[] = [];
    if (rewrite.injected) {
      warnings.push(`LIMIT ${rewrite.limit} injected (no LIMIT was present).`);
    }
    if (rewrite.clamped) {
      warnings.push(`LIMIT clamped from ${rewrite.originalLimit} to ${rewrite.limit}.`);
    }

    const validated: ValidatedCandidate = Object.freeze({
      state: 'validated',
      sql: rewrite.sql,
      originalSql: sql,
      source: candidate.source,
      generation: candidate.generation,
      tables: Object.freeze([...identifiers.tables]),
      limit: rewrite.limit,
      warnings: Object.freeze(warnings),
    });
    issued.add(validated);
    return validated;
  }

  getConfig(): PolicyConfig {
    return { ...this.config };
  }
}

/** One-off validation with the given row limits. */
export function validateCandidate(
  candidate: CandidateSQL,
  schema: SchemaSnapshot,
  limits?: Partial<PolicyConfig>,
): ValidatedCandidate {
  return new SqlValidator(limits).validate(candidate, schema);
}
