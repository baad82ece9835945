/**
 * Policy types: candidate SQL states and row-limit configuration.
 */

import { SAFE_DEFAULTS } from '../db/defaults.js';

export interface PolicyConfig {
  /** LIMIT injected when a query has none */
  defaultLimit: number;
  /** LIMIT ceiling; larger limits are clamped */
  maxLimit: number;
}

export function defaultPolicyConfig(): PolicyConfig {
  return {
    defaultLimit: SAFE_DEFAULTS.defaultLimit,
    maxLimit: SAFE_DEFAULTS.maxRows,
  };
}

export type CandidateSource = 'model' | 'user';

/** Metadata from the completion that produced a candidate. */
export interface GenerationInfo {
  model: string;
  attempts: number;
  assumptions: readonly string[];
  confidence?: number;
}

export interface UnvalidatedCandidate {
  readonly state: 'unvalidated';
  readonly sql: string;
  readonly source: CandidateSource;
  readonly generation?: GenerationInfo;
}

export interface ValidatedCandidate {
  readonly state: 'validated';
  /** SQL to execute, after LIMIT rewriting */
  readonly sql: string;
  /** SQL as received */
  readonly originalSql: string;
  readonly source: CandidateSource;
  readonly generation?: GenerationInfo;
  /** Referenced base tables, schema-qualified */
  readonly tables: readonly string[];
  /** Effective LIMIT */
  readonly limit: number;
  readonly warnings: readonly string[];
}

export type CandidateSQL = UnvalidatedCandidate | ValidatedCandidate;

export function createCandidate(
  sql: string,
  source: CandidateSource = 'user',
  generation?: GenerationInfo,
): UnvalidatedCandidate {
  return Object.freeze({ state: 'unvalidated', sql, source, generation });
}
