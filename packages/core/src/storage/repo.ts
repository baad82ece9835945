/**
 * Query history repository.
 * Stores questions, generations, and execution runs.
 * NEVER stores result row data.
 */

import type Database from 'better-sqlite3';
import { randomUUID } from 'node:crypto';
import type { ConversationTurn } from '../llm/prompt.js';
import { nowIso } from './sqlite.js';
import { storeLogger } from '../util/logger.js';

// ── Types ────────────────────────────────────────────────────────────

export type QuerySource = 'ask' | 'run';
export type RunStatus = 'ok' | 'blocked' | 'error';

export interface StoredGeneration {
  model: string | null;
  generatedSql: string;
  /** SQL after validation and LIMIT rewriting; null when validation rejected it */
  validatedSql: string | null;
  attempts: number;
  confidence: number | null;
  assumptions: string[];
  warnings: string[];
}

export interface StoredRun {
  executedSql: string | null;
  execMs: number | null;
  rowCount: number | null;
  truncated: boolean;
  status: RunStatus;
  chartKind: string | null;
  errorCode?: string;
  errorText?: string;
}

export interface HistoryItem {
  id: string;
  sessionId: string;
  question: string;
  source: string;
  askedAt: string;
}

export interface HistoryListItem {
  id: string;
  sessionId: string;
  question: string;
  askedAt: string;
  status: string | null;
  chartKind: string | null;
  execMs: number | null;
  rowCount: number | null;
}

export interface HistoryDetail {
  query: HistoryItem;
  generation: {
    id: string;
    model: string | null;
    generatedSql: string;
    validatedSql: string | null;
    attempts: number;
    confidence: number | null;
    assumptions: string[];
    warnings: string[];
    generatedAt: string;
  } | null;
  run: {
    id: string;
    executedSql: string | null;
    execMs: number | null;
    rowCount: number | null;
    truncated: boolean;
    status: string;
    chartKind: string | null;
    errorCode: string | null;
    errorText: string | null;
    ranAt: string;
  } | null;
}

interface GenerationRow {
  id: string;
  model: string | null;
  generated_sql: string;
  validated_sql: string | null;
  attempts: number;
  confidence: number | null;
  assumptions_json: string | null;
  warnings_json: string | null;
  generated_at: string;
}

interface RunRow {
  id: string;
  executed_sql: string | null;
  exec_ms: number | null;
  row_count: number | null;
  truncated: number;
  status: string;
  chart_kind: string | null;
  error_code: string | null;
  error_text: string | null;
  ran_at: string;
}

// ── Repository functions ─────────────────────────────────────────────

export function createQuery(
  db: Database.Database,
  sessionId: string,
  question: string,
  source: QuerySource,
): string {
  const id = randomUUID();
  db.prepare<[string, string, string, string, string]>(
    `INSERT INTO queries (id, session_id, asked_at, question, source)
     VALUES (?, ?, ?, ?, ?)`,
  ).run(id, sessionId, nowIso(), question, source);
  return id;
}

export function storeGeneration(
  db: Database.Database,
  queryId: string,
  gen: StoredGeneration,
): string {
  const id = randomUUID();
  db.prepare(
    `INSERT INTO generations (id, query_id, generated_at, model, generated_sql, validated_sql, attempts, confidence, assumptions_json, warnings_json)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
  ).run(
    id,
    queryId,
    nowIso(),
    gen.model,
    gen.generatedSql,
    gen.validatedSql,
    gen.attempts,
    gen.confidence,
    JSON.stringify(gen.assumptions),
    JSON.stringify(gen.warnings),
  );
  return id;
}

export function storeRun(
  db: Database.Database,
  queryId: string,
  run: StoredRun,
): string {
  const id = randomUUID();
  db.prepare(
    `INSERT INTO runs (id, query_id, ran_at, executed_sql, exec_ms, row_count, truncated, status, chart_kind, error_code, error_text)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
  ).run(
    id,
    queryId,
    nowIso(),
    run.executedSql,
    run.execMs,
    run.rowCount,
    run.truncated ? 1 : 0,
    run.status,
    run.chartKind,
    run.errorCode ?? null,
    run.errorText ?? null,
  );
  return id;
}

export function listHistory(
  db: Database.Database,
  opts: { limit?: number; sessionId?: string } = {},
): HistoryListItem[] {
  const limit = opts.limit ?? 20;
  const select = `SELECT q.id, q.session_id AS sessionId, q.question, q.asked_at AS askedAt,
              r.status, r.chart_kind AS chartKind, r.exec_ms AS execMs, r.row_count AS rowCount
       FROM queries q
       LEFT JOIN runs r ON r.query_id = q.id`;
  const order = 'ORDER BY q.asked_at DESC, q.rowid DESC LIMIT ?';

  if (opts.sessionId) {
    return db
      .prepare<[string, number], HistoryListItem>(`${select} WHERE q.session_id = ? ${order}`)
      .all(opts.sessionId, limit);
  }
  return db.prepare<[number], HistoryListItem>(`${select} ${order}`).all(limit);
}

export function getHistoryItem(
  db: Database.Database,
  id: string,
): HistoryDetail | null {
  const query = db
    .prepare<[string], HistoryItem>(
      'SELECT id, session_id AS sessionId, question, source, asked_at AS askedAt FROM queries WHERE id = ?',
    )
    .get(id);

  if (!query) return null;

  const genRow = db
    .prepare<[string], GenerationRow>(
      `SELECT id, model, generated_sql, validated_sql, attempts, confidence, assumptions_json, warnings_json, generated_at
       FROM generations WHERE query_id = ? ORDER BY generated_at DESC, rowid DESC LIMIT 1`,
    )
    .get(id);

  const runRow = db
    .prepare<[string], RunRow>(
      `SELECT id, executed_sql, exec_ms, row_count, truncated, status, chart_kind, error_code, error_text, ran_at
       FROM runs WHERE query_id = ? ORDER BY ran_at DESC, rowid DESC LIMIT 1`,
    )
    .get(id);

  return {
    query,
    generation: genRow
      ? {
          id: genRow.id,
          model: genRow.model,
          generatedSql: genRow.generated_sql,
          validatedSql: genRow.validated_sql,
          attempts: genRow.attempts,
          confidence: genRow.confidence,
          assumptions: parseStringList(genRow.assumptions_json),
          warnings: parseStringList(genRow.warnings_json),
          generatedAt: genRow.generated_at,
        }
      : null,
    run: runRow
      ? {
          id: runRow.id,
          executedSql: runRow.executed_sql,
          execMs: runRow.exec_ms,
          rowCount: runRow.row_count,
          truncated: runRow.truncated === 1,
          status: runRow.status,
          chartKind: runRow.chart_kind,
          errorCode: runRow.error_code,
          errorText: runRow.error_text,
          ranAt: runRow.ran_at,
        }
      : null,
  };
}

/**
 * The last `limit` translated question/SQL pairs of a session, oldest first.
 * Statements the user wrote by hand are not conversation turns.
 */
export function recentTurns(
  db: Database.Database,
  sessionId: string,
  limit: number,
): ConversationTurn[] {
  if (limit <= 0) return [];
  const rows = db
    .prepare<[string, number], ConversationTurn>(
      `SELECT q.question, g.validated_sql AS sql
       FROM queries q
       JOIN generations g ON g.query_id = q.id
       WHERE q.session_id = ? AND q.source = 'ask' AND g.validated_sql IS NOT NULL
       ORDER BY q.asked_at DESC, q.rowid DESC
       LIMIT ?`,
    )
    .all(sessionId, limit);
  return rows.reverse();
}

function parseStringList(json: string | null): string[] {
  if (!json) return [];
  try {
    const value: unknown = JSON.parse(json);
    return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
  } catch (err: unknown) {
    storeLogger.warn('unreadable stored list', { error: err instanceof Error ? err.message : String(err) });
    return [];
  }
}
