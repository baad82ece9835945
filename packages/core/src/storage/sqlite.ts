/**
 * Local state store using better-sqlite3.
 * Holds question history and audit events; never result rows.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { defaultHome } from '../config.js';
import { storeLogger } from '../util/logger.js';

// ── Schema migrations ────────────────────────────────────────────────

const MIGRATIONS: string[] = [
  // 0: migrations table (always runs first)
  `CREATE TABLE IF NOT EXISTS migrations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    version INTEGER NOT NULL UNIQUE,
    applied_at TEXT NOT NULL DEFAULT (datetime('now'))
  )`,

  // 1: audit_events
  `CREATE TABLE IF NOT EXISTS audit_events (
    id TEXT PRIMARY KEY,
    at TEXT NOT NULL,
    type TEXT NOT NULL,
    payload_json TEXT
  )`,

  // 2: queries
  `CREATE TABLE IF NOT EXISTS queries (
    id TEXT PRIMARY KEY,
    session_id TEXT NOT NULL,
    asked_at TEXT NOT NULL,
    question TEXT NOT NULL,
    source TEXT NOT NULL
  )`,
  // 3: queries index
  `CREATE INDEX IF NOT EXISTS idx_queries_session ON queries (session_id, asked_at)`,

  // 4: generations
  `CREATE TABLE IF NOT EXISTS generations (
    id TEXT PRIMARY KEY,
    query_id TEXT NOT NULL,
    generated_at TEXT NOT NULL,
    model TEXT,
    generated_sql TEXT NOT NULL,
    validated_sql TEXT,
    attempts INTEGER NOT NULL DEFAULT 1,
    confidence REAL,
    assumptions_json TEXT,
    warnings_json TEXT,
    FOREIGN KEY (query_id) REFERENCES queries(id)
  )`,

  // 5: runs
  `CREATE TABLE IF NOT EXISTS runs (
    id TEXT PRIMARY KEY,
    query_id TEXT NOT NULL,
    ran_at TEXT NOT NULL,
    executed_sql TEXT,
    exec_ms INTEGER,
    row_count INTEGER,
    truncated INTEGER NOT NULL DEFAULT 0,
    status TEXT NOT NULL,
    chart_kind TEXT,
    error_code TEXT,
    error_text TEXT,
    FOREIGN KEY (query_id) REFERENCES queries(id)
  )`,
];

export interface AuditEvent {
  id: string;
  at: string;
  type: string;
  payload: Record<string, unknown> | null;
}

interface AuditRow {
  id: string;
  at: string;
  type: string;
  payload_json: string | null;
}

export const IN_MEMORY = ':memory:';

export function defaultDbPath(): string {
  return join(defaultHome(), 'vizbot.db');
}

/** Current time as an ISO string; sortable and millisecond-precise. */
export function nowIso(): string {
  return new Date().toISOString();
}

function parsePayload(json: string | null): Record<string, unknown> | null {
  if (!json) return null;
  try {
    const value: unknown = JSON.parse(json);
    return typeof value === 'object' && value !== null && !Array.isArray(value) ? { ...value } : null;
  } catch (err: unknown) {
    storeLogger.warn('unreadable audit payload', { error: err instanceof Error ? err.message : String(err) });
    return null;
  }
}

// ── LocalStore ───────────────────────────────────────────────────────

export class LocalStore {
  private db: Database.Database;

  constructor(dbPath: string = defaultDbPath()) {
    if (dbPath !== IN_MEMORY) {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    if (dbPath !== IN_MEMORY) this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
  }

  /** Run all pending migrations */
  migrate(): void {
    this.db.exec(MIGRATIONS[0]); // ensure migrations table exists

    const applied = this.db.prepare<[], { version: number }>('SELECT version FROM migrations ORDER BY version').all();
    const appliedSet = new Set(applied.map((r) => r.version));

    const insert = this.db.prepare<[number]>('INSERT INTO migrations (version) VALUES (?)');
    const apply = this.db.transaction((version: number, sql: string) => {
      this.db.exec(sql);
      insert.run(version);
    });

    MIGRATIONS.forEach((sql, version) => {
      if (version > 0 && !appliedSet.has(version)) apply(version, sql);
    });
  }

  // ── Audit events ─────────────────────────────────────────────────

  logAudit(type: string, payload?: Record<string, unknown>): void {
    this.db
      .prepare<[string, string, string, string | null]>(
        'INSERT INTO audit_events (id, at, type, payload_json) VALUES (?, ?, ?, ?)',
      )
      .run(randomUUID(), nowIso(), type, payload ? JSON.stringify(payload) : null);
  }

  listAuditEvents(opts?: { type?: string; limit?: number }): AuditEvent[] {
    const limit = opts?.limit ?? 50;
    const rows = opts?.type
      ? this.db
          .prepare<[string, number], AuditRow>(
            'SELECT id, at, type, payload_json FROM audit_events WHERE type = ? ORDER BY at DESC, rowid DESC LIMIT ?',
          )
          .all(opts.type, limit)
      : this.db
          .prepare<[number], AuditRow>(
            'SELECT id, at, type, payload_json FROM audit_events ORDER BY at DESC, rowid DESC LIMIT ?',
          )
          .all(limit);
    return rows.map((r) => ({ id: r.id, at: r.at, type: r.type, payload: parsePayload(r.payload_json) }));
  }

  // ── Lifecycle ────────────────────────────────────────────────────

  getDb(): Database.Database {
    return this.db;
  }

  close(): void {
    this.db.close();
  }
}
