/**
 * VizSession: the boundary a presentation layer talks to.
 *
 * translate → run → summarize, plus `ask` to do all three. A session
 * handles one request at a time; the conversation history it feeds the
 * translator is kept in memory and, with a LocalStore attached, persisted
 * under the session id.
 */

import { randomUUID } from 'node:crypto';
import type { DbPool, ResultSet, SchemaSnapshot } from './db/types.js';
import type { CompletionProvider } from './llm/types.js';
import type { ConversationTurn } from './llm/prompt.js';
import { SchemaCache } from './db/schema-cache.js';
import { fetchSchema } from './db/introspect.js';
import { executeCandidate } from './db/execute.js';
import { SAFE_DEFAULTS } from './db/defaults.js';
import { SqlValidator, type CandidateValidator } from './policy/engine.js';
import { createCandidate, type CandidateSQL, type ValidatedCandidate } from './policy/types.js';
import { Translator } from './translate.js';
import { chooseChart, DEFAULT_BAR_MAX_ROWS } from './viz/chart.js';
import type { ChartKind, ChartSpec } from './viz/types.js';
import { summarize } from './insight/summarize.js';
import type { LocalStore } from './storage/sqlite.js';
import {
  createQuery,
  recentTurns,
  storeGeneration,
  storeRun,
  type QuerySource,
  type StoredRun,
} from './storage/repo.js';
import { SchemaMismatchError, UnsafeStatementError, isVizError, type VizError } from './errors.js';
import { errorMessage } from './db/pg-errors.js';
import { sessionLogger } from './util/logger.js';

export interface VizSessionOptions {
  sessionId?: string;
  schemas?: string[];
  schemaTtlMs?: number;
  schemaTokenBudget?: number;
  defaultLimit?: number;
  maxRows?: number;
  maxRetries?: number;
  historyTurns?: number;
  statementTimeoutMs?: number;
  barMaxRows?: number;
}

export interface VizSessionDeps {
  db: DbPool;
  provider: CompletionProvider;
  store?: LocalStore;
  /** Shared cache; one is created over `fetchSchema` otherwise */
  schemaCache?: SchemaCache;
  validator?: CandidateValidator;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface RunOptions extends RequestOptions {
  /** Chart kind to use when the result's shape supports it */
  chart?: ChartKind;
}

export interface RunOutput {
  result: ResultSet;
  chart: ChartSpec;
}

export interface AskOptions extends RunOptions {
  /** Generate an insight after running (default true) */
  insight?: boolean;
  /** Run the statement (default true); false stops after translation */
  execute?: boolean;
}

export type AskResult =
  | {
      ok: true;
      question: string;
      candidate: ValidatedCandidate;
      result: ResultSet | null;
      chart: ChartSpec | null;
      insight: string | null;
    }
  | {
      ok: false;
      question: string;
      error: VizError;
      candidate?: ValidatedCandidate;
    };

export class VizSession {
  readonly sessionId: string;
  private readonly db: DbPool;
  private readonly provider: CompletionProvider;
  private readonly store?: LocalStore;
  private readonly cache: SchemaCache;
  private readonly validator: CandidateValidator;
  private readonly translator: Translator;
  private readonly historyTurns: number;
  private readonly maxRows: number;
  private readonly statementTimeoutMs: number;
  private readonly barMaxRows: number;
  private history: ConversationTurn[] = [];
  private queue: Promise<void> = Promise.resolve();
  // History record for each candidate this session produced
  private readonly queryIds = new WeakMap<ValidatedCandidate, string>();

  constructor(deps: VizSessionDeps, opts: VizSessionOptions = {}) {
    this.sessionId = opts.sessionId ?? randomUUID();
    this.db = deps.db;
    this.provider = deps.provider;
    this.store = deps.store;
    this.cache =
      deps.schemaCache ??
      new SchemaCache(() => fetchSchema(deps.db, { schemas: opts.schemas }), {
        ttlMs: opts.schemaTtlMs ?? SAFE_DEFAULTS.schemaTtlMs,
      });
    this.maxRows = opts.maxRows ?? SAFE_DEFAULTS.maxRows;
    this.validator =
      deps.validator ??
      new SqlValidator({ defaultLimit: opts.defaultLimit ?? SAFE_DEFAULTS.defaultLimit, maxLimit: this.maxRows });
    this.historyTurns = Math.max(0, opts.historyTurns ?? SAFE_DEFAULTS.historyTurns);
    this.translator = new Translator(deps.provider, {
      maxRetries: opts.maxRetries,
      historyTurns: this.historyTurns,
      schemaTokenBudget: opts.schemaTokenBudget,
      validator: this.validator,
    });
    this.statementTimeoutMs = opts.statementTimeoutMs ?? SAFE_DEFAULTS.statementTimeoutMs;
    this.barMaxRows = opts.barMaxRows ?? DEFAULT_BAR_MAX_ROWS;

    if (this.store && this.historyTurns > 0) {
      this.history = recentTurns(this.store.getDb(), this.sessionId, this.historyTurns);
    }
  }

  /** Conversation turns the next translation will see, oldest first. */
  getHistory(): readonly ConversationTurn[] {
    return this.history;
  }

  /** Current schema snapshot; `refresh` forces a new introspection. */
  schema(opts: { refresh?: boolean } = {}): Promise<SchemaSnapshot> {
    return opts.refresh ? this.cache.refresh() : this.cache.get();
  }

  translate(question: string, opts: RequestOptions = {}): Promise<ValidatedCandidate> {
    return this.serial(() => this.translateNow(question, opts));
  }

  /** Validate SQL written by the user, for running without translation. */
  prepare(sql: string): Promise<ValidatedCandidate> {
    return this.serial(() => this.prepareNow(sql));
  }

  run(candidate: CandidateSQL, question: string, opts: RunOptions = {}): Promise<RunOutput> {
    return this.serial(() => this.runNow(candidate, question, opts));
  }

  summarize(result: ResultSet, question: string, opts: RequestOptions = {}): Promise<string> {
    return summarize(this.provider, result, question, { signal: opts.signal });
  }

  /**
   * Translate, run and summarize in one call. VizErrors come back as a
   * failed turn; anything else propagates.
   */
  ask(question: string, opts: AskOptions = {}): Promise<AskResult> {
    return this.serial(async (): Promise<AskResult> => {
      let candidate: ValidatedCandidate | undefined;
      try {
        candidate = await this.translateNow(question, opts);
        if (opts.execute === false) {
          return { ok: true, question, candidate, result: null, chart: null, insight: null };
        }
        const { result, chart } = await this.runNow(candidate, question, opts);
        const insight = opts.insight === false ? null : await this.summarize(result, question, opts);
        return { ok: true, question, candidate, result, chart, insight };
      } catch (err: unknown) {
        if (!isVizError(err)) throw err;
        sessionLogger.info('turn failed', { code: err.code, error: err.message });
        return { ok: false, question, error: err, candidate };
      }
    });
  }

  private serial<T>(task: () => Promise<T>): Promise<T> {
    const next = this.queue.then(task);
    // The caller gets the outcome; the queue only waits for it to settle.
    this.queue = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }

  private async translateNow(question: string, opts: RequestOptions): Promise<ValidatedCandidate> {
    const schema = await this.cache.get();
    try {
      const candidate = await this.translator.translate({
        question,
        schema,
        history: this.history,
        signal: opts.signal,
      });
      this.remember({ question, sql: candidate.sql });
      this.recordTranslation(question, 'ask', candidate);
      return candidate;
    } catch (err: unknown) {
      this.onRejected(err);
      this.recordFailure(question, 'ask', err);
      throw err;
    }
  }

  private async prepareNow(sql: string): Promise<ValidatedCandidate> {
    const schema = await this.cache.get();
    try {
      const candidate = this.validator.validate(createCandidate(sql, 'user'), schema);
      this.recordTranslation(sql, 'run', candidate);
      return candidate;
    } catch (err: unknown) {
      this.onRejected(err);
      this.recordFailure(sql, 'run', err);
      throw err;
    }
  }

  private async runNow(candidate: CandidateSQL, question: string, opts: RunOptions): Promise<RunOutput> {
    const queryId = candidate.state === 'validated' ? this.queryIds.get(candidate) : undefined;
    try {
      const result = await executeCandidate(this.db, candidate, {
        maxRows: this.maxRows,
        statementTimeoutMs: this.statementTimeoutMs,
        signal: opts.signal,
      });
      const chart = chooseChart(result, question, { barMaxRows: this.barMaxRows, preferred: opts.chart });
      sessionLogger.info('run complete', { rows: result.rowCount, chart: chart.kind, reason: chart.reason });
      if (queryId) {
        this.recordRun(queryId, {
          executedSql: candidate.sql,
          execMs: result.execMs,
          rowCount: result.rowCount,
          truncated: result.truncated,
          status: 'ok',
          chartKind: chart.kind,
        });
      }
      return { result, chart };
    } catch (err: unknown) {
      if (queryId) this.recordRun(queryId, failedRun(err, candidate.sql));
      throw err;
    }
  }

  private remember(turn: ConversationTurn): void {
    if (this.historyTurns === 0) return;
    this.history = [...this.history, turn].slice(-this.historyTurns);
  }

  private onRejected(err: unknown): void {
    if (err instanceof SchemaMismatchError) {
      // The snapshot may predate the tables the question is about.
      this.cache.invalidate();
    }
  }

  // ── History recording ────────────────────────────────────────────
  // Store failures are logged and never fail the request.

  private withStore(action: string, fn: (store: LocalStore) => void): void {
    if (!this.store) return;
    try {
      fn(this.store);
    } catch (err: unknown) {
      sessionLogger.warn('history write failed', { action, error: errorMessage(err) });
    }
  }

  private recordTranslation(question: string, source: QuerySource, candidate: ValidatedCandidate): void {
    this.withStore('translation', (store) => {
      const db = store.getDb();
      const queryId = createQuery(db, this.sessionId, question, source);
      storeGeneration(db, queryId, {
        model: candidate.generation?.model ?? null,
        generatedSql: candidate.originalSql,
        validatedSql: candidate.sql,
        attempts: candidate.generation?.attempts ?? 0,
        confidence: candidate.generation?.confidence ?? null,
        assumptions: [...(candidate.generation?.assumptions ?? [])],
        warnings: [...candidate.warnings],
      });
      this.queryIds.set(candidate, queryId);
    });
  }

  private recordFailure(question: string, source: QuerySource, err: unknown): void {
    this.withStore('failure', (store) => {
      const db = store.getDb();
      const queryId = createQuery(db, this.sessionId, question, source);
      storeRun(db, queryId, failedRun(err, null));
      if (err instanceof UnsafeStatementError) {
        store.logAudit('statement_blocked', {
          sessionId: this.sessionId,
          queryId,
          offending: err.offending,
          reason: err.message,
        });
      }
    });
  }

  private recordRun(queryId: string, run: StoredRun): void {
    this.withStore('run', (store) => {
      storeRun(store.getDb(), queryId, run);
    });
  }
}

function failedRun(err: unknown, sql: string | null): StoredRun {
  const blocked = err instanceof UnsafeStatementError || err instanceof SchemaMismatchError;
  return {
    executedSql: sql,
    execMs: null,
    rowCount: null,
    truncated: false,
    status: blocked ? 'blocked' : 'error',
    chartKind: null,
    errorCode: isVizError(err) ? err.code : undefined,
    errorText: errorMessage(err),
  };
}
