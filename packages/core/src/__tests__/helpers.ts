/**
 * In-process stand-ins for PostgreSQL and the completion service.
 */

import type { DbPool, DbSession, RawField, RawQueryResult, Row, SchemaSnapshot } from '../db/types.js';
import type { CompletionProvider, CompletionRequest, CompletionResult } from '../llm/types.js';

export type QueryHandler = (sql: string, params: unknown[]) => RawQueryResult | Promise<RawQueryResult>;

export const OID = {
  int4: 23,
  int8: 20,
  numeric: 1700,
  float8: 701,
  text: 25,
  varchar: 1043,
  timestamp: 1114,
  date: 1082,
  bool: 16,
} as const;

export function raw(fields: Array<[string, number]>, rows: Row[]): RawQueryResult {
  const rawFields: RawField[] = fields.map(([name, dataTypeID]) => ({ name, dataTypeID }));
  return { fields: rawFields, rows, rowCount: rows.length };
}

export const EMPTY: RawQueryResult = { fields: [], rows: [], rowCount: null };

/** Error shaped like the ones `pg` raises, with a SQLSTATE or errno code. */
export function pgError(code: string, message: string): Error & { code: string } {
  return Object.assign(new Error(message), { code });
}

export class FakePool implements DbPool {
  /** Every statement run on any session, in order */
  readonly log: string[] = [];
  /** `destroy` flag of each release, in order */
  readonly releases: boolean[] = [];
  acquired = 0;
  ended = false;
  acquireError: Error | null = null;

  constructor(private handler: QueryHandler = () => EMPTY) {}

  setHandler(handler: QueryHandler): void {
    this.handler = handler;
  }

  async acquire(): Promise<DbSession> {
    if (this.acquireError) throw this.acquireError;
    this.acquired += 1;
    let released = false;
    return {
      query: async (sql: string, params: unknown[] = []) => {
        this.log.push(sql);
        return this.handler(sql, params);
      },
      release: (destroy = false) => {
        if (released) return;
        released = true;
        this.releases.push(destroy);
      },
    };
  }

  async end(): Promise<void> {
    this.ended = true;
  }
}

/**
 * Handler that answers transaction control with an empty result and
 * hands every other statement to `onQuery`.
 */
export function transactional(onQuery: QueryHandler): QueryHandler {
  return (sql, params) => {
    if (/^(BEGIN|COMMIT|ROLLBACK|SET LOCAL)\b/.test(sql)) return EMPTY;
    return onQuery(sql, params);
  };
}

export class StubProvider implements CompletionProvider {
  readonly name = 'stub';
  readonly calls: CompletionRequest[] = [];

  constructor(private readonly responses: Array<string | Error>) {}

  async complete(req: CompletionRequest): Promise<CompletionResult> {
    this.calls.push(req);
    const next = this.responses.shift();
    if (next === undefined) throw new Error('stub has no more responses');
    if (next instanceof Error) throw next;
    return { text: next, model: 'stub-model' };
  }
}

export function planJson(sql: string, assumptions: string[] = []): string {
  return JSON.stringify({ sql, assumptions, confidence: 0.9 });
}

export const SCHEMA: SchemaSnapshot = {
  capturedAt: new Date('2026-01-05T08:00:00Z'),
  tables: [
    {
      name: 'sensor_readings',
      schema: 'public',
      rowCountEstimate: 52000,
      columns: [
        { name: 'id', dataType: 'integer', nullable: false, isPrimaryKey: true },
        { name: 'room_id', dataType: 'integer', nullable: false, isPrimaryKey: false },
        { name: 'metric_name', dataType: 'text', nullable: false, isPrimaryKey: false },
        { name: 'value', dataType: 'numeric', nullable: true, isPrimaryKey: false },
        { name: 'start_time', dataType: 'timestamp without time zone', nullable: false, isPrimaryKey: false },
      ],
    },
    {
      name: 'rooms',
      schema: 'public',
      columns: [
        { name: 'id', dataType: 'integer', nullable: false, isPrimaryKey: true },
        { name: 'name', dataType: 'text', nullable: false, isPrimaryKey: false },
      ],
    },
  ],
};
