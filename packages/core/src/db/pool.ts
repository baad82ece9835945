/**
 * `pg` connection pool behind the DbPool seam.
 */

import pg from 'pg';
import type { Pool as NativePool, PoolClient } from 'pg';
import type { DbPool, DbSession, RawQueryResult } from './types.js';
import { ConnectionError } from '../errors.js';
import { errorMessage } from './pg-errors.js';
import { executeLogger } from '../util/logger.js';

const { Pool } = pg;

export interface PgPoolOptions {
  connectionString: string;
  max?: number;
  connectionTimeoutMs?: number;
  idleTimeoutMs?: number;
}

class PgSession implements DbSession {
  private released = false;

  constructor(private readonly client: PoolClient) {}

  async query(sql: string, params: unknown[] = []): Promise<RawQueryResult> {
    const result = await this.client.query(sql, params);
    return {
      fields: (result.fields ?? []).map((f) => ({ name: f.name, dataTypeID: f.dataTypeID })),
      rows: result.rows ?? [],
      rowCount: result.rowCount,
    };
  }

  release(destroy = false): void {
    if (this.released) return;
    this.released = true;
    this.client.release(destroy);
  }
}

export class PgPool implements DbPool {
  private readonly pool: NativePool;

  constructor(opts: PgPoolOptions) {
    this.pool = new Pool({
      connectionString: opts.connectionString,
      max: opts.max ?? 5,
      connectionTimeoutMillis: opts.connectionTimeoutMs ?? 10_000,
      idleTimeoutMillis: opts.idleTimeoutMs ?? 30_000,
      application_name: 'vizbot',
    });
    // An idle client can fail (server restart); without a listener pg crashes the process.
    this.pool.on('error', (err) => {
      executeLogger.warn('idle pool client error', { error: err.message });
    });
  }

  async acquire(): Promise<DbSession> {
    const client = await this.pool.connect();
    return new PgSession(client);
  }

  async end(): Promise<void> {
    await this.pool.end();
  }
}

/** Check out a connection, reporting failure as ConnectionError. */
export async function acquireSession(db: DbPool): Promise<DbSession> {
  try {
    return await db.acquire();
  } catch (err: unknown) {
    throw new ConnectionError(`Could not connect: ${errorMessage(err)}`, { cause: err });
  }
}
