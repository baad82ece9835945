/**
 * Execution of validated candidates.
 *
 * The statement runs inside `BEGIN READ ONLY` with a transaction-local
 * statement_timeout. A timeout rolls the transaction back and the
 * connection goes back to the pool; an aborted request destroys its
 * connection instead.
 */

import type { DbPool, DbSession, ResultSet } from './types.js';
import type { CandidateSQL } from '../policy/types.js';
import { isValidated } from '../policy/engine.js';
import { SAFE_DEFAULTS } from './defaults.js';
import { shapeResult } from './result.js';
import { acquireSession } from './pool.js';
import { QUERY_CANCELED, errorCode, errorMessage, isConnectionFailure } from './pg-errors.js';
import {
  CancelledError,
  ConnectionError,
  InvalidStateError,
  QueryExecutionError,
  QueryTimeoutError,
} from '../errors.js';
import { executeLogger } from '../util/logger.js';

export interface ExecuteOptions {
  /** Hard cap on returned rows */
  maxRows?: number;
  statementTimeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Run a validated candidate and shape its rows.
 *
 * @throws InvalidStateError before touching the database when the candidate is not validated
 * @throws QueryTimeoutError after rolling back a statement that hit the timeout
 */
export async function executeCandidate(
  db: DbPool,
  candidate: CandidateSQL,
  opts: ExecuteOptions = {},
): Promise<ResultSet> {
  if (!isValidated(candidate)) {
    throw new InvalidStateError();
  }
  const signal = opts.signal;
  if (signal?.aborted) throw new CancelledError();

  const maxRows = opts.maxRows ?? SAFE_DEFAULTS.maxRows;
  const timeoutMs = Math.max(1, Math.floor(opts.statementTimeoutMs ?? SAFE_DEFAULTS.statementTimeoutMs));

  const session = await acquireSession(db);
  if (signal?.aborted) {
    session.release();
    throw new CancelledError();
  }

  let destroy = false;
  const onAbort = () => {
    // Closing the connection is the only way to stop an in-flight statement.
    destroy = true;
    session.release(true);
  };
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    await session.query('BEGIN READ ONLY');
    await session.query(`SET LOCAL statement_timeout = ${timeoutMs}`);

    const start = performance.now();
    const raw = await session.query(candidate.sql);
    const execMs = Math.round(performance.now() - start);

    await session.query('COMMIT');

    const result = shapeResult(raw, maxRows, execMs);
    executeLogger.info('query executed', {
      rows: result.rowCount,
      truncated: result.truncated,
      ms: execMs,
    });
    return result;
  } catch (err: unknown) {
    if (signal?.aborted) {
      destroy = true;
      throw new CancelledError();
    }

    if (isConnectionFailure(err)) {
      destroy = true;
      throw new ConnectionError(`Connection lost during query: ${errorMessage(err)}`, { cause: err });
    }

    if (!(await rollback(session))) destroy = true;

    const code = errorCode(err);
    if (code === QUERY_CANCELED) {
      executeLogger.warn('statement timeout', { timeoutMs });
      throw new QueryTimeoutError(timeoutMs);
    }
    throw new QueryExecutionError(errorMessage(err), code, { cause: err });
  } finally {
    signal?.removeEventListener('abort', onAbort);
    session.release(destroy);
  }
}

async function rollback(session: DbSession): Promise<boolean> {
  try {
    await session.query('ROLLBACK');
    return true;
  } catch (err: unknown) {
    executeLogger.warn('rollback failed; discarding connection', { error: errorMessage(err) });
    return false;
  }
}
