import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { executeCandidate } from '../execute.js';
import { SqlValidator } from '../../policy/engine.js';
import { createCandidate, type ValidatedCandidate } from '../../policy/types.js';
import {
  CancelledError,
  ConnectionError,
  InvalidStateError,
  QueryExecutionError,
  QueryTimeoutError,
} from '../../errors.js';
import { EMPTY, FakePool, OID, SCHEMA, pgError, raw, transactional } from '../../__tests__/helpers.js';

const validator = new SqlValidator();
const candidate = validator.validate(createCandidate('SELECT name FROM rooms'), SCHEMA);

const roomRows = transactional(() =>
  raw(
    [
      ['name', OID.text],
      ['avg_value', OID.numeric],
    ],
    [
      { name: 'Lab', avg_value: '21.50' },
      { name: 'Office', avg_value: '19.25' },
      { name: 'Hall', avg_value: null },
    ],
  ),
);

describe('executeCandidate', () => {
  it('refuses a forged candidate before acquiring a connection', async () => {
    const pool = new FakePool(roomRows);
    const forged: ValidatedCandidate = { ...candidate };

    await assert.rejects(executeCandidate(pool, forged), InvalidStateError);
    await assert.rejects(executeCandidate(pool, createCandidate('SELECT 1')), InvalidStateError);
    assert.equal(pool.acquired, 0);
  });

  it('runs inside a read-only transaction with a statement timeout', async () => {
    const pool = new FakePool(roomRows);
    const result = await executeCandidate(pool, candidate, { statementTimeoutMs: 2500 });

    assert.deepEqual(pool.log, [
      'BEGIN READ ONLY',
      'SET LOCAL statement_timeout = 2500',
      'SELECT name FROM rooms\nLIMIT 1000',
      'COMMIT',
    ]);
    assert.deepEqual(pool.releases, [false]);
    assert.deepEqual(result.columns, [
      { name: 'name', pgType: OID.text, kind: 'categorical' },
      { name: 'avg_value', pgType: OID.numeric, kind: 'numeric' },
    ]);
    assert.deepEqual(result.rows, [
      { name: 'Lab', avg_value: 21.5 },
      { name: 'Office', avg_value: 19.25 },
      { name: 'Hall', avg_value: null },
    ]);
    assert.equal(result.rowCount, 3);
    assert.equal(result.truncated, false);
  });

  it('truncates past maxRows', async () => {
    const result = await executeCandidate(new FakePool(roomRows), candidate, { maxRows: 2 });
    assert.equal(result.rows.length, 2);
    assert.equal(result.rowCount, 3);
    assert.equal(result.truncated, true);
  });

  it('rolls back on timeout and leaves the pool usable', async () => {
    const pool = new FakePool(
      transactional(() => {
        throw pgError('57014', 'canceling statement due to statement timeout');
      }),
    );

    await assert.rejects(
      executeCandidate(pool, candidate, { statementTimeoutMs: 50 }),
      (err: unknown) => err instanceof QueryTimeoutError && err.timeoutMs === 50 && err.code === 'QUERY_TIMEOUT',
    );
    assert.deepEqual(pool.log, [
      'BEGIN READ ONLY',
      'SET LOCAL statement_timeout = 50',
      'SELECT name FROM rooms\nLIMIT 1000',
      'ROLLBACK',
    ]);
    assert.deepEqual(pool.releases, [false]);

    pool.setHandler(roomRows);
    const result = await executeCandidate(pool, candidate);
    assert.equal(result.rowCount, 3);
    assert.deepEqual(pool.releases, [false, false]);
  });

  it('discards the connection when ROLLBACK fails', async () => {
    const pool = new FakePool((sql) => {
      if (sql === 'ROLLBACK') throw pgError('25P02', 'transaction is aborted');
      if (sql.startsWith('SELECT')) throw pgError('57014', 'canceling statement due to statement timeout');
      return EMPTY;
    });
    await assert.rejects(executeCandidate(pool, candidate), QueryTimeoutError);
    assert.deepEqual(pool.releases, [true]);
  });

  it('reports other database errors with their SQLSTATE', async () => {
    const pool = new FakePool(
      transactional(() => {
        throw pgError('42P01', 'relation "rooms" does not exist');
      }),
    );
    await assert.rejects(
      executeCandidate(pool, candidate),
      (err: unknown) =>
        err instanceof QueryExecutionError && err.sqlState === '42P01' && err.message === 'relation "rooms" does not exist',
    );
    assert.equal(pool.log.at(-1), 'ROLLBACK');
    assert.deepEqual(pool.releases, [false]);
  });

  it('discards the connection when it drops mid-query', async () => {
    const pool = new FakePool(
      transactional(() => {
        throw pgError('ECONNRESET', 'read ECONNRESET');
      }),
    );
    await assert.rejects(executeCandidate(pool, candidate), ConnectionError);
    assert.equal(pool.log.includes('ROLLBACK'), false);
    assert.deepEqual(pool.releases, [true]);
  });

  it('reports an unreachable database as ConnectionError', async () => {
    const pool = new FakePool(roomRows);
    pool.acquireError = pgError('ECONNREFUSED', 'connect ECONNREFUSED 127.0.0.1:5432');
    await assert.rejects(
      executeCandidate(pool, candidate),
      (err: unknown) => err instanceof ConnectionError && err.message === 'Could not connect: connect ECONNREFUSED 127.0.0.1:5432',
    );
  });

  it('does not connect for an already cancelled request', async () => {
    const pool = new FakePool(roomRows);
    const controller = new AbortController();
    controller.abort();
    await assert.rejects(executeCandidate(pool, candidate, { signal: controller.signal }), CancelledError);
    assert.equal(pool.acquired, 0);
  });

  it('destroys the connection when cancelled mid-query', async () => {
    const controller = new AbortController();
    const pool = new FakePool(
      transactional(() => {
        controller.abort();
        throw new Error('Connection terminated');
      }),
    );
    await assert.rejects(executeCandidate(pool, candidate, { signal: controller.signal }), CancelledError);
    assert.deepEqual(pool.releases, [true]);
  });
});
