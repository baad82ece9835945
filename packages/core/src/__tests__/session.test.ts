import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { VizSession, type AskResult } from '../session.js';
import { SchemaCache } from '../db/schema-cache.js';
import { LocalStore, IN_MEMORY } from '../storage/sqlite.js';
import { getHistoryItem, listHistory } from '../storage/repo.js';
import { QueryExecutionError, SchemaMismatchError, UnsafeStatementError } from '../errors.js';
import { FakePool, OID, SCHEMA, StubProvider, pgError, planJson, raw, transactional } from './helpers.js';

const roomAverages = transactional(() =>
  raw(
    [
      ['name', OID.text],
      ['avg_value', OID.numeric],
    ],
    [
      { name: 'Lab', avg_value: '21.50' },
      { name: 'Hall', avg_value: '17.75' },
    ],
  ),
);

function succeeded(out: AskResult) {
  if (!out.ok) throw out.error;
  return out;
}

function failed(out: AskResult) {
  if (out.ok) assert.fail('expected a failed turn');
  return out;
}

describe('VizSession', () => {
  let store: LocalStore;
  let fetches: number;
  let cache: SchemaCache;

  beforeEach(() => {
    store = new LocalStore(IN_MEMORY);
    store.migrate();
    fetches = 0;
    cache = new SchemaCache(
      async () => {
        fetches += 1;
        return SCHEMA;
      },
      { ttlMs: 60_000 },
    );
  });

  afterEach(() => {
    store.close();
  });

  function session(provider: StubProvider, pool = new FakePool(roomAverages), sessionId = 'session-1') {
    return new VizSession({ db: pool, provider, store, schemaCache: cache }, { sessionId });
  }

  it('translates, runs, charts and summarizes a question', async () => {
    const provider = new StubProvider([
      planJson('SELECT name, id FROM rooms'),
      'The lab is warmer than the hall.',
    ]);
    const pool = new FakePool(roomAverages);
    const out = succeeded(await session(provider, pool).ask('average value by room'));

    assert.equal(out.candidate.sql, 'SELECT name, id FROM rooms\nLIMIT 1000');
    assert.deepEqual(out.result?.rows, [
      { name: 'Lab', avg_value: 21.5 },
      { name: 'Hall', avg_value: 17.75 },
    ]);
    assert.equal(out.chart?.kind, 'bar');
    assert.equal(out.chart?.title, 'Average value by room');
    assert.equal(out.insight, 'The lab is warmer than the hall.');
    assert.equal(provider.calls.length, 2);
    assert.equal(pool.log[2], 'SELECT name, id FROM rooms\nLIMIT 1000');
  });

  it('records the turn in the store', async () => {
    const provider = new StubProvider([planJson('SELECT name, id FROM rooms')]);
    await session(provider).ask('average value by room', { insight: false });

    const [item] = listHistory(store.getDb(), { sessionId: 'session-1' });
    assert.equal(item?.question, 'average value by room');
    assert.equal(item?.status, 'ok');
    assert.equal(item?.chartKind, 'bar');
    assert.equal(item?.rowCount, 2);

    const detail = item ? getHistoryItem(store.getDb(), item.id) : null;
    assert.equal(detail?.generation?.model, 'stub-model');
    assert.equal(detail?.generation?.validatedSql, 'SELECT name, id FROM rooms\nLIMIT 1000');
    assert.equal(detail?.run?.executedSql, 'SELECT name, id FROM rooms\nLIMIT 1000');
  });

  it('uses the requested chart kind when the result supports it', async () => {
    const provider = new StubProvider([planJson('SELECT name, id FROM rooms'), planJson('SELECT name, id FROM rooms')]);
    const vs = session(provider);

    const asTable = succeeded(await vs.ask('average value by room', { insight: false, chart: 'table' }));
    assert.equal(asTable.chart?.kind, 'table');
    assert.equal(asTable.chart?.reason, 'table requested (requested)');

    // no time column, so a line chart falls back to the usual choice
    const asLine = succeeded(await vs.ask('average value by room', { insight: false, chart: 'line' }));
    assert.equal(asLine.chart?.kind, 'bar');
  });

  it('stops after translation when asked not to execute', async () => {
    const provider = new StubProvider([planJson('SELECT name FROM rooms')]);
    const pool = new FakePool(roomAverages);
    const out = succeeded(await session(provider, pool).ask('room names', { execute: false }));

    assert.equal(out.result, null);
    assert.equal(out.chart, null);
    assert.equal(out.insight, null);
    assert.equal(pool.acquired, 0);
  });

  it('returns an unsafe statement as a failed turn and audits it', async () => {
    const provider = new StubProvider([planJson('DROP TABLE rooms')]);
    const pool = new FakePool(roomAverages);
    const vs = session(provider, pool);
    const out = failed(await vs.ask('remove the rooms table'));

    assert.ok(out.error instanceof UnsafeStatementError);
    assert.equal(out.candidate, undefined);
    assert.equal(pool.acquired, 0);
    assert.deepEqual(vs.getHistory(), []);

    const [item] = listHistory(store.getDb());
    assert.equal(item?.status, 'blocked');
    const [event] = store.listAuditEvents({ type: 'statement_blocked' });
    assert.equal(event?.payload?.['offending'], 'DROP');
    assert.equal(event?.payload?.['sessionId'], 'session-1');
  });

  it('refreshes the schema after a mismatch', async () => {
    const provider = new StubProvider([planJson('SELECT colour FROM rooms'), planJson('SELECT name FROM rooms')]);
    const vs = session(provider);

    const first = failed(await vs.ask('room colours', { insight: false }));
    assert.ok(first.error instanceof SchemaMismatchError);
    assert.equal(fetches, 1);

    succeeded(await vs.ask('room names', { insight: false }));
    assert.equal(fetches, 2);
  });

  it('records a failed execution with its error code', async () => {
    const provider = new StubProvider([planJson('SELECT name FROM rooms')]);
    const pool = new FakePool(
      transactional(() => {
        throw pgError('42P01', 'relation "rooms" does not exist');
      }),
    );
    const out = failed(await session(provider, pool).ask('room names'));

    assert.ok(out.error instanceof QueryExecutionError);
    assert.equal(out.candidate?.sql, 'SELECT name FROM rooms\nLIMIT 1000');
    const [item] = listHistory(store.getDb());
    const detail = item ? getHistoryItem(store.getDb(), item.id) : null;
    assert.equal(detail?.run?.status, 'error');
    assert.equal(detail?.run?.errorCode, 'QUERY_FAILED');
    assert.equal(detail?.run?.errorText, 'relation "rooms" does not exist');
  });

  it('feeds earlier turns to the next translation, one request at a time', async () => {
    const provider = new StubProvider([planJson('SELECT name FROM rooms'), planJson('SELECT id FROM rooms')]);
    const vs = session(provider);

    const [a, b] = await Promise.all([
      vs.ask('room names', { insight: false }),
      vs.ask('and their ids?', { insight: false }),
    ]);
    assert.equal(succeeded(a).candidate.sql, 'SELECT name FROM rooms\nLIMIT 1000');
    assert.equal(succeeded(b).candidate.sql, 'SELECT id FROM rooms\nLIMIT 1000');
    assert.equal(provider.calls[1]?.messages[0]?.content, 'Question: room names');
    assert.deepEqual(
      vs.getHistory().map((t) => t.question),
      ['room names', 'and their ids?'],
    );
  });

  it('resumes a stored session', async () => {
    await session(new StubProvider([planJson('SELECT name FROM rooms')])).ask('room names', { insight: false });

    const resumed = session(new StubProvider([]));
    assert.deepEqual(resumed.getHistory(), [{ question: 'room names', sql: 'SELECT name FROM rooms\nLIMIT 1000' }]);
    assert.deepEqual(session(new StubProvider([]), undefined, 'session-2').getHistory(), []);
  });

  it('runs hand-written SQL without adding a conversation turn', async () => {
    const provider = new StubProvider([]);
    const vs = session(provider);
    const candidate = await vs.prepare('SELECT name, id FROM rooms');
    const { result, chart } = await vs.run(candidate, 'SELECT name, id FROM rooms');

    assert.equal(candidate.source, 'user');
    assert.equal(result.rowCount, 2);
    assert.equal(chart.kind, 'bar');
    assert.equal(provider.calls.length, 0);
    assert.deepEqual(vs.getHistory(), []);

    const [item] = listHistory(store.getDb());
    assert.equal(getHistoryItem(store.getDb(), item?.id ?? '')?.query.source, 'run');
    assert.equal(item?.status, 'ok');
  });

  it('keeps answering when the store cannot be written', async () => {
    const vs = session(new StubProvider([planJson('SELECT name FROM rooms')]));
    store.close();
    store = new LocalStore(IN_MEMORY);

    const out = succeeded(await vs.ask('room names', { insight: false }));
    assert.equal(out.result?.rowCount, 2);
  });
});
