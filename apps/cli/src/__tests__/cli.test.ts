import { afterEach, describe, it, mock } from 'node:test';
import assert from 'node:assert/strict';
import {
  CancelledError,
  ConfigError,
  QueryTimeoutError,
  SchemaMismatchError,
  UnsafeStatementError,
  type ChartSpec,
  type ResultSet,
  type ValidatedCandidate,
} from '@vizbot/core';
import { CliError, fromVizError, toCliError, toExitCode, usageError } from '../errors.js';
import { formatTable, formatValue } from '../util/table.js';
import { describeChart, rowSummary } from '../render.js';
import { formatCsv } from '../util/csv.js';
import { parseChartKind, parseCount } from '../flags.js';
import { Printer } from '../output.js';

describe('exit codes', () => {
  it('maps rejected statements to the policy code', () => {
    assert.equal(toExitCode(new UnsafeStatementError('DROP', 'Data-modifying keyword "DROP" is not allowed.')), 3);
    assert.equal(toExitCode(new SchemaMismatchError(['colour'])), 3);
  });

  it('maps configuration and argument problems to the usage code', () => {
    assert.equal(toExitCode(new ConfigError(['VIZBOT_MAX_ROWS must be integer'])), 1);
    assert.equal(toExitCode(usageError('bad flag')), 1);
  });

  it('maps everything else to the runtime code', () => {
    assert.equal(toExitCode(new QueryTimeoutError(50)), 2);
    assert.equal(toExitCode(new Error('boom')), 2);
    assert.equal(toExitCode('boom'), 2);
  });
});

describe('fromVizError', () => {
  it('leads with the user-facing text and keeps the code', () => {
    const err = fromVizError(new QueryTimeoutError(50));
    assert.equal(err.code, 'QUERY_TIMEOUT');
    assert.equal(err.kind, 'runtime');
    assert.equal(
      err.message,
      'The query took too long. Try narrowing it down. (Statement exceeded the 50ms timeout and was rolled back.)',
    );
  });

  it('does not repeat a message that is already user-facing', () => {
    assert.equal(fromVizError(new CancelledError()).message, 'Request was cancelled.');
  });

  it('passes CLI errors through unchanged', () => {
    const err = usageError('Table "x" not found.', 'NOT_FOUND');
    assert.equal(toCliError(err), err);
    const wrapped = toCliError(new Error('boom'));
    assert.ok(wrapped instanceof CliError);
    assert.equal(wrapped.code, 'INTERNAL_ERROR');
  });
});

describe('formatTable', () => {
  it('aligns text left and numbers right', () => {
    const text = formatTable(
      ['room', 'avg'],
      [
        { room: 'Lab', avg: 21.5 },
        { room: 'Office', avg: null },
      ],
    );
    assert.equal(text, ['room   | avg', '-------+-----', 'Lab    | 21.5', 'Office | NULL'].join('\n'));
  });

  it('summarises rows past the display limit', () => {
    assert.equal(
      formatTable(['n'], [{ n: 1 }, { n: 2 }, { n: 3 }], { maxRows: 1 }),
      ['n', '-', '1', '... 2 more rows'].join('\n'),
    );
  });

  it('handles empty input', () => {
    assert.equal(formatTable([], []), '(no columns)');
    assert.equal(formatTable(['n'], []), '(0 rows)');
  });

  it('clips long cells', () => {
    const line = formatTable(['s'], [{ s: 'x'.repeat(70) }]).split('\n')[2];
    assert.equal(line, `${'x'.repeat(57)}...`);
  });
});

describe('formatValue', () => {
  it('renders common values', () => {
    assert.equal(formatValue(1 / 3), '0.3333');
    assert.equal(formatValue(42), '42');
    assert.equal(formatValue(new Date(Date.UTC(2025, 0, 2))), '2025-01-02T00:00:00.000Z');
    assert.equal(formatValue({ a: 1 }), '{"a":1}');
    assert.equal(formatValue(undefined), 'NULL');
  });
});

describe('describeChart', () => {
  it('lists the encoding channels', () => {
    const chart: ChartSpec = {
      kind: 'bar',
      title: 'Rooms',
      encoding: {
        x: { field: 'room', type: 'nominal' },
        y: { field: 'room', type: 'quantitative', aggregate: 'count' },
      },
      options: {},
      reason: 'count of "room"',
    };
    assert.deepEqual(describeChart(chart), [
      'Chart: bar (count of "room")',
      '  Title: Rooms',
      '  x:     room [nominal]',
      '  y:     count',
    ]);
  });

  it('shows aggregates and bins', () => {
    const chart: ChartSpec = {
      kind: 'heatmap',
      title: 'Density',
      encoding: {
        x: { field: 'a', type: 'quantitative', bin: true },
        y: { field: 'b', type: 'quantitative', bin: true },
        color: { field: 'value', type: 'quantitative', aggregate: 'mean' },
      },
      options: { maxBins: 20 },
      reason: 'density',
    };
    assert.deepEqual(describeChart(chart).slice(2), [
      '  x:     a [quantitative, binned]',
      '  y:     b [quantitative, binned]',
      '  color: mean(value) [quantitative]',
    ]);
  });
});

describe('rowSummary', () => {
  function resultOf(rowCount: number, shown: number, execMs: number): ResultSet {
    return {
      columns: [{ name: 'n', pgType: 23, kind: 'numeric' }],
      rows: Array.from({ length: shown }, (_, i) => ({ n: i })),
      rowCount,
      truncated: rowCount > shown,
      execMs,
    };
  }

  it('counts rows and time', () => {
    assert.equal(rowSummary(resultOf(3, 3, 12)), '3 rows returned in 12ms');
    assert.equal(rowSummary(resultOf(1, 1, 0)), '1 row returned in 0ms');
  });

  it('mentions truncation', () => {
    assert.equal(rowSummary(resultOf(10, 2, 5)), '10 rows returned (showing the first 2) in 5ms');
  });
});

describe('formatCsv', () => {
  it('quotes fields that need it and leaves nulls empty', () => {
    const csv = formatCsv(
      ['room', 'note', 'avg'],
      [
        { room: 'Lab, north', note: 'said "warm"', avg: 21.5 },
        { room: 'Hall', note: null, avg: 3 },
        { room: 'Attic', note: 'two\nlines', avg: 0 },
      ],
    );
    assert.equal(csv, 'room,note,avg\n"Lab, north","said ""warm""",21.5\nHall,,3\nAttic,"two\nlines",0\n');
  });

  it('writes dates as ISO strings', () => {
    assert.equal(formatCsv(['at'], [{ at: new Date(Date.UTC(2025, 0, 2, 8)) }]), 'at\n2025-01-02T08:00:00.000Z\n');
  });

  it('writes only the header for an empty result', () => {
    assert.equal(formatCsv(['a', 'b'], []), 'a,b\n');
  });
});

describe('flag parsing', () => {
  it('accepts chart kinds in any case', () => {
    assert.equal(parseChartKind('Heatmap'), 'heatmap');
    assert.equal(parseChartKind(undefined), undefined);
  });

  it('rejects unknown chart kinds as a usage error', () => {
    assert.throws(
      () => parseChartKind('pie'),
      (err: unknown) =>
        err instanceof CliError &&
        err.kind === 'usage' &&
        err.message === '--chart must be one of line, bar, box, heatmap, table, got "pie".',
    );
  });

  it('rejects negative counts', () => {
    assert.equal(parseCount('5', '--rows'), 5);
    assert.throws(() => parseCount('-1', '--rows'), CliError);
  });
});

describe('Printer', () => {
  afterEach(() => {
    mock.restoreAll();
  });

  const candidate: ValidatedCandidate = {
    state: 'validated',
    sql: 'SELECT n FROM numbers\nLIMIT 1000',
    originalSql: 'SELECT n FROM numbers',
    source: 'user',
    tables: ['public.numbers'],
    limit: 1000,
    warnings: [],
  };
  const result: ResultSet = {
    columns: [{ name: 'n', pgType: 23, kind: 'numeric' }],
    rows: [{ n: 1 }, { n: 2 }],
    rowCount: 2,
    truncated: false,
    execMs: 4,
  };
  const chart: ChartSpec = {
    kind: 'table',
    title: 'Numbers',
    encoding: {},
    options: {},
    reason: 'no chartable shape',
  };
  const options = { json: false, quiet: false, verbose: false, debug: false };

  function firstArgs(calls: ReadonlyArray<{ arguments: unknown[] }>): unknown[] {
    return calls.map((call) => call.arguments[0]);
  }

  it('prints the SQL, rows and chart of an outcome', () => {
    const log = mock.method(console, 'log', () => undefined);
    new Printer(options).outcome({ candidate, result, chart, displayRows: 20, vega: null });
    assert.deepEqual(firstArgs(log.mock.calls), [
      'SQL:',
      '  SELECT n FROM numbers',
      '  LIMIT 1000',
      '',
      'n\n-\n1\n2',
      '',
      '2 rows returned in 4ms',
      '',
      'Chart: table (no chartable shape)',
      '  Title: Numbers',
      '',
      'No Vega-Lite form for a table.',
    ]);
  });

  it('prints nothing but the envelope under --json', () => {
    const log = mock.method(console, 'log', () => undefined);
    const printer = new Printer({ ...options, json: true });
    printer.outcome({ candidate, result, chart, displayRows: 20 });
    printer.success({ rows: 2 }, 'done');
    assert.deepEqual(firstArgs(log.mock.calls), [JSON.stringify({ ok: true, data: { rows: 2 } }, null, 2)]);
  });

  it('keeps quiet except for errors', () => {
    const log = mock.method(console, 'log', () => undefined);
    const error = mock.method(console, 'error', () => undefined);
    const printer = new Printer({ ...options, quiet: true });
    printer.line('hello');
    printer.error(usageError('bad flag'));
    assert.equal(log.mock.callCount(), 0);
    assert.deepEqual(firstArgs(error.mock.calls), ['Error: bad flag']);
  });
});
