#!/usr/bin/env -S node --import tsx

/**
 * vizbot CLI entrypoint.
 */

// Loads .env before the core logger reads LOG_LEVEL and VIZBOT_LOG_FILE.
import 'dotenv/config';
import { Command, CommanderError } from 'commander';
import { existsSync, writeFileSync } from 'node:fs';
import {
  fetchSchema,
  getHistoryItem,
  listHistory,
  loadConfig,
  setLogLevel,
  toVegaLite,
  type ResultSet,
  type VizConfig,
} from '@vizbot/core';
import { openPool, openSession, openStore } from './context.js';
import { EXIT_CODE_SUCCESS, EXIT_CODE_USAGE, toExitCode, usageError } from './errors.js';
import { Printer, addOutputFlags, readOutputOptions, resultJson } from './output.js';
import { parseChartKind, parseCount } from './flags.js';
import { formatCsv } from './util/csv.js';

const VERSION = '0.1.0';
const DEFAULT_DISPLAY_ROWS = 20;

interface AskFlags {
  insight: boolean;
  dryRun: boolean;
  vega: boolean;
  session?: string;
  rows: string;
  chart?: string;
  csv?: string;
}

interface RunFlags {
  sql: string;
  title?: string;
  vega: boolean;
  rows: string;
  chart?: string;
  csv?: string;
}

interface HistoryListFlags {
  limit: string;
  session?: string;
}

// ── Helpers ──────────────────────────────────────────────────────────

function loadCliConfig(out: Printer): VizConfig {
  const config = loadConfig();
  const { debug, verbose } = out.options;
  setLogLevel(debug ? 'debug' : verbose ? 'info' : config.logLevel);
  return config;
}

/** AbortSignal tied to Ctrl-C for the duration of one request. */
async function withInterrupt<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once('SIGINT', onSigint);
  try {
    return await fn(controller.signal);
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

async function runCommand(command: Command, fn: (out: Printer) => Promise<void> | void): Promise<void> {
  const out = new Printer(readOutputOptions(command));
  try {
    await fn(out);
  } catch (error: unknown) {
    out.error(error);
    process.exitCode = toExitCode(error);
  }
}

function withExamples(cmd: Command, lines: string[]): Command {
  const rendered = lines.map((line) => `  ${line}`).join('\n');
  cmd.addHelpText('after', `\nExamples:\n${rendered}\n`);
  return cmd;
}

function exportCsv(file: string, result: ResultSet, out: Printer): void {
  writeFileSync(
    file,
    formatCsv(
      result.columns.map((c) => c.name),
      result.rows,
    ),
    'utf-8',
  );
  out.line(`CSV written to ${file} (${result.rows.length} row${result.rows.length === 1 ? '' : 's'})`);
}

// ── Program ──────────────────────────────────────────────────────────

const program = addOutputFlags(new Command());

program
  .name('vizbot')
  .description('Ask questions about a PostgreSQL database and get charts back')
  .showHelpAfterError('(run with --help for usage)')
  .helpOption('-h, --help', 'display help')
  .version(VERSION, '-v, --version', 'Show version number');

program.exitOverride();
program.addHelpText(
  'after',
  `
Command groups:
  Setup:    doctor, schema
  Query:    ask, run
  History:  history

Configuration comes from the environment or a .env file
(DATABASE_URL, OPENAI_API_KEY, VIZBOT_*).
`,
);

const CHART_HELP = 'Chart to draw when the result fits it (line, bar, box, heatmap, table)';
const CSV_HELP = 'Also write the returned rows to a CSV file';

// ── doctor ───────────────────────────────────────────────────────────

withExamples(
  addOutputFlags(
    program
      .command('doctor')
      .description('Check environment and configuration')
      .action(async function (this: Command) {
        await runCommand(this, async (out) => {
          const config = loadCliConfig(out);
          const nodeVersion = process.version;
          const nodeOk = parseInt(nodeVersion.slice(1), 10) >= 20;
          const homeExists = existsSync(config.home);
          const storeExists = existsSync(config.storePath);

          out.success({
            node: { version: nodeVersion, ok: nodeOk, requiredMajor: 20 },
            databaseUrlSet: Boolean(config.databaseUrl),
            openAiKeySet: Boolean(config.openaiApiKey),
            model: config.model,
            schemas: config.schemas,
            paths: { home: config.home, homeExists, storePath: config.storePath, storeExists },
            limits: {
              defaultLimit: config.defaultLimit,
              maxRows: config.maxRows,
              statementTimeoutMs: config.statementTimeoutMs,
              completionTimeoutMs: config.completionTimeoutMs,
              maxRetries: config.maxRetries,
              historyTurns: config.historyTurns,
            },
          });
          if (out.json) return;

          out.line('vizbot doctor');
          out.line('=============');
          out.line();
          out.line(`Node.js:      ${nodeVersion} ${nodeOk ? 'ok' : '(requires >=20)'}`);
          out.line(`DATABASE_URL: ${config.databaseUrl ? 'set' : 'not set'}`);
          out.line(`OpenAI key:   ${config.openaiApiKey ? 'set' : 'not set'}`);
          out.line(`Model:        ${config.model}`);
          out.line(`Schemas:      ${config.schemas.join(', ')}`);
          out.line(`Home:         ${config.home} ${homeExists ? '(exists)' : '(will be created)'}`);
          out.line(`History DB:   ${config.storePath} ${storeExists ? '(exists)' : '(will be created)'}`);
          out.line();
          out.line('Limits:');
          out.line(`  Default LIMIT:      ${config.defaultLimit}`);
          out.line(`  Max rows:           ${config.maxRows}`);
          out.line(`  Statement timeout:  ${config.statementTimeoutMs}ms`);
          out.line(`  Completion timeout: ${config.completionTimeoutMs}ms`);
          out.line(`  Correction retries: ${config.maxRetries}`);
          out.line(`  History turns:      ${config.historyTurns}`);
        });
      }),
  ),
  ['vizbot doctor', 'vizbot doctor --json'],
);

// ── schema ───────────────────────────────────────────────────────────

const schema = program.command('schema').description('Inspect the database schema');

withExamples(
  addOutputFlags(
    schema
      .command('show')
      .description('Introspect and print tables and columns')
      .option('--table <name>', 'Only show one table')
      .action(async function (this: Command, opts: { table?: string }) {
        await runCommand(this, async (out) => {
          const config = loadCliConfig(out);
          const pool = openPool(config);
          try {
            const snapshot = await fetchSchema(pool, { schemas: config.schemas });
            const wanted = opts.table?.toLowerCase();
            const tables = wanted
              ? snapshot.tables.filter((t) => t.name.toLowerCase() === wanted || `${t.schema}.${t.name}`.toLowerCase() === wanted)
              : snapshot.tables;
            if (wanted && tables.length === 0) {
              throw usageError(`Table "${opts.table}" not found.`, 'NOT_FOUND');
            }

            out.success({ capturedAt: snapshot.capturedAt.toISOString(), tables });
            for (const table of tables) {
              const estimate = table.rowCountEstimate !== undefined ? ` (~${table.rowCountEstimate} rows)` : '';
              out.line(`${table.schema}.${table.name}${estimate}`);
              out.table(
                ['column', 'type', 'nullable', 'pk'],
                table.columns.map((c) => ({
                  column: c.name,
                  type: c.dataType,
                  nullable: c.nullable ? 'yes' : 'no',
                  pk: c.isPrimaryKey ? 'yes' : '',
                })),
              );
              out.line();
            }
            out.line(`${tables.length} table${tables.length === 1 ? '' : 's'}`);
          } finally {
            await pool.end();
          }
        });
      }),
  ),
  ['vizbot schema show', 'vizbot schema show --table sensor_readings --json'],
);

// ── ask ──────────────────────────────────────────────────────────────

withExamples(
  addOutputFlags(
    program
      .command('ask')
      .description('Translate a question to SQL, run it, pick a chart and summarize the result')
      .argument('<question>', 'Natural language question')
      .option('--no-insight', 'Skip the textual insight')
      .option('--dry-run', 'Stop after translation and validation', false)
      .option('--vega', 'Print the Vega-Lite spec for the chosen chart', false)
      .option('--chart <kind>', CHART_HELP)
      .option('--csv <file>', CSV_HELP)
      .option('--session <id>', 'Continue a conversation (follow-up questions see earlier turns)')
      .option('--rows <n>', 'Rows to print', String(DEFAULT_DISPLAY_ROWS))
      .action(async function (this: Command, question: string, opts: AskFlags) {
        await runCommand(this, async (out) => {
          const displayRows = parseCount(opts.rows, '--rows');
          const chart = parseChartKind(opts.chart);
          const config = loadCliConfig(out);
          const ctx = openSession(config, { sessionId: opts.session });
          try {
            const turn = await withInterrupt((signal) =>
              ctx.session.ask(question, { insight: opts.insight, execute: !opts.dryRun, chart, signal }),
            );
            if (!turn.ok) throw turn.error;

            if (opts.csv && turn.result) exportCsv(opts.csv, turn.result, out);
            const vega = opts.vega && turn.result && turn.chart ? toVegaLite(turn.chart, turn.result.rows) : undefined;

            out.success({
              sessionId: ctx.session.sessionId,
              question,
              sql: turn.candidate.sql,
              generation: turn.candidate.generation ?? null,
              warnings: turn.candidate.warnings,
              result: turn.result ? resultJson(turn.result) : null,
              chart: turn.chart,
              ...(opts.vega ? { vega: vega ?? null } : {}),
              ...(opts.csv && turn.result ? { csv: opts.csv } : {}),
              insight: turn.insight,
            });
            if (out.json) return;

            if (!turn.result || !turn.chart) {
              out.candidate(turn.candidate);
              out.line();
              out.line('--dry-run: not executed.');
            } else {
              out.outcome({ candidate: turn.candidate, result: turn.result, chart: turn.chart, displayRows, vega });
            }
            if (turn.insight) {
              out.line();
              out.line(`Insight: ${turn.insight}`);
            }
            if (out.options.verbose) {
              out.line();
              out.line(`Session: ${ctx.session.sessionId}`);
            }
          } finally {
            await ctx.close();
          }
        });
      }),
  ),
  [
    'vizbot ask "average temperature per room"',
    'vizbot ask "hourly occupancy by weekday" --vega',
    'vizbot ask "temperature readings per room" --chart box --csv readings.csv',
    'vizbot ask "and only for the lab?" --session <id>',
    'vizbot ask "top 5 rooms by CO2" --dry-run --json',
  ],
);

// ── run ──────────────────────────────────────────────────────────────

withExamples(
  addOutputFlags(
    program
      .command('run')
      .description('Validate and run your own SQL, then pick a chart for the result')
      .requiredOption('--sql <sql>', 'A single read-only SELECT statement')
      .option('--title <text>', 'Chart title; phrasing such as "bar chart" also picks the chart kind')
      .option('--vega', 'Print the Vega-Lite spec for the chosen chart', false)
      .option('--chart <kind>', CHART_HELP)
      .option('--csv <file>', CSV_HELP)
      .option('--rows <n>', 'Rows to print', String(DEFAULT_DISPLAY_ROWS))
      .action(async function (this: Command, opts: RunFlags) {
        await runCommand(this, async (out) => {
          const displayRows = parseCount(opts.rows, '--rows');
          const chartKind = parseChartKind(opts.chart);
          const config = loadCliConfig(out);
          const ctx = openSession(config, { needsModel: false });
          try {
            const candidate = await ctx.session.prepare(opts.sql);
            const { result, chart } = await withInterrupt((signal) =>
              ctx.session.run(candidate, opts.title ?? '', { chart: chartKind, signal }),
            );
            if (opts.csv) exportCsv(opts.csv, result, out);
            const vega = opts.vega ? toVegaLite(chart, result.rows) : undefined;

            out.success({
              sql: candidate.sql,
              warnings: candidate.warnings,
              result: resultJson(result),
              chart,
              ...(opts.vega ? { vega: vega ?? null } : {}),
              ...(opts.csv ? { csv: opts.csv } : {}),
            });
            if (out.json) return;

            out.outcome({ candidate, result, chart, displayRows, vega });
          } finally {
            await ctx.close();
          }
        });
      }),
  ),
  [
    'vizbot run --sql "SELECT room_id, AVG(value) FROM sensor_readings GROUP BY room_id"',
    'vizbot run --sql "SELECT start_time, value FROM sensor_readings" --chart line --csv readings.csv',
    'vizbot run --sql "SELECT 1" --json',
  ],
);

// ── history ─────────────────────────────────────────────────────────

const history = program.command('history').description('Question history');

withExamples(
  addOutputFlags(
    history
      .command('list')
      .description('List recent questions')
      .option('--limit <n>', 'Number of items', '20')
      .option('--session <id>', 'Only this session')
      .action(async function (this: Command, opts: HistoryListFlags) {
        await runCommand(this, async (out) => {
          const limit = parseCount(opts.limit, '--limit');
          const store = openStore(loadCliConfig(out));
          try {
            const items = listHistory(store.getDb(), { limit, sessionId: opts.session });
            out.success(items);
            if (out.json) return;

            if (items.length === 0) {
              out.line('No questions in history. Use "vizbot ask" to ask one.');
              return;
            }
            out.table(
              ['id', 'question', 'asked_at', 'status', 'chart', 'rows', 'exec_ms'],
              items.map((item) => ({
                id: item.id.slice(0, 8),
                question: item.question.length > 50 ? `${item.question.slice(0, 47)}...` : item.question,
                asked_at: item.askedAt,
                status: item.status ?? '-',
                chart: item.chartKind ?? '-',
                rows: item.rowCount ?? '-',
                exec_ms: item.execMs ?? '-',
              })),
            );
          } finally {
            store.close();
          }
        });
      }),
  ),
  ['vizbot history list --limit 20', 'vizbot history list --session <id> --json'],
);

withExamples(
  addOutputFlags(
    history
      .command('show <id>')
      .description('Show one question with its SQL and outcome (id or id prefix)')
      .action(async function (this: Command, id: string) {
        await runCommand(this, async (out) => {
          const store = openStore(loadCliConfig(out));
          try {
            const db = store.getDb();
            let fullId = id;
            if (id.length < 36) {
              const match = db
                .prepare<[string], { id: string }>('SELECT id FROM queries WHERE id LIKE ? ORDER BY asked_at DESC LIMIT 1')
                .get(`${id}%`);
              if (match) fullId = match.id;
            }
            const detail = getHistoryItem(db, fullId);
            if (!detail) throw usageError(`Query "${id}" not found.`, 'NOT_FOUND');

            out.success(detail);
            if (out.json) return;

            out.line(`Query ID:  ${detail.query.id}`);
            out.line(`Session:   ${detail.query.sessionId}`);
            out.line(`Question:  ${detail.query.question}`);
            out.line(`Source:    ${detail.query.source}`);
            out.line(`Asked at:  ${detail.query.askedAt}`);
            if (detail.generation) {
              out.line('\nGeneration:');
              out.line(`  Model:      ${detail.generation.model ?? '-'}`);
              out.line(`  Attempts:   ${detail.generation.attempts}`);
              if (detail.generation.confidence !== null) {
                out.line(`  Confidence: ${Math.round(detail.generation.confidence * 100)}%`);
              }
              out.line(`  SQL:        ${detail.generation.validatedSql ?? detail.generation.generatedSql}`);
              for (const warning of detail.generation.warnings) {
                out.line(`  Warning:    ${warning}`);
              }
            }
            if (detail.run) {
              out.line('\nExecution:');
              out.line(`  Status:     ${detail.run.status}`);
              if (detail.run.chartKind) out.line(`  Chart:      ${detail.run.chartKind}`);
              if (detail.run.execMs !== null) out.line(`  Exec time:  ${detail.run.execMs}ms`);
              if (detail.run.rowCount !== null) out.line(`  Row count:  ${detail.run.rowCount}`);
              if (detail.run.errorCode) {
                out.line(`  Error:      ${detail.run.errorCode}: ${detail.run.errorText ?? ''}`);
              }
            }
            out.line('\nNote: Result rows are not stored in history.');
          } finally {
            store.close();
          }
        });
      }),
  ),
  ['vizbot history show <query-id>', 'vizbot history show <query-id-prefix> --json'],
);

// ── parse ────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
    if (process.exitCode === undefined) {
      process.exitCode = EXIT_CODE_SUCCESS;
    }
  } catch (error: unknown) {
    const out = new Printer(readOutputOptions(program));
    // exitOverride turns help, version and argument errors into CommanderError
    if (error instanceof CommanderError) {
      if (error.code === 'commander.helpDisplayed' || error.code === 'commander.version') {
        process.exitCode = EXIT_CODE_SUCCESS;
        return;
      }
      // Help shown for a missing command; commander already printed it.
      if (error.code !== 'commander.help') out.error(usageError(error.message));
      process.exitCode = EXIT_CODE_USAGE;
      return;
    }
    out.error(error);
    process.exitCode = toExitCode(error);
  }
}

void main();
