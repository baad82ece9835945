/**
 * Terminal output for vizbot commands.
 *
 * Every command prints through a Printer built from the global flags.
 * With --json a command emits exactly one envelope (`{ ok, data }` or
 * `{ ok: false, code, message }`); human output is suppressed by --quiet
 * except for errors.
 */

import type { Command } from 'commander';
import type { ChartSpec, ResultSet, Row, ValidatedCandidate, VegaLiteSpec } from '@vizbot/core';
import { formatTable } from './util/table.js';
import { describeChart, rowSummary } from './render.js';
import { toCliError } from './errors.js';

export interface OutputOptions {
  json: boolean;
  quiet: boolean;
  verbose: boolean;
  debug: boolean;
}

export function readOutputOptions(command: Command): OutputOptions {
  const opts = command.optsWithGlobals();
  return {
    json: opts.json === true,
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
    debug: opts.debug === true,
  };
}

export function addOutputFlags<T extends Command>(command: T): T {
  return command
    .option('--json', 'Print one JSON document instead of text', false)
    .option('--quiet', 'Print only results and errors', false)
    .option('--verbose', 'Log pipeline steps and show the session id', false)
    .option('--debug', 'Log everything and include error details', false);
}

/** Result fields that go into a JSON envelope. */
export function resultJson(result: ResultSet) {
  return {
    columns: result.columns,
    rows: result.rows,
    rowCount: result.rowCount,
    truncated: result.truncated,
    execMs: result.execMs,
  };
}

export interface Outcome {
  candidate: ValidatedCandidate;
  result: ResultSet;
  chart: ChartSpec;
  displayRows: number;
  /** Present when --vega was given; null for a table */
  vega?: VegaLiteSpec | null;
}

export class Printer {
  constructor(readonly options: OutputOptions) {}

  get json(): boolean {
    return this.options.json;
  }

  line(text = ''): void {
    if (!this.options.quiet && !this.options.json) console.log(text);
  }

  warn(text: string): void {
    if (!this.options.quiet && !this.options.json) console.warn(`Warning: ${text}`);
  }

  table(columns: readonly string[], rows: readonly Row[], maxRows?: number): void {
    this.line(formatTable(columns, rows, { maxRows }));
  }

  /** JSON envelope under --json; otherwise the optional text line. */
  success(data: unknown, text?: string): void {
    if (this.options.json) {
      console.log(JSON.stringify({ ok: true, data }, null, 2));
      return;
    }
    if (text !== undefined) this.line(text);
  }

  error(error: unknown): void {
    const cliError = toCliError(error);
    if (this.options.json) {
      const payload: Record<string, unknown> = { ok: false, code: cliError.code, message: cliError.message };
      if (this.options.debug) payload.details = cliError.details ?? null;
      console.log(JSON.stringify(payload, null, 2));
      return;
    }
    console.error(`Error: ${cliError.message}`);
    if (this.options.debug && cliError.details !== undefined) {
      console.error('Details:', JSON.stringify(cliError.details, null, 2));
    }
  }

  candidate(candidate: ValidatedCandidate): void {
    const gen = candidate.generation;
    const confidence =
      gen?.confidence !== undefined ? `, confidence ${Math.round(gen.confidence * 100)}%` : '';
    this.line(gen ? `SQL (model: ${gen.model}, attempt ${gen.attempts}${confidence}):` : 'SQL:');
    for (const sqlLine of candidate.sql.split('\n')) this.line(`  ${sqlLine}`);
    if (gen && gen.assumptions.length > 0) {
      this.line(`Assumptions: ${gen.assumptions.join('; ')}`);
    }
    for (const warning of candidate.warnings) this.warn(warning);
  }

  /** Candidate, rows, chart and (with --vega) the Vega-Lite document. */
  outcome(outcome: Outcome): void {
    this.candidate(outcome.candidate);
    this.line();
    this.table(
      outcome.result.columns.map((c) => c.name),
      outcome.result.rows,
      outcome.displayRows,
    );
    this.line();
    this.line(rowSummary(outcome.result));
    this.line();
    for (const chartLine of describeChart(outcome.chart)) this.line(chartLine);

    if (outcome.vega === undefined) return;
    this.line();
    if (outcome.vega === null) {
      this.line('No Vega-Lite form for a table.');
    } else if (!this.options.json) {
      // not subject to --quiet
      console.log(JSON.stringify(outcome.vega, null, 2));
    }
  }
}
