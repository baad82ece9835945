/**
 * Short natural-language insight over a result set.
 *
 * The model never sees raw rows beyond a small sample: it gets computed
 * statistics (ranges, group averages, peak buckets) and is told to stay
 * within them.
 */

import type { ResultSet, Row } from '../db/types.js';
import type { CompletionProvider } from '../llm/types.js';
import { profileColumns } from '../viz/profile.js';
import { errorMessage } from '../db/pg-errors.js';
import { insightLogger } from '../util/logger.js';

export const NO_DATA_INSIGHT = 'No data available to generate insights.';
export const NO_INSIGHT = 'No textual insight available.';

export const INSIGHT_SYSTEM_PROMPT = `You write a short, professional insight summary strictly based on the data summary provided.

- Name the metric being analyzed.
- Point out trends, peaks, anomalies and comparisons between groups that the statistics show.
- Quote actual values and ranges from the summary.
- End with one practical suggestion grounded in the data.
- Do not mention anything that is not in the data. Plain text, at most 6 sentences.`;

export interface SummarizeOptions {
  signal?: AbortSignal;
  /** Rows included verbatim after the statistics */
  sampleRows?: number;
  /** Groups listed for a category average */
  maxGroups?: number;
  maxTokens?: number;
}

const fmt = (n: number) => n.toFixed(2);

function numbers(rows: Row[], column: string): number[] {
  const out: number[] = [];
  for (const row of rows) {
    const v = row[column];
    if (typeof v === 'number' && Number.isFinite(v)) out.push(v);
  }
  return out;
}

/** Mean of `measure` per distinct value of `key`, highest first. */
export function groupAverages(rows: Row[], key: string, measure: string): Array<{ group: string; avg: number }> {
  const sums = new Map<string, { sum: number; n: number }>();
  for (const row of rows) {
    const v = row[measure];
    const k = row[key];
    if (typeof v !== 'number' || !Number.isFinite(v) || k === null || k === undefined) continue;
    const label = k instanceof Date ? k.toISOString() : String(k);
    const acc = sums.get(label) ?? { sum: 0, n: 0 };
    acc.sum += v;
    acc.n += 1;
    sums.set(label, acc);
  }
  return Array.from(sums, ([group, { sum, n }]) => ({ group, avg: sum / n })).sort(
    (a, b) => b.avg - a.avg || a.group.localeCompare(b.group),
  );
}

function sampleJson(rows: Row[]): string {
  return rows
    .map((r) => JSON.stringify(r, (_key, value: unknown) => (typeof value === 'bigint' ? Number(value) : value)))
    .join('\n');
}

/** Statistics text sent to the model. */
export function describeResult(result: ResultSet, opts: Pick<SummarizeOptions, 'sampleRows' | 'maxGroups'> = {}): string {
  const sampleRows = opts.sampleRows ?? 10;
  const maxGroups = opts.maxGroups ?? 10;
  const rows = result.rows;
  const profiles = profileColumns(result);
  const lines: string[] = [];

  lines.push(
    result.truncated ? `Rows: ${result.rowCount} (statistics over the first ${rows.length})` : `Rows: ${result.rowCount}`,
  );

  const measures = profiles.filter((p) => p.role === 'measure');
  for (const m of measures) {
    const values = numbers(rows, m.name);
    if (values.length === 0) continue;
    const min = Math.min(...values);
    const max = Math.max(...values);
    const avg = values.reduce((s, v) => s + v, 0) / values.length;
    lines.push(`${m.name} - Min: ${fmt(min)}, Max: ${fmt(max)}, Avg: ${fmt(avg)}`);
  }

  const measure = measures[0];
  if (measure) {
    const category = profiles.find((p) => p.role === 'category' && p.distinct > 1 && p.distinct < p.nonNull);
    if (category) {
      const groups = groupAverages(rows, category.name, measure.name);
      const listed = groups
        .slice(0, maxGroups)
        .map((g) => `${g.group}: avg ${fmt(g.avg)}`)
        .join(', ');
      const more = groups.length > maxGroups ? ` (+${groups.length - maxGroups} more)` : '';
      lines.push(`Average ${measure.name} by ${category.name}: ${listed}${more}`);
    }

    for (const bucket of profiles.filter((p) => p.role === 'bucket' && p.distinct > 1)) {
      const peak = groupAverages(rows, bucket.name, measure.name)[0];
      if (peak) lines.push(`Peak ${bucket.name} by average ${measure.name}: ${peak.group} (avg ${fmt(peak.avg)})`);
    }
  }

  if (sampleRows > 0) {
    lines.push('', `First rows:`, sampleJson(rows.slice(0, sampleRows)));
  }
  return lines.join('\n');
}

/**
 * Insight text for a result. Never throws: an empty result yields
 * NO_DATA_INSIGHT without a call, any completion failure yields NO_INSIGHT.
 */
export async function summarize(
  provider: CompletionProvider,
  result: ResultSet,
  question: string,
  opts: SummarizeOptions = {},
): Promise<string> {
  if (result.rows.length === 0) return NO_DATA_INSIGHT;

  const summary = describeResult(result, opts);
  try {
    const completion = await provider.complete({
      system: INSIGHT_SYSTEM_PROMPT,
      messages: [{ role: 'user', content: `User asked: "${question}"\n\n${summary}` }],
      temperature: 0.3,
      maxTokens: opts.maxTokens ?? 400,
      signal: opts.signal,
    });
    const text = completion.text.trim();
    if (text === '') {
      insightLogger.warn('empty insight response');
      return NO_INSIGHT;
    }
    return text;
  } catch (err: unknown) {
    insightLogger.warn('insight generation failed', { error: errorMessage(err) });
    return NO_INSIGHT;
  }
}
