/**
 * Schema summary for the translation prompt.
 *
 * Tables are ranked by token overlap with the question and added until
 * the token budget is spent. The top-ranked table is always included,
 * with its column list cut to fit when necessary.
 */

import type { SchemaSnapshot, TableInfo, ColumnInfo } from '../db/types.js';
import { SAFE_DEFAULTS } from '../db/defaults.js';

export interface SchemaContextOpts {
  /** Approximate token budget for the whole summary */
  tokenBudget?: number;
  maxColumnsPerTable?: number;
}

export interface SchemaContext {
  text: string;
  includedTables: string[];
  omittedTables: number;
  estimatedTokens: number;
}

interface ScoredTable {
  table: TableInfo;
  score: number;
  scoredColumns: Array<{ col: ColumnInfo; score: number }>;
}

/** Rough token count: about four characters per token. */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9_]+/)
    .filter((t) => t.length > 1);
}

// Naive singular form so "rooms" matches "room_name".
function stem(token: string): string {
  return token.length > 3 && token.endsWith('s') && !token.endsWith('ss') ? token.slice(0, -1) : token;
}

function scoreMatch(name: string, tokens: string[]): number {
  const lower = name.toLowerCase();
  const parts = lower.split('_').filter((p) => p.length > 0);
  let score = 0;
  for (const raw of tokens) {
    const token = stem(raw);
    if (lower === token || lower === raw) {
      score += 10;
    } else if (parts.some((p) => p === token || p === raw)) {
      score += 7;
    } else if (lower.includes(token)) {
      score += 5;
    } else if (parts.some((p) => p.length > 2 && (p.includes(token) || token.includes(p)))) {
      score += 3;
    }
  }
  return score;
}

function qualifiedName(t: TableInfo): string {
  return t.schema && t.schema !== 'public' ? `${t.schema}.${t.name}` : t.name;
}

function renderTable(entry: ScoredTable, maxCols: number): string {
  const t = entry.table;
  const lines = [`TABLE ${qualifiedName(t)}`];

  const cols = [...entry.scoredColumns]
    .sort((a, b) => {
      if (a.col.isPrimaryKey !== b.col.isPrimaryKey) return a.col.isPrimaryKey ? -1 : 1;
      return b.score - a.score;
    })
    .slice(0, maxCols);

  for (const { col } of cols) {
    const pk = col.isPrimaryKey ? ' PK' : '';
    const nullable = col.nullable ? ' NULL' : ' NOT NULL';
    lines.push(`  ${col.name} ${col.dataType}${nullable}${pk}`);
  }
  if (cols.length < entry.scoredColumns.length) {
    lines.push(`  -- ${entry.scoredColumns.length - cols.length} more columns`);
  }
  if (t.rowCountEstimate !== undefined) {
    lines.push(`  -- ~${t.rowCountEstimate} rows`);
  }
  return lines.join('\n');
}

export function buildSchemaContext(
  question: string,
  schema: SchemaSnapshot,
  opts: SchemaContextOpts = {},
): SchemaContext {
  const budget = opts.tokenBudget ?? SAFE_DEFAULTS.schemaTokenBudget;
  const maxCols = opts.maxColumnsPerTable ?? 40;
  const tokens = tokenize(question);

  const scored: ScoredTable[] = schema.tables.map((table, index) => {
    const scoredColumns = table.columns.map((col) => ({ col, score: scoreMatch(col.name, tokens) }));
    const colBoost = scoredColumns
      .map((sc) => sc.score)
      .sort((a, b) => b - a)
      .slice(0, 3)
      .reduce((sum, s) => sum + s, 0);
    // Keep snapshot order among equal scores.
    return { table, score: scoreMatch(table.name, tokens) + colBoost - index * 1e-6, scoredColumns };
  });
  scored.sort((a, b) => b.score - a.score);

  const header = '-- Database schema (PostgreSQL)';
  const blocks: string[] = [];
  const included: string[] = [];
  let used = estimateTokens(header);

  for (const entry of scored) {
    let block = renderTable(entry, maxCols);
    let cost = estimateTokens(block) + 1;

    if (used + cost > budget) {
      if (blocks.length > 0) continue;
      // First table: shrink the column list until it fits, keeping at least one column.
      let cols = Math.min(maxCols, entry.scoredColumns.length);
      while (cols > 1 && used + cost > budget) {
        cols -= 1;
        block = renderTable(entry, cols);
        cost = estimateTokens(block) + 1;
      }
    }

    blocks.push(block);
    included.push(qualifiedName(entry.table));
    used += cost;
  }

  const omitted = schema.tables.length - included.length;
  const parts = [header, ...blocks];
  if (omitted > 0) {
    parts.push(`-- ${omitted} less relevant table${omitted === 1 ? '' : 's'} omitted`);
  }
  const text = parts.join('\n\n');
  return { text, includedTables: included, omittedTables: omitted, estimatedTokens: estimateTokens(text) };
}
