/**
 * Plain-text table for result rows. Numbers are right-aligned; cells are
 * capped at MAX_CELL characters.
 */

export const MAX_CELL = 60;

export interface TableOptions {
  /** Rows to print before summarising the rest */
  maxRows?: number;
}

export function formatTable(
  columns: readonly string[],
  rows: readonly Record<string, unknown>[],
  opts: TableOptions = {},
): string {
  if (columns.length === 0) return '(no columns)';
  if (rows.length === 0) return '(0 rows)';

  const shown = opts.maxRows !== undefined && opts.maxRows < rows.length ? rows.slice(0, opts.maxRows) : rows;
  const cells = shown.map((row) => columns.map((col) => clip(formatValue(row[col]))));
  const numeric = columns.map((col) => shown.every((row) => row[col] === null || typeof row[col] === 'number'));

  const widths = columns.map((col, i) => Math.max(clip(col).length, ...cells.map((line) => line[i].length)));

  const pad = (value: string, i: number): string =>
    numeric[i] ? value.padStart(widths[i]) : value.padEnd(widths[i]);

  const lines = [
    columns.map((col, i) => clip(col).padEnd(widths[i])).join(' | '),
    widths.map((w) => '-'.repeat(w)).join('-+-'),
    ...cells.map((line) => line.map(pad).join(' | ')),
  ];

  const hidden = rows.length - shown.length;
  if (hidden > 0) {
    lines.push(`... ${hidden} more row${hidden === 1 ? '' : 's'}`);
  }
  return lines.map((line) => line.trimEnd()).join('\n');
}

function clip(value: string): string {
  return value.length > MAX_CELL ? `${value.slice(0, MAX_CELL - 3)}...` : value;
}

export function formatValue(val: unknown): string {
  if (val === null || val === undefined) return 'NULL';
  if (val instanceof Date) return val.toISOString();
  if (typeof val === 'number') return Number.isInteger(val) ? String(val) : String(Number(val.toFixed(4)));
  if (typeof val === 'object') return JSON.stringify(val);
  return String(val);
}
