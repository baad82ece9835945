/**
 * CSV export of result rows (RFC 4180 quoting, header line first).
 */

import type { Row } from '@vizbot/core';

function csvValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsv(columns: readonly string[], rows: readonly Row[]): string {
  const lines = [columns.map(escapeCsvField).join(',')];
  for (const row of rows) {
    lines.push(columns.map((col) => escapeCsvField(csvValue(row[col]))).join(','));
  }
  return `${lines.join('\n')}\n`;
}
