import { CHART_KINDS, type ChartKind } from '@vizbot/core';
import { usageError } from './errors.js';

export function parseCount(value: string, flag: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw usageError(`${flag} must be a non-negative integer, got "${value}".`);
  }
  return n;
}

export function parseChartKind(value: string | undefined): ChartKind | undefined {
  if (value === undefined) return undefined;
  const kind = CHART_KINDS.find((k) => k === value.trim().toLowerCase());
  if (!kind) {
    throw usageError(`--chart must be one of ${CHART_KINDS.join(', ')}, got "${value}".`);
  }
  return kind;
}
