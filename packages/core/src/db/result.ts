/**
 * Shaping of raw driver results into ResultSets.
 */

import type { ColumnKind, ColumnMeta, RawQueryResult, ResultSet, Row } from './types.js';

// PostgreSQL type OIDs (pg_type.oid)
const NUMERIC_OIDS = new Set([20, 21, 23, 26, 700, 701, 1700]);
const TEMPORAL_OIDS = new Set([1082, 1114, 1184]);
const INT8_OID = 20;
const BOOLEAN_OID = 16;
const TEXT_OIDS = new Set([18, 19, 25, 1042, 1043, 2950]);

export function kindForType(oid: number): ColumnKind | null {
  if (NUMERIC_OIDS.has(oid)) return 'numeric';
  if (TEMPORAL_OIDS.has(oid)) return 'temporal';
  if (oid === BOOLEAN_OID) return 'boolean';
  if (TEXT_OIDS.has(oid)) return 'categorical';
  return null;
}

/** Kind from the values themselves, for types without a fixed mapping (enums, domains). */
export function inferKind(values: readonly unknown[]): ColumnKind {
  let kind: ColumnKind | null = null;
  for (const v of values) {
    if (v === null || v === undefined) continue;
    const k: ColumnKind =
      typeof v === 'number' || typeof v === 'bigint'
        ? 'numeric'
        : v instanceof Date
          ? 'temporal'
          : typeof v === 'boolean'
            ? 'boolean'
            : typeof v === 'string'
              ? 'categorical'
              : 'unknown';
    if (kind === null) kind = k;
    else if (kind !== k) return 'unknown';
  }
  return kind ?? 'unknown';
}

/** int8 values beyond 2^53 stay strings rather than lose digits. */
function toNumber(value: unknown, int8: boolean): unknown {
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    if (int8 && !Number.isSafeInteger(n)) return value;
    return Number.isFinite(n) ? n : value;
  }
  if (typeof value === 'bigint') {
    const n = Number(value);
    return Number.isSafeInteger(n) ? n : value.toString();
  }
  return value;
}

/**
 * Build a ResultSet. bigint and numeric values, which the driver returns
 * as strings, become numbers (bigints only while exact); rows past
 * `maxRows` are dropped.
 */
export function shapeResult(raw: RawQueryResult, maxRows: number, execMs: number): ResultSet {
  const allRows = raw.rows;
  const truncated = allRows.length > maxRows;
  const kept = truncated ? allRows.slice(0, maxRows) : allRows;

  const columns: ColumnMeta[] = raw.fields.map((f) => ({
    name: f.name,
    pgType: f.dataTypeID,
    kind: kindForType(f.dataTypeID) ?? inferKind(kept.map((r) => r[f.name])),
  }));

  const numericCols = columns.filter((c) => c.kind === 'numeric');
  const rows: Row[] =
    numericCols.length === 0
      ? kept
      : kept.map((r) => {
          const out: Row = { ...r };
          for (const col of numericCols) out[col.name] = toNumber(r[col.name], col.pgType === INT8_OID);
          return out;
        });

  return { columns, rows, rowCount: allRows.length, truncated, execMs };
}
