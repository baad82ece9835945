/**
 * Column profiling for chart selection.
 *
 * Each result column gets a role:
 * - `time`: a temporal column, or text whose name and values look like dates
 * - `bucket`: a small integer range named like a calendar unit (hour, day of week, month)
 * - `measure`: any other numeric column
 * - `category`: text or boolean
 * - `other`: everything else
 */

import type { ColumnMeta, ResultSet } from '../db/types.js';

export type ColumnRole = 'time' | 'bucket' | 'measure' | 'category' | 'other';

export interface ColumnProfile {
  name: string;
  role: ColumnRole;
  /** Distinct non-null values */
  distinct: number;
  nonNull: number;
}

/** At most this many distinct values make a column usable as a heatmap axis or box group. */
export const LOW_CARDINALITY = 31;

const TEMPORAL_NAME = /date|time|day|week|month|year|period|quarter|_at$|_on$/i;
const BUCKET_NAME = /^(?:\w+_)?(?:hour|hr|minute|dow|dayofweek|weekday|day|week|month|quarter|year)$/i;
const ISO_DATE = /^\d{4}-\d{2}(-\d{2})?([ T]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}(:?\d{2})?)?)?$/;

function distinctKey(value: unknown): string {
  return value instanceof Date ? `d:${value.getTime()}` : `${typeof value}:${String(value)}`;
}

function looksLikeDates(values: unknown[]): boolean {
  return values.length > 0 && values.every((v) => typeof v === 'string' && ISO_DATE.test(v) && !Number.isNaN(Date.parse(v)));
}

function roleFor(meta: ColumnMeta, values: unknown[], distinct: number): ColumnRole {
  switch (meta.kind) {
    case 'temporal':
      return 'time';
    case 'numeric': {
      const integral = values.every((v) => typeof v === 'number' && Number.isInteger(v));
      if (integral && distinct <= LOW_CARDINALITY && BUCKET_NAME.test(meta.name)) return 'bucket';
      return 'measure';
    }
    case 'categorical':
      return TEMPORAL_NAME.test(meta.name) && looksLikeDates(values) ? 'time' : 'category';
    case 'boolean':
      return 'category';
    default:
      return 'other';
  }
}

export function profileColumns(result: ResultSet): ColumnProfile[] {
  return result.columns.map((meta) => {
    const values = result.rows.map((r) => r[meta.name]).filter((v) => v !== null && v !== undefined);
    const distinct = new Set(values.map(distinctKey)).size;
    return {
      name: meta.name,
      role: roleFor(meta, values, distinct),
      distinct,
      nonNull: values.length,
    };
  });
}
