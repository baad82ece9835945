// Vega-Lite rendering of a ChartSpec.

import type { Row } from '../db/types.js';
import type { ChartSpec, EncodingChannel } from './types.js';

export const VEGA_LITE_SCHEMA = 'https://vega.github.io/schema/vega-lite/v5.json';

export type VegaMark = { type: 'line' | 'bar' | 'boxplot' | 'rect'; [key: string]: unknown };

export interface VegaChannel {
  field?: string;
  type: EncodingChannel['type'];
  aggregate?: string;
  bin?: boolean | { maxbins: number };
  sort?: string | null;
  axis?: Record<string, unknown>;
  title?: string;
}

export interface VegaLiteSpec {
  $schema: string;
  title: string;
  data: { values: Row[] };
  mark: VegaMark;
  encoding: Partial<Record<'x' | 'y' | 'color', VegaChannel>>;
  width?: number | 'container';
  height?: number;
}

function jsonRow(row: Row): Row {
  const out: Row = {};
  for (const [k, v] of Object.entries(row)) {
    out[k] = v instanceof Date ? v.toISOString() : typeof v === 'bigint' ? Number(v) : v;
  }
  return out;
}

function channel(ch: EncodingChannel, maxBins: number | undefined): VegaChannel {
  // count takes no field
  const out: VegaChannel =
    ch.aggregate === 'count'
      ? { type: ch.type, aggregate: 'count', title: 'count' }
      : { field: ch.field, type: ch.type };
  if (ch.aggregate && ch.aggregate !== 'count') out.aggregate = ch.aggregate;
  if (ch.bin) out.bin = maxBins ? { maxbins: maxBins } : true;
  return out;
}

function markFor(spec: ChartSpec): VegaMark | null {
  switch (spec.kind) {
    case 'line':
      return { type: 'line', point: true, interpolate: spec.options.interpolate ?? 'linear' };
    case 'bar':
      return { type: 'bar' };
    case 'box':
      return { type: 'boxplot', extent: 1.5 };
    case 'heatmap':
      return { type: 'rect' };
    case 'table':
      return null;
  }
}

/**
 * Vega-Lite v5 spec for a chart, with the rows inlined as data.
 * Returns null for `table`, which has no chart form.
 */
export function toVegaLite(spec: ChartSpec, rows: Row[]): VegaLiteSpec | null {
  const mark = markFor(spec);
  if (!mark) return null;

  const encoding: VegaLiteSpec['encoding'] = {};
  const { x, y, color } = spec.encoding;
  const maxBins = spec.options.maxBins;

  if (x) {
    encoding.x = channel(x, maxBins);
    if (x.type === 'temporal') encoding.x.axis = { labelAngle: -45 };
    if (spec.kind === 'bar') {
      encoding.x.sort = spec.options.sort === 'descending' ? '-y' : spec.options.sort === 'ascending' ? 'y' : null;
      encoding.x.axis = { labelAngle: -45 };
    }
  }
  if (y) encoding.y = channel(y, maxBins);
  if (color) encoding.color = channel(color, maxBins);

  return {
    $schema: VEGA_LITE_SCHEMA,
    title: spec.title,
    data: { values: rows.map(jsonRow) },
    mark,
    encoding,
    width: 'container',
  };
}
