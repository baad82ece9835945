/**
 * Chart selection.
 *
 * chooseChart maps a ResultSet to exactly one ChartSpec. Precedence:
 *   1. line     time axis (or one calendar bucket) with a measure, optional series
 *   2. bar      one category with a measure, or a lone category counted, up to barMaxRows rows
 *   3. with more rows than that:
 *      heatmap  two low-cardinality axes with a measure
 *      box      a measure over repeating groups
 *      heatmap  binned density of two measures
 *   4. table    everything else
 *
 * A preferred kind (explicit, or detected from the question) is used only
 * when the shape supports it.
 */

import type { ResultSet } from '../db/types.js';
import type { ChartEncoding, ChartKind, ChartOptions, ChartSpec } from './types.js';
import { LOW_CARDINALITY, profileColumns, type ColumnProfile } from './profile.js';
import { detectChartIntent } from './intent.js';

export const DEFAULT_BAR_MAX_ROWS = 20;
/** Row limit for a bar chart the question asked for by name */
export const REQUESTED_BAR_MAX_ROWS = 50;
/** Most series a line chart splits into before the split column is ignored */
export const MAX_LINE_SERIES = 12;
export const DENSITY_BINS = 20;

export interface ChooseChartOptions {
  barMaxRows?: number;
  /** Preferred kind. Omitted: detected from the question. null: none. */
  preferred?: ChartKind | null;
}

type Choice = Omit<ChartSpec, 'title'>;

interface Shape {
  rows: number;
  columns: number;
  time: ColumnProfile[];
  buckets: ColumnProfile[];
  measures: ColumnProfile[];
  categories: ColumnProfile[];
}

function shapeOf(result: ResultSet): Shape {
  const profiles = profileColumns(result);
  const byRole = (role: ColumnProfile['role']) => profiles.filter((p) => p.role === role);
  return {
    rows: result.rows.length,
    columns: profiles.length,
    time: byRole('time'),
    buckets: byRole('bucket'),
    measures: byRole('measure'),
    categories: byRole('category'),
  };
}

function choice(kind: ChartKind, encoding: ChartEncoding, options: ChartOptions, reason: string): Choice {
  return { kind, encoding, options, reason };
}

function lineFor(shape: Shape): Choice | null {
  const measure = shape.measures[0];
  if (!measure) return null;

  const time = shape.time[0];
  if (time) {
    const series = shape.categories.find((c) => c.distinct > 1 && c.distinct <= MAX_LINE_SERIES);
    const encoding: ChartEncoding = {
      x: { field: time.name, type: 'temporal' },
      y: { field: measure.name, type: 'quantitative' },
    };
    if (series) encoding.color = { field: series.name, type: 'nominal' };
    const split = series ? ` split by "${series.name}"` : '';
    return choice(
      'line',
      encoding,
      { sort: 'ascending', interpolate: 'monotone' },
      `time axis "${time.name}" with measure "${measure.name}"${split}`,
    );
  }

  const bucket = shape.buckets[0];
  if (bucket && shape.buckets.length === 1 && shape.categories.length === 0) {
    return choice(
      'line',
      {
        x: { field: bucket.name, type: 'ordinal' },
        y: { field: measure.name, type: 'quantitative' },
      },
      { sort: 'ascending', interpolate: 'linear' },
      `ordered bucket "${bucket.name}" with measure "${measure.name}"`,
    );
  }
  return null;
}

function barFor(shape: Shape, maxRows: number): Choice | null {
  if (shape.rows > maxRows) return null;
  const category = shape.categories[0];
  if (!category) return null;

  const measure = shape.measures[0];
  if (measure) {
    const encoding: ChartEncoding = {
      x: { field: category.name, type: 'nominal' },
      y: { field: measure.name, type: 'quantitative' },
    };
    const group = shape.categories[1];
    if (group) encoding.color = { field: group.name, type: 'nominal' };
    return choice(
      'bar',
      encoding,
      { sort: 'descending', orientation: 'vertical' },
      `category "${category.name}" with measure "${measure.name}"`,
    );
  }

  if (shape.columns === 1) {
    return choice(
      'bar',
      {
        x: { field: category.name, type: 'nominal' },
        y: { field: category.name, type: 'quantitative', aggregate: 'count' },
      },
      { sort: 'descending', orientation: 'vertical' },
      `count of rows per "${category.name}"`,
    );
  }
  return null;
}

function isAxis(p: ColumnProfile): boolean {
  return p.distinct > 1 && p.distinct <= LOW_CARDINALITY;
}

function gridHeatmapFor(shape: Shape): Choice | null {
  const measure = shape.measures[0];
  const axes = [...shape.buckets, ...shape.categories].filter(isAxis);
  if (!measure || axes.length < 2) return null;

  // The finer axis runs along x (hour of day across, day of week down).
  const [x, y] = axes.slice(0, 2).sort((a, b) => b.distinct - a.distinct);
  if (!x || !y) return null;
  return choice(
    'heatmap',
    {
      x: { field: x.name, type: 'ordinal' },
      y: { field: y.name, type: 'ordinal' },
      color: { field: measure.name, type: 'quantitative', aggregate: 'mean' },
    },
    {},
    `mean "${measure.name}" over "${x.name}" x "${y.name}"`,
  );
}

function boxFor(shape: Shape): Choice | null {
  const measure = shape.measures[0];
  const group = [...shape.categories, ...shape.buckets].find((p) => isAxis(p) && p.distinct < p.nonNull);
  if (!measure || !group) return null;
  return choice(
    'box',
    {
      x: { field: group.name, type: group.role === 'bucket' ? 'ordinal' : 'nominal' },
      y: { field: measure.name, type: 'quantitative' },
    },
    { orientation: 'vertical' },
    `distribution of "${measure.name}" per "${group.name}"`,
  );
}

function densityHeatmapFor(shape: Shape): Choice | null {
  const [a, b] = shape.measures;
  if (!a || !b) return null;
  return choice(
    'heatmap',
    {
      x: { field: a.name, type: 'quantitative', bin: true },
      y: { field: b.name, type: 'quantitative', bin: true },
      color: { field: a.name, type: 'quantitative', aggregate: 'count' },
    },
    { maxBins: DENSITY_BINS },
    `binned density of "${a.name}" against "${b.name}"`,
  );
}

function tableChoice(reason: string): Choice {
  return choice('table', {}, {}, reason);
}

function requested(kind: ChartKind, shape: Shape, barMaxRows: number): Choice | null {
  switch (kind) {
    case 'line':
      return lineFor(shape);
    case 'bar':
      return barFor(shape, Math.max(barMaxRows, REQUESTED_BAR_MAX_ROWS));
    case 'box':
      return boxFor(shape);
    case 'heatmap':
      return gridHeatmapFor(shape) ?? densityHeatmapFor(shape);
    case 'table':
      return tableChoice('table requested');
  }
}

export function titleFor(question: string): string {
  const text = question.replace(/\s+/g, ' ').trim().replace(/[?.!\s]+$/, '');
  if (text === '') return 'Query result';
  const title = text.charAt(0).toUpperCase() + text.slice(1);
  return title.length > 80 ? `${title.slice(0, 77)}...` : title;
}

/**
 * Pick the chart for a result. Total: every input yields a spec, with
 * `table` as the fallback.
 */
export function chooseChart(result: ResultSet, question: string, opts: ChooseChartOptions = {}): ChartSpec {
  const title = titleFor(question);
  if (result.rows.length === 0 || result.columns.length === 0) {
    return { title, ...tableChoice('no rows to chart') };
  }

  const barMaxRows = Math.max(1, opts.barMaxRows ?? DEFAULT_BAR_MAX_ROWS);
  const shape = shapeOf(result);

  const preferred = opts.preferred === undefined ? detectChartIntent(question) : opts.preferred;
  if (preferred) {
    const picked = requested(preferred, shape, barMaxRows);
    if (picked) return { title, ...picked, reason: `${picked.reason} (requested)` };
  }

  const picked =
    lineFor(shape) ??
    barFor(shape, barMaxRows) ??
    (shape.rows > barMaxRows ? (gridHeatmapFor(shape) ?? boxFor(shape) ?? densityHeatmapFor(shape)) : null) ??
    tableChoice('no chartable shape');

  return { title, ...picked };
}
