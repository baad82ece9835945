/**
 * Chart specification types. The encoding vocabulary follows Vega-Lite
 * so presentation layers can render a spec directly (see vega.ts).
 */

export const CHART_KINDS = ['line', 'bar', 'box', 'heatmap', 'table'] as const;

export type ChartKind = (typeof CHART_KINDS)[number];

export type EncodingType = 'temporal' | 'quantitative' | 'nominal' | 'ordinal';

export type Aggregate = 'mean' | 'sum' | 'count' | 'min' | 'max' | 'median';

export interface EncodingChannel {
  field: string;
  type: EncodingType;
  aggregate?: Aggregate;
  /** Bin a quantitative field into at most `maxBins` buckets */
  bin?: boolean;
}

export interface ChartEncoding {
  x?: EncodingChannel;
  y?: EncodingChannel;
  color?: EncodingChannel;
}

export interface ChartOptions {
  sort?: 'ascending' | 'descending' | 'none';
  interpolate?: 'linear' | 'monotone';
  maxBins?: number;
  orientation?: 'vertical' | 'horizontal';
}

export interface ChartSpec {
  kind: ChartKind;
  title: string;
  encoding: ChartEncoding;
  options: ChartOptions;
  /** Why this kind was chosen, for display and debugging */
  reason: string;
}
