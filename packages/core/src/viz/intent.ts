import type { ChartKind } from './types.js';

type IntentRule = readonly [Exclude<ChartKind, 'table'>, RegExp];

// Chart names win over softer phrasing.
const NAMED: readonly IntentRule[] = [
  ['heatmap', /\bheat\s?-?maps?\b/i],
  ['box', /\bbox\s?-?(?:plots?|charts?|and[\s-]whiskers?)\b|\bboxplots?\b/i],
  ['line', /\bline\s+(?:charts?|graphs?|plots?)\b/i],
  ['bar', /\bbar\s+(?:charts?|graphs?|plots?)\b/i],
];

const HINTED: readonly IntentRule[] = [
  ['heatmap', /\b(?:hour|hours)\s+(?:and|by|vs\.?|x)\s+(?:day|days|weekday|weekdays)\b|\b(?:day|weekday)s?\s+(?:and|by|vs\.?|x)\s+hours?\b/i],
  ['box', /\bdistributions?\b|\bspread\b|\bvariab(?:ility|le)\b|\bvariance\b|\boutliers?\b/i],
  ['line', /\btrends?\b|\bover\s+time\b|\btime\s?series\b|\bdaily\b|\bweekly\b|\bmonthly\b|\byearly\b/i],
  ['bar', /\btop\s+\d+\b|\brank(?:ing|ed)?\b|\bcompar(?:e|ing|ison)\b|\bhighest\b|\blowest\b/i],
];

/**
 * The chart kind a question asks for, if any. Only a preference: the
 * chart mapper honours it when the result shape supports that kind.
 */
export function detectChartIntent(question: string): ChartKind | null {
  for (const rules of [NAMED, HINTED]) {
    for (const [kind, pattern] of rules) {
      if (pattern.test(question)) return kind;
    }
  }
  return null;
}
