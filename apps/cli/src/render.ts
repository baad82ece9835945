/**
 * Text renderings of pipeline results for the terminal.
 */

import type { ChartSpec, EncodingChannel, ResultSet } from '@vizbot/core';

function channelText(channel: EncodingChannel): string {
  if (channel.aggregate === 'count') return 'count';
  const name = channel.aggregate ? `${channel.aggregate}(${channel.field})` : channel.field;
  return `${name} [${channel.type}${channel.bin ? ', binned' : ''}]`;
}

export function describeChart(chart: ChartSpec): string[] {
  const lines = [`Chart: ${chart.kind} (${chart.reason})`, `  Title: ${chart.title}`];
  const { x, y, color } = chart.encoding;
  if (x) lines.push(`  x:     ${channelText(x)}`);
  if (y) lines.push(`  y:     ${channelText(y)}`);
  if (color) lines.push(`  color: ${channelText(color)}`);
  return lines;
}

export function rowSummary(result: ResultSet): string {
  const plural = result.rowCount === 1 ? '' : 's';
  const truncated = result.truncated ? ` (showing the first ${result.rows.length})` : '';
  return `${result.rowCount} row${plural} returned${truncated} in ${result.execMs}ms`;
}
