// ============================================================
// Report Formatter
// ============================================================
// Plain-text tables for the CLI. Pure string building; the caller
// decides where the lines go.
// ============================================================

import type { CompositeResult, Direction } from '../types/index.js';
import type { ScoreDistribution } from '../engine/signalRanker.js';

const COLUMNS = [
  { title: 'Rank', width: 5 },
  { title: 'Symbol', width: 8 },
  { title: 'Score', width: 6 },
  { title: 'Quality', width: 10 },
  { title: 'Pattern', width: 21 },
  { title: 'Trend', width: 12 },
  { title: 'Pat', width: 4 },
  { title: 'VSA', width: 4 },
  { title: 'Trd', width: 4 },
  { title: 'S/R', width: 4 },
  { title: 'RS', width: 4 },
  { title: 'Liq', width: 4 },
  { title: 'Action', width: 0 },
] as const;

function row(cells: readonly string[]): string {
  return cells
    .map((cell, i) => {
      const width = COLUMNS[i]?.width ?? 0;
      return width > 0 ? cell.slice(0, width - 1).padEnd(width) : cell;
    })
    .join('')
    .trimEnd();
}

export function formatSignalRow(result: CompositeResult, rank: number): string {
  const f = result.factorScores;
  return row([
    String(rank),
    result.symbol,
    String(result.totalScore),
    result.qualityLabel,
    f.pattern.breakdown.patternKey ?? '-',
    result.trendClass,
    String(f.pattern.value),
    String(f.vsa.value),
    String(f.trend.value),
    String(f.supportResistance.value),
    String(f.relativeStrength.value),
    String(f.liquidity.value),
    result.actionLabel,
  ]);
}

/**
 * Ranked table for one direction.
 *
 * @param direction - Heading shown above the table
 * @param results   - Already ranked rows
 */
export function formatSignalTable(direction: Direction, results: readonly CompositeResult[]): string[] {
  const header = row(COLUMNS.map((c) => c.title));
  const rule = '-'.repeat(header.length);
  const lines = [`TOP ${results.length} ${direction} SIGNALS`, header, rule];

  if (results.length === 0) {
    lines.push('(none)');
    return lines;
  }
  results.forEach((r, i) => lines.push(formatSignalRow(r, i + 1)));
  return lines;
}

export function formatDistribution(dist: ScoreDistribution): string[] {
  const lines = [`DISTRIBUTION (${dist.total} scored)`];
  for (const [direction, stats] of Object.entries(dist.byDirection)) {
    const avg = stats.averageScore === null ? '-' : stats.averageScore.toFixed(1);
    lines.push(`  ${direction.padEnd(9)}${String(stats.count).padStart(4)} | Avg Score: ${avg}`);
  }
  lines.push(`  Score >= 70: ${String(dist.atLeast70).padStart(4)}`);
  lines.push(`  Score >= 60: ${String(dist.atLeast60).padStart(4)}`);
  lines.push(`  Score >= 50: ${String(dist.atLeast50).padStart(4)}`);
  return lines;
}
