// ============================================================
// Candidate Loader
// ============================================================
// Turns raw feature records (JSON, snake_case as produced by the
// upstream indicator pipeline) into SignalCandidates. This is the one
// place that replaces missing values with defaults; the scorers
// assume clean input.
//
// Defaults for null / missing fields:
//   volume 0 | avg_volume_5d, avg_volume_20d -> volume | atr_14 1
//   rs_rating 50 | rs_rating_5d_ago null | trading_value 0
//   price_vs_sma20 / 50 -> 0 | trend_class -> classifyTrend(...)
//   history -> [current bar]
// ============================================================

import fs from 'fs/promises';
import { z } from 'zod';
import { TREND_CLASSES, PATTERN_BIASES } from '../types/index.js';
import type { Bar, SignalCandidate } from '../types/index.js';
import { classifyTrend } from '../analyzer/trendClassifier.js';
import { CandidateValidationError, errorMessage } from '../errors.js';
import { createModuleLogger } from '../monitoring/logger.js';

const log = createModuleLogger('CandidateLoader');

const optionalNumber = z.number().finite().nullish();
const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

interface PriceRange {
  high: number;
  low: number;
  close: number;
}

/** Shared by the current bar and history bars: high >= low, close inside the range. */
function checkPriceRange(bar: PriceRange, ctx: z.RefinementCtx): void {
  if (bar.high < bar.low) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'high must be >= low' });
  } else if (bar.close < bar.low || bar.close > bar.high) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'close must be within [low, high]' });
  }
}

const BarSchema = z
  .object({
    date: isoDate,
    open: z.number().finite(),
    high: z.number().finite(),
    low: z.number().finite(),
    close: z.number().finite(),
    volume: z.number().finite().nonnegative().default(0),
  })
  .superRefine(checkPriceRange);

export const RawCandidateSchema = z
  .object({
    symbol: z.string().min(1),
    date: isoDate,
    open: z.number().finite(),
    high: z.number().finite(),
    low: z.number().finite(),
    close: z.number().finite(),
    volume: optionalNumber,
    pattern_name: z.string().nullish(),
    pattern_bias: z.enum(PATTERN_BIASES).nullish(),
    trend_class: z.enum(TREND_CLASSES).nullish(),
    rs_rating: z.number().min(1).max(99).nullish(),
    rs_rating_5d_ago: optionalNumber,
    sector_rs: optionalNumber,
    sector_rs_5d_ago: optionalNumber,
    trading_value: optionalNumber,
    avg_volume_5d: optionalNumber,
    avg_volume_20d: optionalNumber,
    atr_14: optionalNumber,
    price_vs_sma20: optionalNumber,
    price_vs_sma50: optionalNumber,
    history: z.array(BarSchema).nullish(),
  })
  .superRefine(checkPriceRange);

export type RawCandidate = z.infer<typeof RawCandidateSchema>;

/** Sort history ascending and make sure it ends with the current bar. */
function buildHistory(history: Bar[] | null | undefined, bar: Bar): Bar[] {
  const prior = (history ?? []).filter((b) => b.date < bar.date);
  prior.sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
  return [...prior, bar];
}

/**
 * Apply defaults to a validated raw record.
 *
 * @param raw - A record that already passed RawCandidateSchema
 */
export function toCandidate(raw: RawCandidate): SignalCandidate {
  const volume = raw.volume ?? 0;
  const bar: Bar = { date: raw.date, open: raw.open, high: raw.high, low: raw.low, close: raw.close, volume };
  const priceVsSma20 = raw.price_vs_sma20 ?? 0;
  const priceVsSma50 = raw.price_vs_sma50 ?? 0;

  const candidate: SignalCandidate = {
    symbol: raw.symbol,
    date: raw.date,
    bar,
    history: buildHistory(raw.history, bar),
    patternName: raw.pattern_name ?? null,
    patternBias: raw.pattern_bias ?? null,
    trendClass: raw.trend_class ?? classifyTrend(priceVsSma20, priceVsSma50),
    rsRating: raw.rs_rating ?? 50,
    rsRating5dAgo: raw.rs_rating_5d_ago ?? null,
    tradingValue: raw.trading_value ?? 0,
    volume,
    avgVolume5d: raw.avg_volume_5d ?? volume,
    avgVolume20d: raw.avg_volume_20d ?? volume,
    atr14: raw.atr_14 ?? 1,
    priceVsSma20,
    priceVsSma50,
  };

  if (raw.sector_rs != null && raw.sector_rs_5d_ago != null) {
    candidate.sectorRs = { today: raw.sector_rs, fiveDaysAgo: raw.sector_rs_5d_ago };
  }

  return candidate;
}

/**
 * Validate and convert an array of raw records.
 *
 * @throws CandidateValidationError listing every invalid field
 */
export function parseCandidates(input: unknown): SignalCandidate[] {
  const parsed = z.array(RawCandidateSchema).safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`);
    throw new CandidateValidationError('Invalid candidate records', issues);
  }
  return parsed.data.map(toCandidate);
}

/**
 * Read a JSON file holding an array of raw candidate records.
 *
 * @param filePath - Path to the JSON file
 */
export async function loadCandidates(filePath: string): Promise<SignalCandidate[]> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (err) {
    throw new CandidateValidationError(`Cannot read candidates file ${filePath}`, [errorMessage(err)]);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new CandidateValidationError(`Candidates file ${filePath} is not valid JSON`, [errorMessage(err)]);
  }

  const candidates = parseCandidates(json);
  log.info(`Loaded ${candidates.length} candidate(s) from ${filePath}`);
  return candidates;
}
