#!/usr/bin/env node
// ============================================================
// Composite Signal Scorer - CLI Entry Point
// ============================================================
// Usage: score-signals <candidates.json>
//        (or CANDIDATES_FILE=<path> score-signals)
//
// Scores every candidate, applies the filter policy and logs the
// top BUY / SELL tables plus the score distribution.
// ============================================================

import 'dotenv/config';
import { createModuleLogger, enableFileLogging, setLogLevel } from './monitoring/logger.js';
import { loadRuntimeConfig } from './config/runtime.js';
import type { RuntimeConfig } from './config/runtime.js';
import { loadCandidates } from './collector/candidateLoader.js';
import { scoreBatch } from './engine/compositeScorer.js';
import { filterSignals, summarizeDistribution, topSignals } from './engine/signalRanker.js';
import type { FilterPolicy } from './engine/signalRanker.js';
import { formatDistribution, formatSignalTable } from './monitoring/report.js';
import { errorMessage } from './errors.js';

const log = createModuleLogger('Main');

function policyFrom(config: RuntimeConfig): FilterPolicy {
  return {
    minScore: config.MIN_SCORE,
    buyMinScore: config.BUY_MIN_SCORE,
    sellMinScore: config.SELL_MIN_SCORE,
  };
}

async function run(argv: readonly string[]): Promise<void> {
  const config = loadRuntimeConfig();
  setLogLevel(config.LOG_LEVEL);
  if (config.LOG_DIR) enableFileLogging(config.LOG_DIR);

  const file = argv[0] ?? config.CANDIDATES_FILE;
  if (!file) {
    throw new Error('No candidates file given (pass a path or set CANDIDATES_FILE)');
  }

  const candidates = await loadCandidates(file);
  const results = scoreBatch(candidates);
  const policy = policyFrom(config);
  const passed = filterSignals(results, policy);

  log.info(
    `Scored ${results.length} candidate(s); ${passed.length} pass the filter ` +
      `(min ${policy.minScore}, BUY ${policy.buyMinScore}, SELL ${policy.sellMinScore})`,
  );

  for (const direction of ['BUY', 'SELL'] as const) {
    for (const line of formatSignalTable(direction, topSignals(passed, direction, config.TOP_N))) {
      log.info(line);
    }
  }
  for (const line of formatDistribution(summarizeDistribution(results))) {
    log.info(line);
  }
}

run(process.argv.slice(2)).catch((err: unknown) => {
  log.error(`Fatal: ${errorMessage(err)}`);
  process.exitCode = 1;
});
