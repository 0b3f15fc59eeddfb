// ============================================================
// Composite Signal Scorer - Library Entry Point
// ============================================================

export * from './types/index.js';
export { scoreCandidate, scoreBatch, qualityLabel, actionLabel } from './engine/compositeScorer.js';
export { classifyDirection } from './engine/directionClassifier.js';
export { classifyTrend } from './analyzer/trendClassifier.js';
export { rankSignals, filterSignals, topSignals, passesPolicy } from './engine/signalRanker.js';
export { parseCandidates, loadCandidates } from './collector/candidateLoader.js';
export { InvalidEnumError, CandidateValidationError } from './errors.js';
export { DEFAULT_FILTER_POLICY } from './config/filter.js';
export type { FilterPolicy } from './config/filter.js';
