// Barrel-файл модуля реранкинга.
export type {
  MetricName,
  MetricSpec,
  RankingDirection,
  ReferenceOverlapMetric,
  IsometricMetric,
} from './metrics.js';
export {
  METRIC_NAMES,
  ISOMETRIC_PREFIX,
  DEFAULT_ISOMETRIC_ALPHA,
  isMetricName,
  resolveMetric,
} from './metrics.js';
export type { ScoringStrategy } from './strategy.js';
export { createScoringStrategy } from './strategy.js';
export { rankingIndices, applyRanking, permute } from './ranking.js';
export type { RerankerOptions, RankingResult } from './reranker.js';
export { Reranker } from './reranker.js';
export type { BlankFallbackPolicy } from './best.js';
export { selectBest } from './best.js';
export type { RerankContext, RerankEvents, RerankSummary } from './events.js';
export { ConsoleEvents, SilentEvents } from './events.js';
