import type { AttachedScores, NBestRecord } from '../nbest/types.js';
import type { ScoreProvider } from '../scoring/types.js';
import { SentenceScoreProvider } from '../scoring/provider.js';
import { DEFAULT_ISOMETRIC_ALPHA, resolveMetric } from './metrics.js';
import type { MetricSpec } from './metrics.js';
import { createScoringStrategy } from './strategy.js';
import type { ScoringStrategy } from './strategy.js';
import { applyRanking, rankingIndices } from './ranking.js';
import { SilentEvents } from './events.js';
import type { RerankContext, RerankEvents } from './events.js';

// Параметры реранкера.
export interface RerankerOptions {
  metric: string;
  isometricAlpha?: number;
  // Прикреплять оценки реранкинга к результату.
  returnScore?: boolean;
  provider?: ScoreProvider;
  events?: RerankEvents;
}

// Переранжированная запись и, при returnScore, оценки в новом порядке.
export interface RankingResult {
  record: NBestRecord;
  attached?: AttachedScores;
}

/**
 * Переранжирует n-best гипотезы по предложенческой метрике.
 * Метрика, стратегия оценки и направление фиксируются в конструкторе; состояния между вызовами нет.
 */
export class Reranker {
  readonly metric: MetricSpec;
  private readonly returnScore: boolean;
  private readonly strategy: ScoringStrategy;
  private readonly events: RerankEvents;

  constructor(options: RerankerOptions) {
    this.metric = resolveMetric(options.metric, options.isometricAlpha ?? DEFAULT_ISOMETRIC_ALPHA);
    this.returnScore = options.returnScore ?? false;
    this.strategy = createScoringStrategy(this.metric, options.provider ?? new SentenceScoreProvider());
    this.events = options.events ?? new SilentEvents();
  }

  // Переранжирует гипотезы одного предложения относительно его референса.
  rerank(record: NBestRecord, reference: string, context: RerankContext = {}): RankingResult {
    const count = record.translations.length;

    // 0 или 1 гипотеза: метрику не вызываем, запись возвращается как есть.
    if (count <= 1) {
      this.events.onNothingToRerank(count, context);
      return { record };
    }

    const scores = this.strategy.score(record, reference);
    const ranking = rankingIndices(scores, this.metric.direction);
    const reranked = applyRanking(record, ranking);

    if (!this.returnScore) {
      return { record: reranked };
    }

    const sortedScores = ranking.map((index) => scores[index] ?? Number.NaN);
    return {
      record: reranked,
      attached: { scores: sortedScores, bestScore: sortedScores[0] ?? Number.NaN },
    };
  }
}
