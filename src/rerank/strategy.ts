// Стратегии оценки гипотез: одна на семейство метрик, выбирается при создании реранкера.
import { RecordSchemaError } from '../errors.js';
import type { NBestRecord } from '../nbest/types.js';
import type { IsometricVariant, ScoreProvider } from '../scoring/types.js';
import type { MetricSpec } from './metrics.js';

// Считает по одной оценке на гипотезу.
export interface ScoringStrategy {
  score(record: NBestRecord, reference: string): number[];
}

// Метрики сходства с референсом (BLEU, chrF).
class ReferenceOverlapStrategy implements ScoringStrategy {
  constructor(private readonly scoreFn: (hypothesis: string, references: readonly string[]) => number) {}

  score(record: NBestRecord, reference: string): number[] {
    const references = [reference];
    return record.translations.map((hypothesis) => this.scoreFn(hypothesis, references));
  }
}

// Изометрические метрики: нужны исходное предложение и модельная оценка каждой гипотезы.
class IsometricStrategy implements ScoringStrategy {
  constructor(
    private readonly provider: ScoreProvider,
    private readonly variant: IsometricVariant,
    private readonly alpha: number,
  ) {}

  score(record: NBestRecord): number[] {
    const { text: source, scores } = record;
    if (source === undefined) {
      throw new RecordSchemaError(`Metric '${this.variant}' requires the source sentence in field 'text'`);
    }
    if (scores === undefined) {
      throw new RecordSchemaError(`Metric '${this.variant}' requires model scores in field 'scores'`);
    }

    return record.translations.map((hypothesis, i) => {
      const modelScore = scores[i]?.[0];
      if (modelScore === undefined) {
        throw new RecordSchemaError(`Hypothesis ${i} has no model score in field 'scores'`);
      }
      return this.provider.isometric(hypothesis, modelScore, source, this.variant, this.alpha);
    });
  }
}

export function createScoringStrategy(metric: MetricSpec, provider: ScoreProvider): ScoringStrategy {
  if (metric.family === 'isometric') {
    return new IsometricStrategy(provider, metric.name, metric.alpha);
  }

  switch (metric.name) {
  case 'bleu':
    return new ReferenceOverlapStrategy((hypothesis, references) => provider.bleu(hypothesis, references));
  case 'chrf':
    return new ReferenceOverlapStrategy((hypothesis, references) => provider.chrf(hypothesis, references));
  }
}
