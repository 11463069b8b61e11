import type { IsometricVariant, ScoreProvider } from './types.js';
import { sentenceBleu } from './bleu.js';
import { sentenceChrf } from './chrf.js';
import { isometricScore } from './isometric.js';

// Провайдер оценок по умолчанию на встроенных метриках.
export class SentenceScoreProvider implements ScoreProvider {
  bleu(hypothesis: string, references: readonly string[]): number {
    return sentenceBleu(hypothesis, references);
  }

  chrf(hypothesis: string, references: readonly string[]): number {
    return sentenceChrf(hypothesis, references);
  }

  isometric(
    hypothesis: string,
    modelScore: number,
    source: string,
    variant: IsometricVariant,
    alpha: number,
  ): number {
    return isometricScore(hypothesis, modelScore, source, variant, alpha);
  }
}
