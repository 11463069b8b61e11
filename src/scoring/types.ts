// Интерфейсы модуля оценки гипотез.

// Вариант изометрической метрики.
export type IsometricVariant = 'isometric-ratio' | 'isometric-diff' | 'isometric-lc';

// Источник предложенческих оценок. Все функции чистые и детерминированные.
export interface ScoreProvider {
  // Сглаженный sentence BLEU (0..100), больше — лучше.
  bleu(hypothesis: string, references: readonly string[]): number;
  // Sentence chrF (0..100), больше — лучше.
  chrf(hypothesis: string, references: readonly string[]): number;
  // Смесь модельной оценки и длинового штрафа относительно исходного предложения.
  isometric(
    hypothesis: string,
    modelScore: number,
    source: string,
    variant: IsometricVariant,
    alpha: number,
  ): number;
}
