// Модель n-best записи: гипотезы одного исходного предложения.

/**
 * Одна n-best запись.
 * Все последовательности в `scores` и `parallel` выровнены по индексам с `translations`.
 */
export interface NBestRecord {
  translations: string[];
  // Модельные оценки каждой гипотезы.
  scores?: number[][];
  // Исходное предложение (нужно изометрическим метрикам).
  text?: string;
  // Прочие поля-массивы длины N, переставляемые вместе с translations.
  parallel: Record<string, unknown[]>;
  // Поля, передаваемые без изменений.
  passthrough: Record<string, unknown>;
}

// Оценки реранкинга, прикрепляемые к выходной записи.
export interface AttachedScores {
  scores: number[];
  bestScore: number;
}
