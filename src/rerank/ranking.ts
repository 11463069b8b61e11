// Вычисление перестановки и её применение к параллельным полям записи.
import type { NBestRecord } from '../nbest/types.js';
import type { RankingDirection } from './metrics.js';

/**
 * Устойчивая перестановка индексов по оценкам.
 * Равные оценки сохраняют исходный порядок в обоих направлениях, NaN ранжируется последним.
 */
export function rankingIndices(scores: readonly number[], direction: RankingDirection): number[] {
  const sign = direction === 'descending' ? -1 : 1;
  const indices = scores.map((_score, index) => index);

  // Array.prototype.sort устойчив, поэтому индексы равных оценок не меняются местами.
  return indices.sort((a, b) => {
    const left = scores[a] ?? Number.NaN;
    const right = scores[b] ?? Number.NaN;
    if (left === right) {
      return 0;
    }
    if (Number.isNaN(left) || Number.isNaN(right)) {
      return Number(Number.isNaN(left)) - Number(Number.isNaN(right));
    }
    return sign * (left - right);
  });
}

// Переставляет элементы последовательности по ранжированию.
export function permute<T>(values: readonly T[], ranking: readonly number[]): T[] {
  return ranking.map((index) => {
    const value = values[index];
    if (value === undefined) {
      throw new RangeError(`Ranking index ${index} is out of range for ${values.length} values`);
    }
    return value;
  });
}

// Новая запись, в которой все параллельные поля переставлены одинаково.
export function applyRanking(record: NBestRecord, ranking: readonly number[]): NBestRecord {
  const parallel = Object.fromEntries(
    Object.entries(record.parallel).map(([key, values]): [string, unknown[]] => [key, permute(values, ranking)]),
  );

  const reranked: NBestRecord = {
    translations: permute(record.translations, ranking),
    parallel,
    passthrough: { ...record.passthrough },
  };
  if (record.scores !== undefined) {
    reranked.scores = permute(record.scores, ranking);
  }
  if (record.text !== undefined) {
    reranked.text = record.text;
  }
  return reranked;
}
