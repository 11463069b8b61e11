// Изометрические оценки: смесь модельной оценки и соответствия длины гипотезы исходнику.
import type { IsometricVariant } from './types.js';

// Длина строки в кодовых точках Unicode.
function charLength(text: string): number {
  return [...text].length;
}

// Отношение меньшей длины к большей: 1 при совпадении длин.
export function lengthRatio(hypothesis: string, source: string): number {
  const hypLength = charLength(hypothesis);
  const srcLength = charLength(source);
  const longest = Math.max(hypLength, srcLength);
  if (longest === 0) {
    return 1;
  }
  return Math.min(hypLength, srcLength) / longest;
}

// Относительное отклонение длины гипотезы от длины исходника.
export function lengthDeviation(hypothesis: string, source: string): number {
  const hypLength = charLength(hypothesis);
  const srcLength = charLength(source);
  return Math.abs(hypLength - srcLength) / Math.max(srcLength, 1);
}

/**
 * Изометрическая оценка гипотезы.
 * Для isometric-lc это стоимость (меньше — лучше), для остальных вариантов — награда.
 */
export function isometricScore(
  hypothesis: string,
  modelScore: number,
  source: string,
  variant: IsometricVariant,
  alpha: number,
): number {
  switch (variant) {
  case 'isometric-ratio':
    return alpha * lengthRatio(hypothesis, source) + (1 - alpha) * modelScore;
  case 'isometric-diff':
    return alpha * (1 - lengthDeviation(hypothesis, source)) + (1 - alpha) * modelScore;
  case 'isometric-lc':
    return alpha * lengthDeviation(hypothesis, source) + (1 - alpha) * modelScore;
  }
}
