// Sentence BLEU со сглаживанием add-k.
import { tokenize13a } from './tokenizer.js';

// Максимальный порядок n-грамм.
const MAX_NGRAM_ORDER = 4;

// Константа add-k сглаживания для порядков 2..4.
const SMOOTH_VALUE = 1;

// Логарифм нулевой точности: обнуляет итоговую оценку.
const LOG_ZERO = -9999999999;

// Подсчёт n-грамм порядков 1..maxOrder.
function ngramCounts(tokens: readonly string[], maxOrder: number): Map<string, number> {
  const counts = new Map<string, number>();
  for (let n = 1; n <= maxOrder; n++) {
    for (let i = 0; i + n <= tokens.length; i++) {
      const gram = tokens.slice(i, i + n).join(' ');
      counts.set(gram, (counts.get(gram) ?? 0) + 1);
    }
  }
  return counts;
}

// Длина ближайшего по длине референса (при равенстве — более короткого).
function closestReferenceLength(hypothesisLength: number, referenceLengths: readonly number[]): number {
  let closest = referenceLengths[0] ?? 0;
  for (const length of referenceLengths) {
    const diff = Math.abs(length - hypothesisLength);
    const bestDiff = Math.abs(closest - hypothesisLength);
    if (diff < bestDiff || (diff === bestDiff && length < closest)) {
      closest = length;
    }
  }
  return closest;
}

/**
 * Предложенческий BLEU по шкале 0..100.
 * Счётчики n-грамм гипотезы обрезаются по максимуму среди референсов,
 * усреднение идёт по эффективному порядку.
 */
export function sentenceBleu(hypothesis: string, references: readonly string[]): number {
  const hypTokens = tokenize13a(hypothesis);
  const refTokens = references.map((reference) => tokenize13a(reference));

  // Максимальные счётчики n-грамм по всем референсам.
  const maxRefCounts = new Map<string, number>();
  for (const tokens of refTokens) {
    for (const [gram, count] of ngramCounts(tokens, MAX_NGRAM_ORDER)) {
      maxRefCounts.set(gram, Math.max(maxRefCounts.get(gram) ?? 0, count));
    }
  }

  const correct = new Array<number>(MAX_NGRAM_ORDER).fill(0);
  const total = new Array<number>(MAX_NGRAM_ORDER).fill(0);

  for (const [gram, count] of ngramCounts(hypTokens, MAX_NGRAM_ORDER)) {
    const order = gram.split(' ').length - 1;
    correct[order] = (correct[order] ?? 0) + Math.min(count, maxRefCounts.get(gram) ?? 0);
  }
  for (let n = 1; n <= MAX_NGRAM_ORDER; n++) {
    total[n - 1] = Math.max(hypTokens.length - n + 1, 0);
  }

  const precisions = new Array<number>(MAX_NGRAM_ORDER).fill(0);
  let effectiveOrder = MAX_NGRAM_ORDER;

  for (let n = 1; n <= MAX_NGRAM_ORDER; n++) {
    let nCorrect = correct[n - 1] ?? 0;
    let nTotal = total[n - 1] ?? 0;
    if (n > 1) {
      nCorrect += SMOOTH_VALUE;
      nTotal += SMOOTH_VALUE;
    }
    if (nTotal === 0) {
      break;
    }
    effectiveOrder = n;
    if (nCorrect > 0) {
      precisions[n - 1] = (100 * nCorrect) / nTotal;
    }
  }

  const hypLength = hypTokens.length;
  const refLength = closestReferenceLength(hypLength, refTokens.map((tokens) => tokens.length));

  let brevityPenalty = 1;
  if (hypLength < refLength) {
    brevityPenalty = hypLength > 0 ? Math.exp(1 - refLength / hypLength) : 0;
  }

  let logSum = 0;
  for (const precision of precisions.slice(0, effectiveOrder)) {
    logSum += precision > 0 ? Math.log(precision) : LOG_ZERO;
  }

  return brevityPenalty * Math.exp(logSum / effectiveOrder);
}
