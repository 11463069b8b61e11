// Sentence chrF: F-мера по символьным n-граммам.

// Максимальный порядок символьных n-грамм.
const CHAR_ORDER = 6;

// Вес полноты относительно точности.
const BETA = 2;

// Символьные n-граммы заданного порядка без учёта пробелов.
function charNgrams(chars: readonly string[], n: number): Map<string, number> {
  const counts = new Map<string, number>();
  for (let i = 0; i + n <= chars.length; i++) {
    const gram = chars.slice(i, i + n).join('');
    counts.set(gram, (counts.get(gram) ?? 0) + 1);
  }
  return counts;
}

function removeWhitespace(text: string): string[] {
  return [...text.replace(/\s+/g, '')];
}

// chrF гипотезы относительно одного референса.
function chrfAgainst(hypChars: readonly string[], refChars: readonly string[]): number {
  let precisionSum = 0;
  let recallSum = 0;
  let effectiveOrder = 0;

  for (let n = 1; n <= CHAR_ORDER; n++) {
    const hypGrams = charNgrams(hypChars, n);
    const refGrams = charNgrams(refChars, n);
    const hypCount = Math.max(hypChars.length - n + 1, 0);
    const refCount = Math.max(refChars.length - n + 1, 0);

    if (hypCount === 0 || refCount === 0) {
      continue;
    }

    let matches = 0;
    for (const [gram, count] of hypGrams) {
      matches += Math.min(count, refGrams.get(gram) ?? 0);
    }

    precisionSum += matches / hypCount;
    recallSum += matches / refCount;
    effectiveOrder++;
  }

  if (effectiveOrder === 0) {
    return 0;
  }

  const precision = precisionSum / effectiveOrder;
  const recall = recallSum / effectiveOrder;
  if (precision + recall === 0) {
    return 0;
  }

  const factor = BETA * BETA;
  return (100 * (1 + factor) * precision * recall) / (factor * precision + recall);
}

// Предложенческий chrF по шкале 0..100: лучший результат среди референсов.
export function sentenceChrf(hypothesis: string, references: readonly string[]): number {
  const hypChars = removeWhitespace(hypothesis);
  let best = 0;
  for (const reference of references) {
    best = Math.max(best, chrfAgainst(hypChars, removeWhitespace(reference)));
  }
  return best;
}
