// Выбор лучшей гипотезы для вывода с политикой замены пустых строк.
import type { RankingResult } from './reranker.js';
import type { RerankContext, RerankEvents } from './events.js';

// Политика замены пустой лучшей гипотезы.
export interface BlankFallbackPolicy {
  // Подставлять референс вместо пустой гипотезы.
  referenceInsteadOfBlank: boolean;
  // Брать первую непустую гипотезу в порядке ранжирования.
  bestNonBlank: boolean;
}

export function selectBest(
  result: RankingResult,
  reference: string,
  policy: BlankFallbackPolicy,
  events: RerankEvents,
  context: RerankContext = {},
): string {
  const { translations } = result.record;
  let best = translations[0] ?? '';

  if (best === '' && policy.referenceInsteadOfBlank) {
    events.onBlankReplacedByReference(context);
    best = reference;
  }

  if (best === '' && policy.bestNonBlank && translations.length > 1) {
    const index = translations.findIndex((hypothesis) => hypothesis !== '');
    const hypothesis = translations[index];
    if (hypothesis !== undefined) {
      events.onBlankReplacedByHypothesis(index, hypothesis, context);
      best = hypothesis;
    }
  }

  return best;
}
