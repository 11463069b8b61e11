// Метрики реранкинга: идентификаторы, семейства и направление ранжирования.
import { ConfigurationError } from '../errors.js';
import type { IsometricVariant } from '../scoring/types.js';

// Все допустимые идентификаторы метрик.
export const METRIC_NAMES = [
  'bleu',
  'chrf',
  'isometric-ratio',
  'isometric-diff',
  'isometric-lc',
] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

// Общий префикс изометрических метрик.
export const ISOMETRIC_PREFIX = 'isometric';

// Вес длинового члена по умолчанию.
export const DEFAULT_ISOMETRIC_ALPHA = 0.5;

export type RankingDirection = 'ascending' | 'descending';

// Метрики сходства с референсом: больше — лучше.
export interface ReferenceOverlapMetric {
  readonly family: 'reference-overlap';
  readonly name: 'bleu' | 'chrf';
  readonly direction: 'descending';
}

// Изометрические метрики: isometric-lc ранжируется по возрастанию.
export interface IsometricMetric {
  readonly family: 'isometric';
  readonly name: IsometricVariant;
  readonly direction: RankingDirection;
  readonly alpha: number;
}

export type MetricSpec = ReferenceOverlapMetric | IsometricMetric;

export function isMetricName(name: string): name is MetricName {
  return METRIC_NAMES.some((metric) => metric === name);
}

function isIsometricVariant(name: MetricName): name is IsometricVariant {
  return name.startsWith(ISOMETRIC_PREFIX);
}

/**
 * Строит неизменяемое описание метрики.
 * Неизвестный идентификатор — ConfigurationError со списком допустимых значений.
 */
export function resolveMetric(name: string, alpha: number = DEFAULT_ISOMETRIC_ALPHA): MetricSpec {
  if (!isMetricName(name)) {
    throw new ConfigurationError(
      `Scoring metric '${name}' unknown. Choices are: ${METRIC_NAMES.join(', ')}`,
    );
  }

  if (!isIsometricVariant(name)) {
    const spec: ReferenceOverlapMetric = { family: 'reference-overlap', name, direction: 'descending' };
    return Object.freeze(spec);
  }

  if (!Number.isFinite(alpha) || alpha < 0 || alpha > 1) {
    throw new ConfigurationError(`Isometric alpha must be within [0, 1], got ${alpha}`);
  }

  const spec: IsometricMetric = {
    family: 'isometric',
    name,
    direction: name === 'isometric-lc' ? 'ascending' : 'descending',
    alpha,
  };
  return Object.freeze(spec);
}
