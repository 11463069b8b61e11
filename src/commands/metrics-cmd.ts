// Команда nbest-rerank metrics — список поддерживаемых метрик.
import { Command } from 'commander';
import { METRIC_NAMES, resolveMetric } from '../rerank/index.js';

// Строки таблицы метрик: идентификатор, семейство, направление.
export function formatMetricTable(): string[] {
  return METRIC_NAMES.map((name) => {
    const metric = resolveMetric(name);
    return `${name.padEnd(16)} ${metric.family.padEnd(18)} ${metric.direction}`;
  });
}

export const metricsCommand = new Command('metrics')
  .description('List supported reranking metrics')
  .action(() => {
    for (const line of formatMetricTable()) {
      console.log(line);
    }
  });
