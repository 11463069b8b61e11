// Обработка пары файлов: референсы и n-best гипотезы, по строке на предложение.
import { parseRecordLine, encodeRecord, serializeRecord } from '../nbest/record.js';
import type { Reranker } from '../rerank/reranker.js';
import { selectBest } from '../rerank/best.js';
import type { BlankFallbackPolicy } from '../rerank/best.js';
import type { RerankEvents, RerankSummary } from '../rerank/events.js';
import { LineWriter, zipLines } from './io.js';

// Параметры обработки.
export interface RerankFilesOptions {
  reference: string;
  hypotheses: string;
  // Файл результата; без него — stdout.
  output?: string;
  // Выводить только лучшую гипотезу вместо всей записи.
  outputBest: boolean;
  fallback: BlankFallbackPolicy;
  reranker: Reranker;
  events: RerankEvents;
}

/**
 * Переранжирует n-best список построчно.
 * Ошибка схемы в любой строке прерывает обработку: пропуск строки рассинхронизировал бы вывод.
 */
export async function rerankFiles(options: RerankFilesOptions): Promise<RerankSummary> {
  const { reranker, events } = options;
  const startTime = Date.now();
  const writer = new LineWriter(options.output);

  events.onStart(reranker.metric.name);

  let lines = 0;
  let reranked = 0;

  try {
    for await (const [referenceLine, hypothesisLine] of zipLines(options.reference, options.hypotheses)) {
      lines++;
      const context = { line: lines };
      const reference = referenceLine.trim();
      const record = parseRecordLine(hypothesisLine.trim(), lines);

      const result = reranker.rerank(record, reference, context);
      if (record.translations.length > 1) {
        reranked++;
      }

      if (options.outputBest) {
        await writer.writeLine(selectBest(result, reference, options.fallback, events, context));
      } else {
        await writer.writeLine(serializeRecord(encodeRecord(result.record, result.attached)));
      }
    }
  } finally {
    await writer.close();
  }

  const summary: RerankSummary = {
    lines,
    reranked,
    skipped: lines - reranked,
    duration: Date.now() - startTime,
  };
  events.onComplete(summary);
  return summary;
}
