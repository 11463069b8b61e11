// Команда nbest-rerank rerank — переранжирование n-best списка по метрике.
import { Command, InvalidArgumentError } from 'commander';
import { access } from 'node:fs/promises';
import { loadConfig } from '../config/index.js';
import type { Config } from '../config/index.js';
import { Reranker, ConsoleEvents, SilentEvents } from '../rerank/index.js';
import type { BlankFallbackPolicy, RerankEvents } from '../rerank/index.js';
import { rerankFiles } from '../runner/index.js';

// Параметры команды rerank.
export interface RerankOptions {
  reference: string;
  hypotheses: string;
  output?: string;
  metric?: string;
  isometricAlpha?: number;
  returnScore?: boolean;
  outputBest?: boolean;
  outputReferenceInsteadOfBlank?: boolean;
  outputBestNonBlank?: boolean;
  quiet?: boolean;
  config?: string;
}

// Итоговые настройки: флаги командной строки перекрывают конфиг.
export interface RerankSettings {
  metric: string;
  isometricAlpha: number;
  returnScore: boolean;
  outputBest: boolean;
  fallback: BlankFallbackPolicy;
  quiet: boolean;
}

export function resolveSettings(config: Config, options: RerankOptions): RerankSettings {
  return {
    metric: options.metric ?? config.rerank.metric,
    isometricAlpha: options.isometricAlpha ?? config.rerank.isometricAlpha,
    returnScore: options.returnScore ?? config.rerank.returnScore,
    outputBest: options.outputBest ?? config.output.best,
    fallback: {
      referenceInsteadOfBlank: options.outputReferenceInsteadOfBlank ?? config.output.referenceInsteadOfBlank,
      bestNonBlank: options.outputBestNonBlank ?? config.output.bestNonBlank,
    },
    quiet: options.quiet ?? config.logging.quiet,
  };
}

// Парсер --isometric-alpha.
export function parseAlpha(value: string): number {
  const alpha = Number(value);
  if (value.trim() === '' || !Number.isFinite(alpha)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return alpha;
}

export const rerankCommand = new Command('rerank')
  .description(
    'Rerank nbest lists of translations. Reranking sorts a list of hypotheses according'
    + ' to their score compared to a common reference or source sentence.',
  )
  .requiredOption('-r, --reference <file>', 'File with references, one per line')
  .requiredOption('--hypotheses <file>', 'File with nbest translations, one JSON object per line')
  .option('-o, --output <file>', 'Output file (default: stdout)')
  .option('-m, --metric <name>', 'Sentence-level metric used for reranking (default: bleu)')
  .option('--isometric-alpha <number>', 'Weight of the length term for isometric metrics (default: 0.5)', parseAlpha)
  .option('--return-score', 'Attach reranking scores to the output records')
  .option('--output-best', 'Output only the best hypothesis of each nbest list')
  .option('--output-reference-instead-of-blank', 'Output the reference when the best hypothesis is blank')
  .option('--output-best-non-blank', 'Output the first non-blank hypothesis when the best one is blank')
  .option('-q, --quiet', 'Do not log informational events')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: RerankOptions) => {
    try {
      // Проверяем существование входных файлов.
      for (const file of [options.reference, options.hypotheses]) {
        try {
          await access(file);
        } catch {
          console.error(`Файл не найден: ${file}`);
          process.exit(1);
        }
      }

      const config = await loadConfig(options.config);
      const settings = resolveSettings(config, options);
      const events: RerankEvents = settings.quiet ? new SilentEvents() : new ConsoleEvents();

      const reranker = new Reranker({
        metric: settings.metric,
        isometricAlpha: settings.isometricAlpha,
        returnScore: settings.returnScore,
        events,
      });

      await rerankFiles({
        reference: options.reference,
        hypotheses: options.hypotheses,
        output: options.output,
        outputBest: settings.outputBest,
        fallback: settings.fallback,
        reranker,
        events,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Ошибка реранкинга: ${message}`);
      process.exit(1);
    }
  });
