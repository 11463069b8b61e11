// Наблюдаемые события реранкинга.

// Контекст вызова: номер строки во входных файлах (1-based).
export interface RerankContext {
  line?: number;
}

// Итог обработки пары файлов.
export interface RerankSummary {
  lines: number;
  reranked: number;
  skipped: number;
  duration: number;
}

// Интерфейс приёмника событий.
export interface RerankEvents {
  onStart(metric: string): void;
  onNothingToRerank(count: number, context: RerankContext): void;
  onBlankReplacedByReference(context: RerankContext): void;
  onBlankReplacedByHypothesis(index: number, hypothesis: string, context: RerankContext): void;
  onComplete(summary: RerankSummary): void;
}

function linePrefix(context: RerankContext): string {
  return context.line === undefined ? '' : `Строка ${context.line}: `;
}

// Вывод событий в stderr: stdout может быть занят результатом.
export class ConsoleEvents implements RerankEvents {
  onStart(metric: string): void {
    console.error(`Реранкинг гипотез по метрике: '${metric}'`);
  }

  onNothingToRerank(count: number, context: RerankContext): void {
    console.error(`${linePrefix(context)}гипотез: ${count}, переранжировать нечего.`);
  }

  onBlankReplacedByReference(context: RerankContext): void {
    console.error(`${linePrefix(context)}пустая гипотеза заменена референсом.`);
  }

  onBlankReplacedByHypothesis(index: number, hypothesis: string, context: RerankContext): void {
    console.error(
      `${linePrefix(context)}пустая гипотеза заменена непустой гипотезой [${index}]: ${hypothesis}`,
    );
  }

  onComplete(summary: RerankSummary): void {
    const seconds = (summary.duration / 1000).toFixed(1);
    console.error(
      `Готово: ${summary.lines} строк, ${summary.reranked} переранжировано, ${summary.skipped} пропущено за ${seconds}с`,
    );
  }
}

// Приёмник, игнорирующий все события.
export class SilentEvents implements RerankEvents {
  onStart(): void {}
  onNothingToRerank(): void {}
  onBlankReplacedByReference(): void {}
  onBlankReplacedByHypothesis(): void {}
  onComplete(): void {}
}
