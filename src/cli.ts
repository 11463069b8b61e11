#!/usr/bin/env node

// Точка входа CLI.
import { Command } from 'commander';
import { rerankCommand } from './commands/rerank-cmd.js';
import { metricsCommand } from './commands/metrics-cmd.js';

const program = new Command()
  .name('nbest-rerank')
  .description('Rerank n-best lists of translations by a sentence-level metric')
  .version('0.1.0');

program.addCommand(rerankCommand);
program.addCommand(metricsCommand);

program.parseAsync().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Ошибка: ${message}`);
  process.exit(1);
});
