import { z } from 'zod';

// Схема параметров реранкинга.
// Метрика проверяется при создании Reranker: там же формируется список допустимых значений.
export const RerankConfigSchema = z.object({
  metric: z.string().default('bleu'),
  isometricAlpha: z.number().min(0).max(1).default(0.5),
  returnScore: z.boolean().default(false),
});

// Схема параметров вывода.
export const OutputConfigSchema = z.object({
  // Выводить только лучшую гипотезу.
  best: z.boolean().default(false),
  // Подставлять референс вместо пустой лучшей гипотезы.
  referenceInsteadOfBlank: z.boolean().default(false),
  // Брать первую непустую гипотезу, если лучшая пустая.
  bestNonBlank: z.boolean().default(false),
});

// Схема параметров логирования.
export const LoggingConfigSchema = z.object({
  quiet: z.boolean().default(false),
});

// Корневая схема конфигурации.
export const ConfigSchema = z.object({
  rerank: RerankConfigSchema.default(() => ({
    metric: 'bleu',
    isometricAlpha: 0.5,
    returnScore: false,
  })),
  output: OutputConfigSchema.default(() => ({
    best: false,
    referenceInsteadOfBlank: false,
    bestNonBlank: false,
  })),
  logging: LoggingConfigSchema.default(() => ({
    quiet: false,
  })),
});

// Типы, выведенные из схем.
export type RerankConfig = z.infer<typeof RerankConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;
