import type { Config } from './schema.js';

// Значения по умолчанию, поверх которых сливается пользовательский конфиг.
export const defaultConfig: Config = {
  rerank: {
    metric: 'bleu',
    isometricAlpha: 0.5,
    returnScore: false,
  },
  output: {
    best: false,
    referenceInsteadOfBlank: false,
    bestNonBlank: false,
  },
  logging: {
    quiet: false,
  },
};
