// Barrel-файл модуля оценки.
export type { ScoreProvider, IsometricVariant } from './types.js';
export { SentenceScoreProvider } from './provider.js';
export { sentenceBleu } from './bleu.js';
export { sentenceChrf } from './chrf.js';
export { isometricScore, lengthRatio, lengthDeviation } from './isometric.js';
export { tokenize13a } from './tokenizer.js';
