// Публичный API библиотеки.
export * from './errors.js';
export * from './nbest/index.js';
export * from './scoring/index.js';
export * from './rerank/index.js';
export * from './runner/index.js';
export * from './config/index.js';
