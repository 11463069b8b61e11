// Barrel-файл модуля обработки файлов.
export type { RerankFilesOptions } from './runner.js';
export { rerankFiles } from './runner.js';
export { readLines, zipLines, LineWriter } from './io.js';
