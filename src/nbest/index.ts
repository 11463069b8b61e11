// Barrel-файл модуля n-best записей.
export type { NBestRecord, AttachedScores } from './types.js';
export { decodeRecord, parseRecordLine, encodeRecord, serializeRecord } from './record.js';
