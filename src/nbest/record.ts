// Декодирование и кодирование n-best записей (одна JSON-строка на предложение).
import { z } from 'zod';
import { RecordSchemaError } from '../errors.js';
import type { AttachedScores, NBestRecord } from './types.js';

// Zod-схема известных полей записи; остальные поля пропускаются как есть.
const NBestRecordSchema = z
  .object({
    translations: z.array(z.string()),
    scores: z.array(z.array(z.number())).optional(),
    text: z.string().optional(),
  })
  .passthrough();

const KNOWN_FIELDS = new Set(['translations', 'scores', 'text']);

// Форматирует первую ошибку zod в сообщение вида "translations: Required".
function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return 'invalid record';
  }
  const path = issue.path.length > 0 ? issue.path.join('.') : 'record';
  return `${path}: ${issue.message}`;
}

/**
 * Проверяет запись и раскладывает дополнительные поля по ролям:
 * массивы длины N — параллельные гипотезам, всё остальное — passthrough.
 */
export function decodeRecord(value: unknown): NBestRecord {
  const result = NBestRecordSchema.safeParse(value);
  if (!result.success) {
    throw new RecordSchemaError(
      `Reranking requires nbest JSON input with 'translations' key present (${describeIssue(result.error)})`,
    );
  }

  const { translations, scores, text } = result.data;
  const size = translations.length;

  if (scores !== undefined && scores.length !== size) {
    throw new RecordSchemaError(
      `Field 'scores' has ${scores.length} entries, expected one per translation (${size})`,
    );
  }

  // Дополнительные поля берутся из исходного объекта: zod теряет собственный ключ __proto__.
  const parallelEntries: Array<[string, unknown[]]> = [];
  const passthroughEntries: Array<[string, unknown]> = [];

  for (const [key, field] of Object.entries(value ?? {})) {
    if (KNOWN_FIELDS.has(key)) {
      continue;
    }
    if (Array.isArray(field) && field.length === size) {
      parallelEntries.push([key, field]);
    } else {
      passthroughEntries.push([key, field]);
    }
  }

  // fromEntries создаёт собственные свойства, присваивание по ключу __proto__ сменило бы прототип.
  const record: NBestRecord = {
    translations,
    parallel: Object.fromEntries(parallelEntries),
    passthrough: Object.fromEntries(passthroughEntries),
  };
  if (scores !== undefined) {
    record.scores = scores;
  }
  if (text !== undefined) {
    record.text = text;
  }
  return record;
}

// Разбирает одну строку входного n-best файла.
export function parseRecordLine(line: string, lineNumber: number): NBestRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    throw new RecordSchemaError(`Line ${lineNumber}: invalid JSON in nbest input`);
  }

  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new RecordSchemaError(`Line ${lineNumber}: nbest input must be a JSON object`);
  }

  try {
    return decodeRecord(parsed);
  } catch (error) {
    if (error instanceof RecordSchemaError) {
      throw new RecordSchemaError(`Line ${lineNumber}: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Собирает plain-объект из записи.
 * Прикреплённые оценки пишутся в `scores` (в порядке ранжирования) и `score` (лучшая).
 */
export function encodeRecord(record: NBestRecord, attached?: AttachedScores): Record<string, unknown> {
  const encoded: Record<string, unknown> = {
    ...record.passthrough,
    ...record.parallel,
    translations: record.translations,
  };

  if (record.scores !== undefined) {
    encoded['scores'] = record.scores;
  }
  if (record.text !== undefined) {
    encoded['text'] = record.text;
  }
  if (attached) {
    encoded['scores'] = attached.scores;
    encoded['score'] = attached.bestScore;
  }

  return encoded;
}

// Рекурсивно сортирует ключи объектов для детерминированного вывода.
function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => sortKeys(item));
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return Object.fromEntries(entries.map(([key, item]): [string, unknown] => [key, sortKeys(item)]));
  }
  return value;
}

// JSON с отсортированными ключами.
export function serializeRecord(encoded: Record<string, unknown>): string {
  return JSON.stringify(sortKeys(encoded));
}
