import { describe, it, expect } from 'vitest';
import { decodeRecord, encodeRecord, parseRecordLine, serializeRecord } from '../record.js';
import { RecordSchemaError } from '../../errors.js';
import { applyRanking } from '../../rerank/ranking.js';

describe('decodeRecord', () => {
  it('раскладывает дополнительные поля по ролям', () => {
    const record = decodeRecord({
      translations: ['a', 'b'],
      scores: [[1.5], [2.5]],
      text: 'source',
      tokens: [['a'], ['b']],
      sentence_id: 7,
      alignment: [1, 2, 3],
    });

    expect(record.translations).toEqual(['a', 'b']);
    expect(record.scores).toEqual([[1.5], [2.5]]);
    expect(record.text).toBe('source');
    expect(record.parallel).toEqual({ tokens: [['a'], ['b']] });
    expect(record.passthrough).toEqual({ sentence_id: 7, alignment: [1, 2, 3] });
  });

  it('не добавляет отсутствующие необязательные поля', () => {
    const record = decodeRecord({ translations: ['only'] });

    expect(record).toEqual({ translations: ['only'], parallel: {}, passthrough: {} });
    expect('scores' in record).toBe(false);
    expect('text' in record).toBe(false);
  });

  it('выбрасывает RecordSchemaError без translations', () => {
    expect(() => decodeRecord({ text: 'x' })).toThrow(RecordSchemaError);
    expect(() => decodeRecord({ text: 'x' })).toThrow(
      "Reranking requires nbest JSON input with 'translations' key present",
    );
  });

  it('выбрасывает RecordSchemaError при несовпадении длины scores', () => {
    expect(() => decodeRecord({ translations: ['a', 'b'], scores: [[1]] })).toThrow(
      "Field 'scores' has 1 entries, expected one per translation (2)",
    );
  });
});

describe('parseRecordLine', () => {
  it('добавляет номер строки к ошибке схемы', () => {
    expect(() => parseRecordLine('{"scores": []}', 4)).toThrow(/^Line 4: Reranking requires/);
  });

  it('сохраняет поле __proto__ как обычное поле записи', () => {
    const record = parseRecordLine('{"translations":["a","b"],"__proto__":{"x":1}}', 1);

    expect(Object.keys(record.passthrough)).toEqual(['__proto__']);
    expect(serializeRecord(encodeRecord(record))).toBe('{"__proto__":{"x":1},"translations":["a","b"]}');
  });

  it('переносит параллельное поле __proto__ при перестановке', () => {
    const record = parseRecordLine('{"translations":["a","b"],"__proto__":["p","q"]}', 1);

    expect(Object.keys(record.parallel)).toEqual(['__proto__']);
    expect(serializeRecord(encodeRecord(applyRanking(record, [1, 0])))).toBe(
      '{"__proto__":["q","p"],"translations":["b","a"]}',
    );
  });

  it('выбрасывает ошибку для невалидного JSON', () => {
    expect(() => parseRecordLine('{not json', 2)).toThrow('Line 2: invalid JSON in nbest input');
  });

  it('отклоняет JSON, не являющийся объектом', () => {
    expect(() => parseRecordLine('[1, 2]', 3)).toThrow('Line 3: nbest input must be a JSON object');
  });
});

describe('encodeRecord / serializeRecord', () => {
  it('сериализует запись с отсортированными ключами', () => {
    const record = decodeRecord({ translations: ['x', 'y'], sentence_id: 1, scores: [[2], [1]] });

    expect(serializeRecord(encodeRecord(record))).toBe(
      '{"scores":[[2],[1]],"sentence_id":1,"translations":["x","y"]}',
    );
  });

  it('заменяет scores оценками реранкинга и добавляет score', () => {
    const record = decodeRecord({ translations: ['x', 'y'], scores: [[2], [1]] });
    const encoded = encodeRecord(record, { scores: [40, 10], bestScore: 40 });

    expect(encoded).toEqual({ translations: ['x', 'y'], scores: [40, 10], score: 40 });
  });

  it('сортирует ключи вложенных объектов', () => {
    expect(serializeRecord({ b: { d: 1, c: 2 }, a: [{ z: 1, y: 2 }] })).toBe(
      '{"a":[{"y":2,"z":1}],"b":{"c":2,"d":1}}',
    );
  });
});
