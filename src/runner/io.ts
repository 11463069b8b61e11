// Построчное чтение входных файлов и запись результата.
import { createReadStream, createWriteStream } from 'node:fs';
import { createInterface } from 'node:readline';
import { createGunzip } from 'node:zlib';
import { once } from 'node:events';
import { finished } from 'node:stream/promises';
import type { Readable, Writable } from 'node:stream';

// pipe не передаёт ошибки источника в gunzip, поэтому они пробрасываются вручную.
function gunzip(file: Readable): Readable {
  const unzipped = createGunzip();
  file.on('error', (error: Error) => unzipped.destroy(error));
  return file.pipe(unzipped);
}

// Построчный итератор по файлу без символов перевода строки; .gz распаковывается.
export async function* readLines(path: string): AsyncGenerator<string> {
  const file = createReadStream(path);
  const input: Readable = path.endsWith('.gz') ? gunzip(file) : file;
  const lines = createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const line of lines) {
      yield line;
    }
  } finally {
    lines.close();
    input.destroy();
    file.destroy();
  }
}

// Пары строк двух файлов; останавливается на более коротком.
export async function* zipLines(
  leftPath: string,
  rightPath: string,
): AsyncGenerator<[string, string]> {
  const left = readLines(leftPath);
  const right = readLines(rightPath);
  try {
    while (true) {
      const [a, b] = await Promise.all([left.next(), right.next()]);
      if (a.done || b.done) {
        return;
      }
      yield [a.value, b.value];
    }
  } finally {
    await Promise.all([left.return(undefined), right.return(undefined)]);
  }
}

// Приёмник выходных строк: файл или stdout.
export class LineWriter {
  private readonly stream: Writable;
  private readonly ownsStream: boolean;
  private failure: Error | undefined;

  constructor(path?: string) {
    this.stream = path ? createWriteStream(path, { encoding: 'utf-8' }) : process.stdout;
    this.ownsStream = Boolean(path);
    // Ошибка открытия или записи файла всплывает при следующей записи.
    this.stream.on('error', (error: Error) => {
      this.failure = error;
    });
  }

  async writeLine(line: string): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    if (!this.stream.write(`${line}\n`)) {
      await once(this.stream, 'drain');
    }
  }

  // Закрывает файл; stdout остаётся открытым.
  async close(): Promise<void> {
    if (!this.ownsStream) {
      return;
    }
    this.stream.end();
    await finished(this.stream);
    if (this.failure) {
      throw this.failure;
    }
  }
}
