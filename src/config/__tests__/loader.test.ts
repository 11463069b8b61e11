import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile, mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { stringify as stringifyYaml } from 'yaml';
import { loadConfig, resolveEnvVars, deepMerge } from '../loader.js';
import { ConfigSchema } from '../schema.js';

// Временная директория для тестовых конфигов.
const TEST_DIR = join(tmpdir(), 'nbest-rerank-config-test');

beforeEach(async () => {
  await mkdir(TEST_DIR, { recursive: true });
});

afterEach(async () => {
  await rm(TEST_DIR, { recursive: true, force: true });
});

// --- resolveEnvVars ---

describe('resolveEnvVars', () => {
  it('заменяет ${ENV_VAR} на значение из process.env', () => {
    process.env['TEST_RERANK_METRIC'] = 'chrf';
    expect(resolveEnvVars('metric=${TEST_RERANK_METRIC}')).toBe('metric=chrf');
    delete process.env['TEST_RERANK_METRIC'];
  });

  it('оставляет ${ENV_VAR} как есть, если переменная не найдена', () => {
    delete process.env['NONEXISTENT_VAR'];
    expect(resolveEnvVars('${NONEXISTENT_VAR}')).toBe('${NONEXISTENT_VAR}');
  });

  it('обрабатывает вложенные объекты и массивы', () => {
    process.env['TEST_METRIC'] = 'isometric-lc';

    const result = resolveEnvVars({ rerank: { metric: '${TEST_METRIC}' }, list: ['${TEST_METRIC}', 'plain'] });

    expect(result).toEqual({ rerank: { metric: 'isometric-lc' }, list: ['isometric-lc', 'plain'] });
    delete process.env['TEST_METRIC'];
  });

  it('не изменяет числа, boolean и null', () => {
    expect(resolveEnvVars(42)).toBe(42);
    expect(resolveEnvVars(true)).toBe(true);
    expect(resolveEnvVars(null)).toBe(null);
  });
});

// --- deepMerge ---

describe('deepMerge', () => {
  it('рекурсивно сливает объекты', () => {
    const result = deepMerge({ a: { b: 1, c: 2 }, d: 3 }, { a: { b: 10 }, e: 5 });

    expect(result).toEqual({ a: { b: 10, c: 2 }, d: 3, e: 5 });
  });

  it('массивы из source полностью заменяют массивы в target', () => {
    expect(deepMerge({ items: [1, 2, 3] }, { items: [4, 5] })).toEqual({ items: [4, 5] });
  });

  it('не мутирует исходные объекты', () => {
    const target = { a: { b: 1 } };

    deepMerge(target, { a: { c: 2 } });

    expect(target).toEqual({ a: { b: 1 } });
  });
});

// --- ConfigSchema ---

describe('ConfigSchema', () => {
  it('парсит пустой объект с дефолтными значениями', () => {
    const config = ConfigSchema.parse({});

    expect(config.rerank).toEqual({ metric: 'bleu', isometricAlpha: 0.5, returnScore: false });
    expect(config.output).toEqual({ best: false, referenceInsteadOfBlank: false, bestNonBlank: false });
    expect(config.logging.quiet).toBe(false);
  });

  it('выбрасывает ошибку при alpha вне [0, 1]', () => {
    expect(() => ConfigSchema.parse({ rerank: { isometricAlpha: 2 } })).toThrow();
  });
});

// --- loadConfig ---

describe('loadConfig', () => {
  it('загружает валидный YAML-конфиг', async () => {
    const configPath = join(TEST_DIR, 'rerank.config.yaml');
    await writeFile(configPath, stringifyYaml({
      rerank: { metric: 'isometric-lc', isometricAlpha: 0.3, returnScore: true },
      output: { best: true, bestNonBlank: true },
    }));

    const config = await loadConfig(configPath);

    expect(config.rerank).toEqual({ metric: 'isometric-lc', isometricAlpha: 0.3, returnScore: true });
    expect(config.output).toEqual({ best: true, referenceInsteadOfBlank: false, bestNonBlank: true });
  });

  it('подставляет переменные окружения из YAML', async () => {
    process.env['RERANK_TEST_METRIC'] = 'chrf';
    const configPath = join(TEST_DIR, 'env-config.yaml');
    await writeFile(configPath, stringifyYaml({ rerank: { metric: '${RERANK_TEST_METRIC}' } }));

    const config = await loadConfig(configPath);

    expect(config.rerank.metric).toBe('chrf');
    delete process.env['RERANK_TEST_METRIC'];
  });

  it('возвращает дефолты для пустого файла', async () => {
    const configPath = join(TEST_DIR, 'empty.yaml');
    await writeFile(configPath, '');

    const config = await loadConfig(configPath);

    expect(config.rerank.metric).toBe('bleu');
    expect(config.output.best).toBe(false);
  });

  it('выбрасывает ошибку, если явный configPath не найден', async () => {
    await expect(loadConfig(join(TEST_DIR, 'nonexistent.yaml')))
      .rejects.toThrow('Config file not found at path:');
  });

  it('выбрасывает ошибку при невалидном конфиге', async () => {
    const configPath = join(TEST_DIR, 'invalid-config.yaml');
    await writeFile(configPath, stringifyYaml({ output: { best: 'yes' } }));

    await expect(loadConfig(configPath)).rejects.toThrow();
  });
});

// --- RERANK_CONFIG env var ---

describe('RERANK_CONFIG env var', () => {
  const originalEnv = process.env['RERANK_CONFIG'];

  afterEach(() => {
    if (originalEnv === undefined) {
      delete process.env['RERANK_CONFIG'];
    } else {
      process.env['RERANK_CONFIG'] = originalEnv;
    }
  });

  it('загружает конфиг из пути, указанного в RERANK_CONFIG', async () => {
    const configPath = join(TEST_DIR, 'env-rerank-config.yaml');
    await writeFile(configPath, stringifyYaml({ rerank: { metric: 'chrf' } }));
    process.env['RERANK_CONFIG'] = configPath;

    const config = await loadConfig();

    expect(config.rerank.metric).toBe('chrf');
  });

  it('выбрасывает ошибку, если RERANK_CONFIG указывает на несуществующий файл', async () => {
    process.env['RERANK_CONFIG'] = join(TEST_DIR, 'missing-env-config.yaml');

    await expect(loadConfig())
      .rejects.toThrow('Config file not found at RERANK_CONFIG path:');
  });

  it('RERANK_CONFIG имеет приоритет над файлом в текущей директории', async () => {
    await writeFile(join(TEST_DIR, 'rerank.config.yaml'), stringifyYaml({ rerank: { metric: 'chrf' } }));
    const envConfigPath = join(TEST_DIR, 'env-override.yaml');
    await writeFile(envConfigPath, stringifyYaml({ rerank: { metric: 'isometric-diff' } }));
    process.env['RERANK_CONFIG'] = envConfigPath;

    const originalCwd = process.cwd();
    process.chdir(TEST_DIR);

    try {
      const config = await loadConfig();
      expect(config.rerank.metric).toBe('isometric-diff');
    } finally {
      process.chdir(originalCwd);
    }
  });

  it('находит rerank.config.yaml в текущей директории', async () => {
    delete process.env['RERANK_CONFIG'];
    await writeFile(join(TEST_DIR, 'rerank.config.yaml'), stringifyYaml({ output: { best: true } }));

    const originalCwd = process.cwd();
    process.chdir(TEST_DIR);

    try {
      const config = await loadConfig();
      expect(config.output.best).toBe(true);
    } finally {
      process.chdir(originalCwd);
    }
  });
});
