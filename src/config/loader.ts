import { readFile, access } from 'node:fs/promises';
import { resolve, join } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import { ConfigSchema } from './schema.js';
import { defaultConfig } from './defaults.js';
import type { Config } from './schema.js';

// Имя конфиг-файла в текущей директории.
const LOCAL_CONFIG_FILE = 'rerank.config.yaml';

// Переменная окружения с явным путём к конфигу.
const CONFIG_ENV_VAR = 'RERANK_CONFIG';

// Паттерн подстановки переменных окружения: ${ENV_VAR}.
const ENV_VAR_PATTERN = /\$\{([^}]+)\}/g;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Заменяет строки вида ${ENV_VAR} на значения из process.env во всём дереве.
 * Ненайденные переменные остаются как есть.
 */
export function resolveEnvVars(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(ENV_VAR_PATTERN, (match, varName: string) => process.env[varName] ?? match);
  }

  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvVars(item));
  }

  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, resolveEnvVars(item)]),
    );
  }

  return value;
}

/**
 * Deep-merge: значения source перезаписывают target, вложенные объекты сливаются,
 * массивы заменяются целиком. Аргументы не мутируются.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];
    result[key] = isPlainObject(sourceValue) && isPlainObject(targetValue)
      ? deepMerge(targetValue, sourceValue)
      : sourceValue;
  }

  return result;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Путь к конфиг-файлу. Порядок поиска:
 * 1. Явный configPath (--config); отсутствующий файл — ошибка.
 * 2. RERANK_CONFIG; отсутствующий файл — ошибка.
 * 3. ./rerank.config.yaml.
 * 4. ~/.config/nbest-rerank/config.yaml.
 */
export async function resolveConfigPath(configPath?: string): Promise<string | null> {
  if (configPath) {
    const resolved = resolve(configPath);
    if (await fileExists(resolved)) {
      return resolved;
    }
    throw new Error(`Config file not found at path: ${resolved}`);
  }

  const envConfigPath = process.env[CONFIG_ENV_VAR];
  if (envConfigPath) {
    const resolved = resolve(envConfigPath);
    if (await fileExists(resolved)) {
      return resolved;
    }
    throw new Error(`Config file not found at ${CONFIG_ENV_VAR} path: ${resolved}`);
  }

  const localPath = resolve(LOCAL_CONFIG_FILE);
  if (await fileExists(localPath)) {
    return localPath;
  }

  const globalPath = join(homedir(), '.config', 'nbest-rerank', 'config.yaml');
  if (await fileExists(globalPath)) {
    return globalPath;
  }

  return null;
}

/**
 * Загружает конфигурацию: YAML -> подстановка env -> merge с дефолтами -> ConfigSchema.parse().
 * Без конфиг-файла (или с пустым файлом) возвращает дефолты.
 */
export async function loadConfig(configPath?: string): Promise<Config> {
  const resolvedPath = await resolveConfigPath(configPath);

  if (!resolvedPath) {
    return ConfigSchema.parse(defaultConfig);
  }

  const raw = await readFile(resolvedPath, 'utf-8');
  const parsed: unknown = parseYaml(raw);

  if (!isPlainObject(parsed)) {
    return ConfigSchema.parse(defaultConfig);
  }

  const withEnvVars = resolveEnvVars(parsed);
  const merged = isPlainObject(withEnvVars) ? deepMerge(defaultConfig, withEnvVars) : defaultConfig;

  return ConfigSchema.parse(merged);
}
