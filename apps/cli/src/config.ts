import { existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { config } from 'dotenv';
import type { LevelWithSilent } from 'pino';

const currentDir = dirname(fileURLToPath(import.meta.url));
export const REPO_ROOT = resolve(currentDir, '../../../');

const DEFAULT_HH_USER_AGENT = 'VacancyScout/1.0 (vacancy-scout@example.com)';
const DEFAULT_LOG_LEVEL: LevelWithSilent = 'info';
const VALID_LOG_LEVELS: ReadonlySet<string> = new Set(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

export interface CliConfig {
  hh: {
    baseUrl: string;
    userAgent: string;
    timeoutMs: number;
    maxRetries: number;
    minDelayMs: number;
    maxDelayMs: number;
  };
  vacanciesFile: string;
  areasCacheFile: string;
  defaultPageSize: number;
  log: {
    level: LevelWithSilent;
    service: string;
    file: string;
  };
}

type Env = Record<string, string | undefined>;

/**
 * Load `.env` then `.env.local` from the repository root. Values already in
 * the process environment win over `.env`; `.env.local` wins over both.
 */
export function loadEnvFiles(rootDir: string = REPO_ROOT): void {
  const envPath = resolve(rootDir, '.env');
  const envLocalPath = resolve(rootDir, '.env.local');

  if (existsSync(envPath)) {
    config({ path: envPath });
  }

  if (existsSync(envLocalPath)) {
    config({ path: envLocalPath, override: true });
  }
}

function readStringEnv(env: Env, name: string, fallback: string): string {
  return env[name]?.trim() || fallback;
}

function readIntEnv(env: Env, name: string, fallback: number, options: { allowZero?: boolean } = {}): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }

  const parsed = Number(raw);
  const lowest = options.allowZero ? 0 : 1;
  if (!Number.isFinite(parsed) || parsed < lowest) {
    return fallback;
  }

  return Math.floor(parsed);
}

function isLogLevel(value: string): value is LevelWithSilent {
  return VALID_LOG_LEVELS.has(value);
}

function readLogLevel(env: Env): LevelWithSilent {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  if (!raw || !isLogLevel(raw)) {
    return DEFAULT_LOG_LEVEL;
  }

  return raw;
}

export function readCliConfig(env: Env, rootDir: string = REPO_ROOT): CliConfig {
  const minDelayMs = readIntEnv(env, 'HH_MIN_DELAY_MS', 200, { allowZero: true });
  const maxDelayMs = Math.max(minDelayMs, readIntEnv(env, 'HH_MAX_DELAY_MS', 600, { allowZero: true }));

  return {
    hh: {
      baseUrl: readStringEnv(env, 'HH_API_BASE_URL', 'https://api.hh.ru'),
      userAgent: readStringEnv(env, 'HH_USER_AGENT', DEFAULT_HH_USER_AGENT),
      timeoutMs: readIntEnv(env, 'HH_TIMEOUT_MS', 15_000),
      maxRetries: readIntEnv(env, 'HH_MAX_RETRIES', 2, { allowZero: true }),
      minDelayMs,
      maxDelayMs,
    },
    vacanciesFile: resolve(rootDir, readStringEnv(env, 'VACANCIES_FILE', 'data/vacancies.json')),
    areasCacheFile: resolve(rootDir, readStringEnv(env, 'AREAS_CACHE_FILE', 'data/areas.json')),
    defaultPageSize: readIntEnv(env, 'DEFAULT_PAGE_SIZE', 20),
    log: {
      level: readLogLevel(env),
      service: readStringEnv(env, 'LOG_SERVICE_NAME', 'vacancy-scout'),
      file: resolve(rootDir, readStringEnv(env, 'LOG_FILE', 'logs/vacancy-scout.log')),
    },
  };
}
