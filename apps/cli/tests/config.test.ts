import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { loadEnvFiles, readCliConfig } from '../src/config.js';

describe('readCliConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    const config = readCliConfig({}, '/srv/scout');

    expect(config).toEqual({
      hh: {
        baseUrl: 'https://api.hh.ru',
        userAgent: 'VacancyScout/1.0 (vacancy-scout@example.com)',
        timeoutMs: 15000,
        maxRetries: 2,
        minDelayMs: 200,
        maxDelayMs: 600,
      },
      vacanciesFile: '/srv/scout/data/vacancies.json',
      areasCacheFile: '/srv/scout/data/areas.json',
      defaultPageSize: 20,
      log: {
        level: 'info',
        service: 'vacancy-scout',
        file: '/srv/scout/logs/vacancy-scout.log',
      },
    });
  });

  it('reads overrides and keeps absolute paths', () => {
    const config = readCliConfig(
      {
        HH_USER_AGENT: ' Tester/2.0 (qa@example.com) ',
        HH_MAX_RETRIES: '0',
        HH_TIMEOUT_MS: '2500.7',
        VACANCIES_FILE: '/tmp/store.json',
        AREAS_CACHE_FILE: 'cache/areas.json',
        DEFAULT_PAGE_SIZE: '50',
        LOG_LEVEL: 'DEBUG',
      },
      '/srv/scout',
    );

    expect(config.hh.userAgent).toBe('Tester/2.0 (qa@example.com)');
    expect(config.hh.maxRetries).toBe(0);
    expect(config.hh.timeoutMs).toBe(2500);
    expect(config.vacanciesFile).toBe('/tmp/store.json');
    expect(config.areasCacheFile).toBe('/srv/scout/cache/areas.json');
    expect(config.defaultPageSize).toBe(50);
    expect(config.log.level).toBe('debug');
  });

  it('ignores invalid numbers and log levels', () => {
    const config = readCliConfig({ DEFAULT_PAGE_SIZE: '0', HH_TIMEOUT_MS: 'soon', LOG_LEVEL: 'loud' }, '/srv/scout');

    expect(config.defaultPageSize).toBe(20);
    expect(config.hh.timeoutMs).toBe(15000);
    expect(config.log.level).toBe('info');
  });

  it('never lets the maximum delay drop below the minimum', () => {
    const config = readCliConfig({ HH_MIN_DELAY_MS: '900', HH_MAX_DELAY_MS: '100' }, '/srv/scout');

    expect(config.hh.minDelayMs).toBe(900);
    expect(config.hh.maxDelayMs).toBe(900);
  });
});

describe('loadEnvFiles', () => {
  let workDir: string | undefined;

  afterEach(() => {
    delete process.env.SCOUT_TEST_VALUE;
    delete process.env.SCOUT_TEST_BASE_ONLY;
    if (workDir) rmSync(workDir, { recursive: true, force: true });
  });

  it('lets .env.local override .env', () => {
    workDir = mkdtempSync(join(tmpdir(), 'vacancy-scout-env-'));
    writeFileSync(join(workDir, '.env'), 'SCOUT_TEST_VALUE=base\nSCOUT_TEST_BASE_ONLY=kept\n');
    writeFileSync(join(workDir, '.env.local'), 'SCOUT_TEST_VALUE=local\n');

    loadEnvFiles(workDir);

    expect(process.env.SCOUT_TEST_VALUE).toBe('local');
    expect(process.env.SCOUT_TEST_BASE_ONLY).toBe('kept');
  });

  it('does nothing when no env files exist', () => {
    workDir = mkdtempSync(join(tmpdir(), 'vacancy-scout-env-'));

    loadEnvFiles(workDir);

    expect(process.env.SCOUT_TEST_VALUE).toBeUndefined();
  });
});
