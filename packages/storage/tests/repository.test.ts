import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { type CoreLogger, VacancyRecord } from '@vacancy-scout/vacancy-sdk';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { isAffirmative, VacancyRepository } from '../src/repository.js';
import { VacancyStoreCorruptedError } from '../src/types.js';

const silentLogger: CoreLogger = {
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

function vacancy(id: number, overrides: Partial<ConstructorParameters<typeof VacancyRecord>[0]> = {}): VacancyRecord {
  return new VacancyRecord({
    title: `Developer ${id}`,
    url: `https://hh.ru/vacancy/${id}`,
    salary: `${id * 10000} RUR`,
    description: 'Node.js',
    employer: 'Acme',
    publishedAt: '2026-03-01T10:00:00+0300',
    ...overrides,
  });
}

describe('VacancyRepository', () => {
  let workDir: string;
  let filePath: string;

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), 'vacancy-scout-store-'));
    filePath = join(workDir, 'data', 'vacancies.json');
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  it('starts empty when the file does not exist', () => {
    const repository = new VacancyRepository({ filePath, logger: silentLogger });

    expect(repository.all()).toEqual([]);
    expect(existsSync(filePath)).toBe(false);
  });

  it('adds a URL only once', () => {
    const repository = new VacancyRepository({ filePath, logger: silentLogger });

    expect(repository.add(vacancy(1))).toBe(true);
    expect(repository.add(vacancy(1, { title: 'Same link, new title' }))).toBe(false);

    expect(repository.size).toBe(1);
    expect(repository.all()[0]?.title).toBe('Developer 1');
  });

  it('rewrites the whole file on every add', () => {
    const repository = new VacancyRepository({ filePath, logger: silentLogger });

    repository.add(vacancy(1));
    repository.add(vacancy(2, { employer: 'ООО Ромашка' }));

    const content = readFileSync(filePath, 'utf-8');
    expect(JSON.parse(content)).toEqual([vacancy(1).toJSON(), vacancy(2, { employer: 'ООО Ромашка' }).toJSON()]);
    expect(content).toContain('"employer": "ООО Ромашка"');
    expect(content.split('\n')[1]).toBe('    {');
  });

  it('round-trips records through the file', () => {
    const first = new VacancyRepository({ filePath, logger: silentLogger });
    first.add(vacancy(3));
    first.add(vacancy(1, { salary: '' }));
    first.add(vacancy(2));

    const reloaded = new VacancyRepository({ filePath, logger: silentLogger });

    expect(reloaded.all().map((record) => record.toJSON())).toEqual(first.all().map((record) => record.toJSON()));
  });

  it('adds a batch with a single write and skips duplicates', () => {
    const repository = new VacancyRepository({ filePath, logger: silentLogger });
    repository.add(vacancy(1));

    const added = repository.addMany([vacancy(1), vacancy(2), vacancy(2), vacancy(3)]);

    expect(added).toBe(2);
    expect(repository.all().map((record) => record.url)).toEqual([
      'https://hh.ru/vacancy/1',
      'https://hh.ru/vacancy/2',
      'https://hh.ru/vacancy/3',
    ]);
    expect(new VacancyRepository({ filePath, logger: silentLogger }).size).toBe(3);
  });

  it('deletes by URL using a deletion key', () => {
    const repository = new VacancyRepository({ filePath, logger: silentLogger });
    repository.addMany([vacancy(1), vacancy(2)]);

    expect(repository.delete(VacancyRecord.deletionKey('https://hh.ru/vacancy/1'))).toBe(true);
    expect(repository.delete(VacancyRecord.deletionKey('https://hh.ru/vacancy/404'))).toBe(false);

    const reloaded = new VacancyRepository({ filePath, logger: silentLogger });
    expect(reloaded.all().map((record) => record.url)).toEqual(['https://hh.ru/vacancy/2']);
  });

  it('clears everything and leaves a loadable file', () => {
    const repository = new VacancyRepository({ filePath, logger: silentLogger });
    repository.addMany([vacancy(1), vacancy(2)]);

    expect(repository.deleteAll()).toBe(true);
    expect(repository.all()).toEqual([]);
    expect(readFileSync(filePath, 'utf-8')).toBe('[]');
    expect(new VacancyRepository({ filePath, logger: silentLogger }).size).toBe(0);
  });

  it('treats an empty file as an empty store', () => {
    writeFileSync(join(workDir, 'empty.json'), '  \n');

    const repository = new VacancyRepository({ filePath: join(workDir, 'empty.json'), logger: silentLogger });

    expect(repository.size).toBe(0);
  });

  it('fails loudly on corrupt JSON', () => {
    const corruptPath = join(workDir, 'corrupt.json');
    writeFileSync(corruptPath, '[{"title": "x",');

    expect(() => new VacancyRepository({ filePath: corruptPath, logger: silentLogger })).toThrow(
      VacancyStoreCorruptedError,
    );
  });

  it('fails loudly on entries with a wrong shape', () => {
    const corruptPath = join(workDir, 'wrong-shape.json');
    writeFileSync(corruptPath, JSON.stringify([{ title: 'No link' }]));

    expect(() => new VacancyRepository({ filePath: corruptPath, logger: silentLogger })).toThrow(
      VacancyStoreCorruptedError,
    );
  });

  it('propagates write failures after mutating memory', () => {
    const blocker = join(workDir, 'blocker');
    writeFileSync(blocker, 'not a directory');
    const repository = new VacancyRepository({ filePath: join(blocker, 'vacancies.json'), logger: silentLogger });

    expect(() => repository.add(vacancy(1))).toThrow();
    expect(repository.size).toBe(1);
  });

  it('runs queries over the stored collection', () => {
    const repository = new VacancyRepository({ filePath, logger: silentLogger });
    repository.addMany([
      vacancy(1, { title: 'Python Developer', employer: 'Acme' }),
      vacancy(2, { title: 'Go Developer', description: 'gRPC, python scripts', employer: 'Beta' }),
      vacancy(3, { title: 'Designer', employer: 'acme studio' }),
    ]);

    expect(repository.filterByKeyword('PYTHON').map((record) => record.url)).toEqual([
      'https://hh.ru/vacancy/1',
      'https://hh.ru/vacancy/2',
    ]);
    expect(repository.filterByEmployer('ACME').map((record) => record.url)).toEqual([
      'https://hh.ru/vacancy/1',
      'https://hh.ru/vacancy/3',
    ]);
    expect(repository.filterBySalaryRange(15000, 30000).map((record) => record.url)).toEqual([
      'https://hh.ru/vacancy/2',
      'https://hh.ru/vacancy/3',
    ]);
    expect(repository.topBySalary(1).map((record) => record.url)).toEqual(['https://hh.ru/vacancy/3']);
  });
});

describe('isAffirmative', () => {
  it('accepts yes in both languages', () => {
    for (const answer of ['yes', 'Y', ' да ', 'ДА']) {
      expect(isAffirmative(answer)).toBe(true);
    }
  });

  it('rejects anything else', () => {
    for (const answer of ['', 'no', 'n', 'нет', 'yes please']) {
      expect(isAffirmative(answer)).toBe(false);
    }
  });
});
