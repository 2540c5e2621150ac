import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { NOT_SPECIFIED } from '@vacancy-scout/vacancy-sdk';
import { describe, it, expect, vi } from 'vitest';
import { mapSearchItems, mapSearchItemToVacancy } from '../src/mapper.js';
import type { HhSearchPage } from '../src/types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const fixture = JSON.parse(readFileSync(resolve(__dirname, '../fixtures/search-page.json'), 'utf-8')) as HhSearchPage;

describe('HH mapper', () => {
  it('maps search items to vacancy records', () => {
    const [first] = mapSearchItems(fixture.items);

    expect(first?.toJSON()).toEqual({
      title: 'Python-разработчик',
      url: 'https://hh.ru/vacancy/100001',
      salary: '150000-200000 RUR',
      description: 'Опыт коммерческой разработки на Python от 3 лет.',
      employer: 'Северный Код',
      published_at: '2026-03-02T10:15:00+0300',
    });
    expect(first?.salaryValue).toBe(175000);
  });

  it('fills sentinels for missing salary and snippet', () => {
    const [, second, third] = mapSearchItems(fixture.items);

    expect(second?.salary).toBe(NOT_SPECIFIED);
    expect(second?.description).toBe(NOT_SPECIFIED);
    expect(third?.salary).toBe('to 120000 RUR');
    expect(third?.description).toBe('Знание SQL & HTTP.');
  });

  it('skips malformed items and reports why', () => {
    const onSkipped = vi.fn();

    const vacancies = mapSearchItems(fixture.items, { onSkipped });

    expect(vacancies.map((vacancy) => vacancy.url)).toEqual([
      'https://hh.ru/vacancy/100001',
      'https://hh.ru/vacancy/100002',
      'https://hh.ru/vacancy/100003',
    ]);
    expect(onSkipped).toHaveBeenCalledTimes(2);
    expect(onSkipped.mock.calls[1]?.[1]).toBe('not-an-item');
  });

  it('skips items whose link is not absolute', () => {
    const onSkipped = vi.fn();

    const vacancies = mapSearchItems([{ name: 'Dev', alternate_url: '/vacancy/7' }], { onSkipped });

    expect(vacancies).toEqual([]);
    expect(onSkipped).toHaveBeenCalledTimes(1);
  });

  it('uses from-only salary wording', () => {
    const vacancy = mapSearchItemToVacancy({
      name: 'Data Engineer',
      alternate_url: 'https://hh.ru/vacancy/8',
      salary: { from: 250000, to: null, currency: 'RUR' },
    });

    expect(vacancy.salary).toBe('from 250000 RUR');
    expect(vacancy.employer).toBe(NOT_SPECIFIED);
  });

  it('keeps postings whose optional fields are absent or null', () => {
    const onSkipped = vi.fn();
    const base = { name: 'Dev', alternate_url: 'https://hh.ru/vacancy/1' };

    const vacancies = mapSearchItems(
      [
        { ...base, salary: { from: 100000, currency: 'RUR' } },
        { ...base, alternate_url: 'https://hh.ru/vacancy/2', salary: { from: 1000, to: 2000 } },
        { ...base, alternate_url: 'https://hh.ru/vacancy/3', id: 3 },
        { ...base, alternate_url: 'https://hh.ru/vacancy/4', employer: {} },
        { ...base, alternate_url: 'https://hh.ru/vacancy/5', published_at: null, employer: { name: null } },
      ],
      { onSkipped },
    );

    expect(onSkipped).not.toHaveBeenCalled();
    expect(vacancies.map((vacancy) => vacancy.salary)).toEqual([
      'from 100000 RUR',
      '1000-2000',
      NOT_SPECIFIED,
      NOT_SPECIFIED,
      NOT_SPECIFIED,
    ]);
    expect(vacancies[3]?.employer).toBe(NOT_SPECIFIED);
    expect(vacancies[4]?.employer).toBe(NOT_SPECIFIED);
    expect(vacancies[4]?.publishedAt).toBe('');
  });
});
