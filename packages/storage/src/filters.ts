import type { VacancyRecord } from '@vacancy-scout/vacancy-sdk';

/**
 * Case-insensitive substring match on title or description.
 */
export function filterByKeyword(vacancies: readonly VacancyRecord[], keyword: string): VacancyRecord[] {
  const needle = keyword.toLowerCase();
  return vacancies.filter(
    (vacancy) => vacancy.title.toLowerCase().includes(needle) || vacancy.description.toLowerCase().includes(needle),
  );
}

export function filterByEmployer(vacancies: readonly VacancyRecord[], employer: string): VacancyRecord[] {
  const needle = employer.toLowerCase();
  return vacancies.filter((vacancy) => vacancy.employer.toLowerCase().includes(needle));
}

/**
 * Inclusive range on the derived salary value. Unparseable salaries count as 0,
 * so they are kept only when `min <= 0`.
 */
export function filterBySalaryRange(vacancies: readonly VacancyRecord[], min: number, max: number): VacancyRecord[] {
  return vacancies.filter((vacancy) => {
    const value = vacancy.salaryValue;
    return value >= min && value <= max;
  });
}

/**
 * Highest salaries first; equal values keep their stored order.
 */
export function topBySalary(vacancies: readonly VacancyRecord[], n: number): VacancyRecord[] {
  if (n <= 0) return [];

  return [...vacancies].sort((a, b) => b.salaryValue - a.salaryValue).slice(0, n);
}
