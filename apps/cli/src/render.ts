import type { VacancyRecord } from '@vacancy-scout/vacancy-sdk';

export const SEPARATOR = '-'.repeat(50);

export function formatVacancy(vacancy: VacancyRecord, position: number): string {
  return [
    `${position}. ${vacancy.title || '(untitled)'}`,
    `Salary: ${vacancy.salary}`,
    `Employer: ${vacancy.employer}`,
    `Published: ${vacancy.publishedAt || '-'}`,
    `Requirements: ${vacancy.description}`,
    `Link: ${vacancy.url}`,
    SEPARATOR,
  ].join('\n');
}

export function renderVacancies(vacancies: readonly VacancyRecord[]): string {
  return vacancies.map((vacancy, index) => formatVacancy(vacancy, index + 1)).join('\n');
}
