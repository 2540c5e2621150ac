import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { consoleLogger, parseStoredVacancies, type CoreLogger, type VacancyRecord } from '@vacancy-scout/vacancy-sdk';
import { filterByEmployer, filterByKeyword, filterBySalaryRange, topBySalary } from './filters.js';
import { VacancyStoreCorruptedError, type VacancyRepositoryOptions } from './types.js';

const AFFIRMATIVE_ANSWERS = new Set(['yes', 'y', 'да']);

/**
 * True for the answers that confirm wiping the whole store.
 */
export function isAffirmative(answer: string): boolean {
  return AFFIRMATIVE_ANSWERS.has(answer.trim().toLowerCase());
}

/**
 * In-memory vacancy collection mirrored to one JSON file.
 *
 * Every mutation rewrites the whole file before returning. A failed write
 * propagates and leaves the in-memory collection already changed.
 * Two instances on the same file are not coordinated: the last writer wins.
 */
export class VacancyRepository {
  private readonly filePath: string;
  private readonly logger: CoreLogger;
  private vacancies: VacancyRecord[];

  constructor(options: VacancyRepositoryOptions) {
    this.filePath = options.filePath;
    this.logger = options.logger ?? consoleLogger;
    this.vacancies = this.load();
  }

  get size(): number {
    return this.vacancies.length;
  }

  add(vacancy: VacancyRecord): boolean {
    if (this.has(vacancy.url)) {
      this.logger.info({ event: 'vacancy_duplicate', url: vacancy.url }, 'Vacancy already stored');
      return false;
    }

    this.vacancies.push(vacancy);
    this.persist();
    this.logger.debug({ event: 'vacancy_added', url: vacancy.url }, 'Vacancy stored');
    return true;
  }

  /**
   * Add every record not stored yet and write the file once.
   */
  addMany(vacancies: readonly VacancyRecord[]): number {
    let added = 0;

    for (const vacancy of vacancies) {
      if (this.has(vacancy.url)) {
        this.logger.debug({ event: 'vacancy_duplicate', url: vacancy.url }, 'Vacancy already stored');
        continue;
      }

      this.vacancies.push(vacancy);
      added += 1;
    }

    if (added > 0) {
      this.persist();
    }

    return added;
  }

  delete(vacancy: VacancyRecord): boolean {
    const index = this.vacancies.findIndex((current) => current.sameAs(vacancy));
    if (index === -1) {
      return false;
    }

    this.vacancies.splice(index, 1);
    this.persist();
    this.logger.info({ event: 'vacancy_deleted', url: vacancy.url }, 'Vacancy deleted');
    return true;
  }

  deleteAll(): boolean {
    const removed = this.vacancies.length;
    this.vacancies = [];
    this.persist();
    this.logger.info({ event: 'vacancies_cleared', removed }, 'All vacancies deleted');
    return true;
  }

  all(): VacancyRecord[] {
    return [...this.vacancies];
  }

  filterByKeyword(keyword: string): VacancyRecord[] {
    return filterByKeyword(this.vacancies, keyword);
  }

  filterByEmployer(employer: string): VacancyRecord[] {
    return filterByEmployer(this.vacancies, employer);
  }

  filterBySalaryRange(min: number, max: number): VacancyRecord[] {
    return filterBySalaryRange(this.vacancies, min, max);
  }

  topBySalary(n: number): VacancyRecord[] {
    return topBySalary(this.vacancies, n);
  }

  private has(url: string): boolean {
    return this.vacancies.some((vacancy) => vacancy.url === url);
  }

  private load(): VacancyRecord[] {
    if (!existsSync(this.filePath)) {
      return [];
    }

    const content = readFileSync(this.filePath, 'utf-8');
    if (!content.trim()) {
      return [];
    }

    try {
      return parseStoredVacancies(JSON.parse(content));
    } catch (error) {
      throw new VacancyStoreCorruptedError(this.filePath, error);
    }
  }

  private persist(): void {
    mkdirSync(dirname(this.filePath), { recursive: true });
    writeFileSync(this.filePath, JSON.stringify(this.vacancies, null, 4), 'utf-8');
  }
}
