import { NOT_SPECIFIED, normalizeSalaryText, parseSalaryValue } from './salary.js';
import type { StoredVacancy, VacancyInit } from './types.js';

export class InvalidVacancyError extends Error {
  readonly url: string;

  constructor(url: string, message: string) {
    super(message);
    this.name = 'InvalidVacancyError';
    this.url = url;
  }
}

function requireAbsoluteUrl(url: string): string {
  const candidate = url.trim();

  let parsed: URL;
  try {
    parsed = new URL(candidate);
  } catch {
    throw new InvalidVacancyError(url, `Vacancy URL is not a valid absolute URL: "${url}"`);
  }

  if (!parsed.protocol || !parsed.host) {
    throw new InvalidVacancyError(url, `Vacancy URL must have a scheme and a host: "${url}"`);
  }

  return candidate;
}

function orNotSpecified(value: string | null | undefined): string {
  const trimmed = value?.trim();
  return trimmed ? trimmed : NOT_SPECIFIED;
}

/**
 * One normalized job posting. The URL is its identity.
 */
export class VacancyRecord {
  readonly title: string;
  readonly url: string;
  readonly description: string;
  readonly employer: string;
  readonly publishedAt: string;
  private salaryText: string;

  constructor(init: VacancyInit) {
    this.url = requireAbsoluteUrl(init.url);
    this.title = init.title?.trim() ?? '';
    this.salaryText = normalizeSalaryText(init.salary);
    this.description = orNotSpecified(init.description);
    this.employer = orNotSpecified(init.employer);
    this.publishedAt = init.publishedAt ?? '';
  }

  /**
   * Placeholder that only carries a URL, used to address a stored record for removal.
   */
  static deletionKey(url: string): VacancyRecord {
    return new VacancyRecord({ url });
  }

  static fromStored(entry: {
    title: string;
    url: string;
    salary?: string | null;
    description?: string | null;
    employer?: string | null;
    published_at?: string | null;
  }): VacancyRecord {
    return new VacancyRecord({
      title: entry.title,
      url: entry.url,
      salary: entry.salary,
      description: entry.description,
      employer: entry.employer,
      publishedAt: entry.published_at,
    });
  }

  get salary(): string {
    return this.salaryText;
  }

  get salaryValue(): number {
    return parseSalaryValue(this.salaryText);
  }

  replaceSalary(salary: string | null | undefined): void {
    this.salaryText = normalizeSalaryText(salary);
  }

  sameAs(other: VacancyRecord): boolean {
    return this.url === other.url;
  }

  toJSON(): StoredVacancy {
    return {
      title: this.title,
      url: this.url,
      salary: this.salaryText,
      description: this.description,
      employer: this.employer,
      published_at: this.publishedAt,
    };
  }

  toString(): string {
    return `Vacancy(title='${this.title}', url='${this.url}')`;
  }
}
