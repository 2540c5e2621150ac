import type { CoreLogger } from '@vacancy-scout/vacancy-sdk';

export interface VacancyRepositoryOptions {
  /** JSON array file mirrored by the repository. Created on first write. */
  filePath: string;
  logger?: CoreLogger;
}

export class VacancyStoreCorruptedError extends Error {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Vacancy store ${filePath} is corrupted: ${detail}`, { cause });
    this.name = 'VacancyStoreCorruptedError';
    this.filePath = filePath;
  }
}
