export { VacancyRepository, isAffirmative } from './repository.js';
export { filterByEmployer, filterByKeyword, filterBySalaryRange, topBySalary } from './filters.js';
export { VacancyStoreCorruptedError } from './types.js';
export type { VacancyRepositoryOptions } from './types.js';
