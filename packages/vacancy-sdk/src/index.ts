export { VacancyRecord, InvalidVacancyError } from './vacancy.js';
export { NOT_SPECIFIED, normalizeSalaryText, parseSalaryValue, formatSalaryRange } from './salary.js';
export type { SalaryBounds } from './salary.js';
export { normalizeWhitespace, decodeHtmlEntities, stripMarkup } from './text.js';
export { storedVacancySchema, storedVacancyListSchema, parseStoredVacancies } from './schema.js';
export type { StoredVacancyEntry } from './schema.js';
export { consoleLogger } from './logger.js';
export type { StoredVacancy, VacancyInit, CoreLogger, LogContext } from './types.js';
