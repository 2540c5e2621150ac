/**
 * Shape of one vacancy inside the JSON store file.
 */
export interface StoredVacancy {
  title: string;
  url: string;
  salary: string;
  description: string;
  employer: string;
  published_at: string;
}

/**
 * Constructor input for a VacancyRecord. Only `url` is required;
 * absent text fields are replaced by the "not specified" sentinel.
 */
export interface VacancyInit {
  title?: string | null;
  url: string;
  salary?: string | null;
  description?: string | null;
  employer?: string | null;
  publishedAt?: string | null;
}

export type LogContext = Record<string, unknown>;

/**
 * Minimal structured logging sink passed into core components.
 */
export interface CoreLogger {
  debug(context: LogContext, message: string): void;
  info(context: LogContext, message: string): void;
  warn(context: LogContext, message: string): void;
  error(context: LogContext, message: string): void;
}
