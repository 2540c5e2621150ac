import { z } from 'zod';
import { VacancyRecord } from './vacancy.js';

export const storedVacancySchema = z.object({
  title: z.string(),
  url: z.string().min(1),
  salary: z.string().nullish(),
  description: z.string().nullish(),
  employer: z.string().nullish(),
  published_at: z.string().nullish(),
});

export const storedVacancyListSchema = z.array(storedVacancySchema);

export type StoredVacancyEntry = z.infer<typeof storedVacancySchema>;

/**
 * Turn decoded store contents into records.
 * Throws a ZodError on a wrong shape and InvalidVacancyError on a bad URL.
 */
export function parseStoredVacancies(data: unknown): VacancyRecord[] {
  return storedVacancyListSchema.parse(data).map((entry) => VacancyRecord.fromStored(entry));
}
