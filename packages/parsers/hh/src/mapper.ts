import { formatSalaryRange, InvalidVacancyError, stripMarkup, VacancyRecord } from '@vacancy-scout/vacancy-sdk';
import { z } from 'zod';
import type { HhSearchVacancyItem } from './types.js';

// Only a displayable name and link are required; every other field may be absent or null.
export const hhSearchItemSchema = z.object({
  id: z.union([z.string(), z.number()]).optional(),
  name: z.string().trim().min(1),
  alternate_url: z.string().trim().min(1),
  published_at: z.string().nullish(),
  employer: z
    .object({
      id: z.union([z.string(), z.number()]).optional(),
      name: z.string().nullish(),
    })
    .nullish(),
  salary: z
    .object({
      from: z.number().nullish(),
      to: z.number().nullish(),
      currency: z.string().nullish(),
      gross: z.boolean().nullish(),
    })
    .nullish(),
  snippet: z
    .object({
      requirement: z.string().nullish(),
      responsibility: z.string().nullish(),
    })
    .nullish(),
});

export function mapSearchItemToVacancy(item: HhSearchVacancyItem): VacancyRecord {
  return new VacancyRecord({
    title: item.name,
    url: item.alternate_url,
    salary: formatSalaryRange(item.salary),
    description: stripMarkup(item.snippet?.requirement ?? ''),
    employer: item.employer?.name ?? undefined,
    publishedAt: item.published_at ?? undefined,
  });
}

export interface MapSearchItemsOptions {
  onSkipped?: (reason: string, item: unknown) => void;
}

/**
 * Map raw `/vacancies` items, dropping anything that is not a usable posting.
 */
export function mapSearchItems(items: unknown[], options?: MapSearchItemsOptions): VacancyRecord[] {
  const vacancies: VacancyRecord[] = [];

  for (const item of items) {
    const parsed = hhSearchItemSchema.safeParse(item);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      options?.onSkipped?.(issue ? `${issue.path.join('.') || 'item'}: ${issue.message}` : 'invalid item', item);
      continue;
    }

    try {
      vacancies.push(mapSearchItemToVacancy(parsed.data));
    } catch (error) {
      if (!(error instanceof InvalidVacancyError)) {
        throw error;
      }

      options?.onSkipped?.(error.message, item);
    }
  }

  return vacancies;
}
