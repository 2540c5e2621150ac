import { consoleLogger, type CoreLogger, type VacancyRecord } from '@vacancy-scout/vacancy-sdk';
import { z } from 'zod';
import { mapSearchItems } from './mapper.js';
import type { HhSearchPage, PageFetcher } from './types.js';

export const HH_MAX_RESULTS_DEPTH = 2000;
export const HH_MAX_PER_PAGE = 100;

const searchPageSchema = z.object({
  items: z.array(z.unknown()),
  pages: z.number().int().nonnegative().optional(),
  found: z.number().int().nonnegative().optional(),
});

export interface VacancySearch {
  search(query: string, excludedText: string, areaId: string, pageSize: number): Promise<VacancyRecord[]>;
}

export interface HhVacancySearchOptions {
  fetcher: PageFetcher;
  logger?: CoreLogger;
}

/**
 * Split a comma-separated exclusion list into lowercase words.
 */
export function parseExcludedWords(excludedText: string): string[] {
  return excludedText
    .split(',')
    .map((word) => word.trim().toLowerCase())
    .filter((word) => word.length > 0);
}

export function isExcluded(vacancy: VacancyRecord, words: string[]): boolean {
  if (words.length === 0) return false;

  const title = vacancy.title.toLowerCase();
  const description = vacancy.description.toLowerCase();
  return words.some((word) => title.includes(word) || description.includes(word));
}

/**
 * Paginated vacancy search over `/vacancies`.
 * `pageSize` caps the number of records returned, not the number of requests.
 */
export class HhVacancySearch implements VacancySearch {
  private readonly fetcher: PageFetcher;
  private readonly logger: CoreLogger;

  constructor(options: HhVacancySearchOptions) {
    this.fetcher = options.fetcher;
    this.logger = options.logger ?? consoleLogger;
  }

  async search(query: string, excludedText: string, areaId: string, pageSize: number): Promise<VacancyRecord[]> {
    if (pageSize <= 0) return [];

    const perPage = Math.min(pageSize, HH_MAX_PER_PAGE);
    const maxPages = Math.ceil(HH_MAX_RESULTS_DEPTH / perPage);
    const excludedWords = parseExcludedWords(excludedText);
    const results: VacancyRecord[] = [];
    const seenUrls = new Set<string>();
    let found: number | undefined;
    let page = 0;

    while (results.length < pageSize && page < maxPages) {
      const searchPage = await this.fetchSearchPage({
        text: query,
        excluded_text: excludedText,
        area: areaId,
        per_page: perPage,
        page,
      });

      if (!searchPage || searchPage.items.length === 0) {
        break;
      }

      found = searchPage.found ?? found;

      const vacancies = mapSearchItems(searchPage.items, {
        onSkipped: (reason) => this.logger.debug({ event: 'hh_item_skipped', page, reason }, 'Skipped HH search item'),
      });

      for (const vacancy of vacancies) {
        if (seenUrls.has(vacancy.url) || isExcluded(vacancy, excludedWords)) {
          continue;
        }

        seenUrls.add(vacancy.url);
        results.push(vacancy);
      }

      page += 1;
      if (searchPage.pages !== undefined && page >= searchPage.pages) {
        break;
      }
    }

    const returned = results.slice(0, pageSize);
    this.logger.info(
      { event: 'hh_search_completed', query, areaId, pagesFetched: page, found, returned: returned.length },
      'HH vacancy search completed',
    );

    return returned;
  }

  private async fetchSearchPage(params: {
    text: string;
    excluded_text: string;
    area: string;
    per_page: number;
    page: number;
  }): Promise<HhSearchPage | undefined> {
    const data = await this.fetcher.fetchPage('vacancies', params);
    if (data === undefined) {
      return undefined;
    }

    const parsed = searchPageSchema.safeParse(data);
    if (!parsed.success) {
      this.logger.warn(
        { event: 'hh_request_failed', endpoint: 'vacancies', page: params.page, reason: 'invalid_body' },
        'HH API returned an unexpected search page shape',
      );
      return undefined;
    }

    return parsed.data;
  }
}
