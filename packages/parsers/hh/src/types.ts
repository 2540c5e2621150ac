export interface HhEmployer {
  id?: string | number;
  name?: string | null;
}

export interface HhSalary {
  from?: number | null;
  to?: number | null;
  currency?: string | null;
  gross?: boolean | null;
}

export interface HhSnippet {
  requirement?: string | null;
  responsibility?: string | null;
}

export interface HhSearchVacancyItem {
  id?: string | number;
  name: string;
  alternate_url: string;
  published_at?: string | null;
  employer?: HhEmployer | null;
  salary?: HhSalary | null;
  snippet?: HhSnippet | null;
}

/**
 * One page of `/vacancies`. Items stay unknown until the mapper validates them.
 */
export interface HhSearchPage {
  items: unknown[];
  pages?: number;
  found?: number;
}

export type QueryParams = Record<string, string | number>;

/**
 * Capability every provider transport exposes: GET an endpoint and hand back
 * the decoded JSON, or `undefined` when the request produced no usable data.
 */
export interface PageFetcher {
  fetchPage(endpoint: string, params: QueryParams): Promise<unknown | undefined>;
}
