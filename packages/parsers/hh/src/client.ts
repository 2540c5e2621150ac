import { consoleLogger, type CoreLogger } from '@vacancy-scout/vacancy-sdk';
import type { PageFetcher, QueryParams } from './types.js';

const DEFAULT_BASE_URL = 'https://api.hh.ru';

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface HhClientOptions {
  baseUrl?: string;
  userAgent: string;
  minDelayMs?: number;
  maxDelayMs?: number;
  timeoutMs?: number;
  maxRetries?: number;
  /** Longest server-requested `Retry-After` the client will wait out; longer ones give up the page. */
  maxRetryAfterMs?: number;
  fetchImpl?: typeof fetch;
  logger?: CoreLogger;
}

export type HhFailureReason =
  | 'unauthorized'
  | 'captcha_required'
  | 'not_found'
  | 'rate_limited'
  | 'server_error'
  | 'http_error'
  | 'timeout'
  | 'network_error'
  | 'invalid_body';

const FAILURE_MESSAGES: Record<HhFailureReason, string> = {
  unauthorized: 'HH API rejected the request as unauthorized',
  captcha_required: 'HH API requires a captcha to be solved',
  not_found: 'HH API resource does not exist or is not visible',
  rate_limited: 'HH API rate limit exceeded',
  server_error: 'HH API server error',
  http_error: 'HH API request failed',
  timeout: 'HH API request timed out',
  network_error: 'HH API network error',
  invalid_body: 'HH API returned a malformed body',
};

export class HhHttpError extends Error {
  readonly status: number;
  readonly body: string;
  readonly retryAfterMs?: number;

  constructor(status: number, body: string, retryAfterMs?: number) {
    super(`HH API request failed with status ${status}`);
    this.name = 'HhHttpError';
    this.status = status;
    this.body = body;
    this.retryAfterMs = retryAfterMs;
  }
}

export class HhInvalidBodyError extends Error {
  readonly body: string;

  constructor(body: string) {
    super('HH API response body is not valid JSON');
    this.name = 'HhInvalidBodyError';
    this.body = body;
  }
}

export function classifyStatus(status: number): HhFailureReason {
  switch (status) {
    case 401:
      return 'unauthorized';
    case 403:
      return 'captcha_required';
    case 404:
      return 'not_found';
    case 429:
      return 'rate_limited';
    default:
      return status >= 500 ? 'server_error' : 'http_error';
  }
}

function isAbortError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';
}

export function classifyFailure(error: unknown): HhFailureReason {
  if (error instanceof HhHttpError) {
    return classifyStatus(error.status);
  }

  if (error instanceof HhInvalidBodyError) {
    return 'invalid_body';
  }

  return isAbortError(error) ? 'timeout' : 'network_error';
}

export function buildRequestPath(endpoint: string, params: QueryParams): string {
  const query = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    query.set(key, String(value));
  }

  const path = `/${endpoint.replace(/^\/+/, '')}`;
  const search = query.toString();
  return search ? `${path}?${search}` : path;
}

/**
 * HTTP transport for the hh.ru API. One instance is one session: it keeps
 * request spacing state and reuses the runtime's pooled connections.
 */
export class HhClient implements PageFetcher {
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly minDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly maxRetryAfterMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: CoreLogger;

  private lastRequestAt = 0;

  constructor(options: HhClientOptions) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.userAgent = options.userAgent;
    this.minDelayMs = options.minDelayMs ?? 200;
    this.maxDelayMs = options.maxDelayMs ?? 600;
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.maxRetries = options.maxRetries ?? 2;
    this.maxRetryAfterMs = options.maxRetryAfterMs ?? 30_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? consoleLogger;
  }

  async fetchPage(endpoint: string, params: QueryParams): Promise<unknown | undefined> {
    const path = buildRequestPath(endpoint, params);

    try {
      return await this.request(path);
    } catch (error) {
      const reason = classifyFailure(error);
      this.logger.warn(
        {
          event: 'hh_request_failed',
          endpoint,
          path,
          reason,
          status: error instanceof HhHttpError ? error.status : undefined,
          error: error instanceof Error ? error.message : String(error),
        },
        FAILURE_MESSAGES[reason],
      );
      return undefined;
    }
  }

  private async request(path: string): Promise<unknown> {
    await this.waitForRateWindow();

    let attempt = 0;
    while (true) {
      try {
        return await this.requestOnce(path);
      } catch (error) {
        if (attempt >= this.maxRetries || !this.isRetryable(error)) {
          throw error;
        }

        const waitMs = this.getRetryDelayMs(error, attempt);
        attempt += 1;
        this.logger.debug(
          { event: 'hh_request_retry', path, attempt, waitMs, reason: classifyFailure(error) },
          'Retrying HH API request',
        );
        await sleep(waitMs);
      }
    }
  }

  private async requestOnce(path: string): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        signal: controller.signal,
        headers: {
          Accept: 'application/json',
          'HH-User-Agent': this.userAgent,
        },
      });

      const body = await response.text();
      if (!response.ok) {
        const retryAfter = this.parseRetryAfter(response.headers.get('retry-after'));
        throw new HhHttpError(response.status, body, retryAfter);
      }

      try {
        const data: unknown = JSON.parse(body);
        return data;
      } catch {
        throw new HhInvalidBodyError(body);
      }
    } finally {
      clearTimeout(timeout);
    }
  }

  private parseRetryAfter(value: string | null): number | undefined {
    if (!value) return undefined;

    const seconds = Number(value);
    if (!Number.isFinite(seconds) || seconds < 0) {
      return undefined;
    }

    return Math.round(seconds * 1000);
  }

  private isRetryable(error: unknown): boolean {
    if (error instanceof HhHttpError && error.retryAfterMs !== undefined && error.retryAfterMs > this.maxRetryAfterMs) {
      return false;
    }

    const reason = classifyFailure(error);
    return reason === 'rate_limited' || reason === 'server_error' || reason === 'timeout' || reason === 'network_error';
  }

  private getRetryDelayMs(error: unknown, attempt: number): number {
    if (error instanceof HhHttpError && error.retryAfterMs !== undefined) {
      return error.retryAfterMs;
    }

    const base = 500;
    const maxJitter = 250;
    const jitter = Math.floor(Math.random() * maxJitter);
    return base * 2 ** attempt + jitter;
  }

  private randomDelayMs(): number {
    if (this.maxDelayMs <= this.minDelayMs) {
      return this.minDelayMs;
    }

    const spread = this.maxDelayMs - this.minDelayMs;
    return this.minDelayMs + Math.floor(Math.random() * (spread + 1));
  }

  private async waitForRateWindow(): Promise<void> {
    const now = Date.now();
    if (this.lastRequestAt === 0) {
      this.lastRequestAt = now;
      return;
    }

    const target = this.lastRequestAt + this.randomDelayMs();
    if (target > now) {
      await sleep(target - now);
    }

    this.lastRequestAt = Date.now();
  }
}
