import type { ReadonlyDeep } from 'type-fest';

import type { AppConfig } from '../config/load-config.js';
import type { RunContext } from '../core/types.js';

import { OktaApiError } from './errors.js';

export const REQUEST_TIMEOUT_MS = 30_000;
export const USER_AGENT = 'okta-report-bob-origin/1.0';

const MIN_RATE_LIMIT_WAIT_SECONDS = 2;

export type OktaResponse = Readonly<{
  status: number;
  headers: Headers;
  body: string;
}>;

export type OktaJsonResponse = Readonly<{
  data: unknown;
  headers: Headers;
}>;

export type OktaClient = Readonly<{
  domain: string;
  get: (url: string) => Promise<OktaResponse>;
  getJson: (url: string) => Promise<OktaJsonResponse>;
}>;

const defaultHeaders = (token: string): Readonly<Record<string, string>> =>
  ({
    Authorization: `SSWS ${token}`,
    Accept: 'application/json',
    'Content-Type': 'application/json',
    'User-Agent': USER_AGENT,
  }) as const;

/**
 * Milliseconds to wait after a 429. Okta sends `x-rate-limit-reset` as epoch seconds;
 * we sleep until one second past it, never less than two seconds.
 */
export const rateLimitDelayMs = (headers: Headers, now: Date): number => {
  const reset = headers.get('x-rate-limit-reset');
  if (reset && /^\d+$/.test(reset)) {
    const nowSeconds = Math.floor(now.getTime() / 1000);
    return Math.max(Number(reset) - nowSeconds + 1, MIN_RATE_LIMIT_WAIT_SECONDS) * 1000;
  }
  return MIN_RATE_LIMIT_WAIT_SECONDS * 1000;
};

const parseBody = (text: string): unknown => (text.trim().length === 0 ? null : JSON.parse(text));

export const createOktaClient = (
  config: ReadonlyDeep<Pick<AppConfig, 'oktaDomain' | 'apiToken'>>,
  ctx: RunContext,
): OktaClient => {
  const headers = defaultHeaders(config.apiToken);

  // 429s are retried without a cap.
  const get = async (url: string): Promise<OktaResponse> => {
    for (;;) {
      ctx.logger.debug(`GET ${url}`);
      const response = await ctx.fetch(url, {
        method: 'GET',
        headers,
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });
      const body = await response.text();

      if (response.status === 429) {
        const wait = rateLimitDelayMs(response.headers, ctx.now());
        ctx.logger.warn(`rate limited on ${url}; retrying in ${wait / 1000}s`);
        await ctx.delay(wait);
        continue;
      }

      if (response.status !== 200) {
        throw new OktaApiError(url, response.status, body);
      }

      return { status: response.status, headers: response.headers, body };
    }
  };

  const getJson = async (url: string): Promise<OktaJsonResponse> => {
    const response = await get(url);
    return { data: parseBody(response.body), headers: response.headers };
  };

  return Object.freeze({ domain: config.oktaDomain, get, getJson });
};
