import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { Agent, request, type Dispatcher } from 'undici';
import { FetchError, TransientFetchError, describeError } from '../errors.js';
import { logger } from '../utils/logger.js';

export interface HttpResult {
  body: string;
  status: number;
}

export interface HttpClientOptions {
  /** Retries after a 429 before the final unconditional attempt. */
  maxRetries: number;
  /** First backoff delay; doubles after every rate-limited attempt. */
  backoffBaseMs: number;
  timeoutMs: number;
  userAgent: string;
  /** Shared connection pool. Defaults to a keep-alive Agent owned by the client. */
  dispatcher?: Dispatcher;
  sleep?: (ms: number) => Promise<void>;
}

export interface HttpClient {
  fetchHtml(url: string): Promise<string>;
  fetchDocument(url: string): Promise<CheerioAPI>;
  close(): Promise<void>;
}

const RATE_LIMITED = 429;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function backoffDelay(baseMs: number, attempt: number): number {
  return baseMs * 2 ** attempt;
}

export function createHttpClient(options: HttpClientOptions): HttpClient {
  const ownsDispatcher = !options.dispatcher;
  const dispatcher =
    options.dispatcher ?? new Agent({ keepAliveTimeout: 10_000, connections: 32 });
  const wait = options.sleep ?? sleep;
  const headers: Record<string, string> = {
    'User-Agent': options.userAgent,
    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.5',
  };

  async function fetchOnce(url: string): Promise<HttpResult> {
    try {
      const { statusCode, body } = await request(url, {
        method: 'GET',
        headers,
        dispatcher,
        maxRedirections: 3,
        headersTimeout: options.timeoutMs,
        bodyTimeout: options.timeoutMs,
      });

      if (statusCode < 200 || statusCode >= 300) {
        // Drain so the pooled connection can be reused.
        await body.dump();
        return { body: '', status: statusCode };
      }

      return { body: await body.text(), status: statusCode };
    } catch (err) {
      throw new FetchError(`Request failed: ${describeError(err)}`, url, null, { cause: err });
    }
  }

  function ensureSuccess(url: string, result: HttpResult): string {
    if (result.status >= 200 && result.status < 300) return result.body;
    throw new FetchError(`Unexpected HTTP status ${result.status}`, url, result.status);
  }

  async function fetchHtml(url: string): Promise<string> {
    for (let attempt = 0; attempt < options.maxRetries; attempt++) {
      const result = await fetchOnce(url);
      if (result.status === RATE_LIMITED) {
        const delayMs = backoffDelay(options.backoffBaseMs, attempt);
        logger.debug({ url, attempt: attempt + 1, delayMs }, 'Rate limited, backing off');
        await wait(delayMs);
        continue;
      }
      return ensureSuccess(url, result);
    }

    const last = await fetchOnce(url);
    if (last.status === RATE_LIMITED) {
      throw new TransientFetchError(url, options.maxRetries + 1);
    }
    return ensureSuccess(url, last);
  }

  return {
    fetchHtml,
    async fetchDocument(url: string): Promise<CheerioAPI> {
      return cheerio.load(await fetchHtml(url));
    },
    async close(): Promise<void> {
      if (ownsDispatcher) await dispatcher.close();
    },
  };
}
