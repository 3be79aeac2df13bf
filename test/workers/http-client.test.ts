import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { MockAgent } from 'undici';
import { FetchError, TransientFetchError } from '../../src/errors.js';
import { backoffDelay, createHttpClient, type HttpClient } from '../../src/workers/http-client.js';

const ORIGIN = 'http://ufcstats.test';
const PAGE = '/event-details/ev0002a1';

describe('http client', () => {
  let mockAgent: MockAgent;
  let sleeps: number[];
  let client: HttpClient;

  beforeEach(() => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
    sleeps = [];
    client = createHttpClient({
      maxRetries: 5,
      backoffBaseMs: 1000,
      timeoutMs: 5000,
      userAgent: 'test-agent',
      dispatcher: mockAgent,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });
  });

  afterEach(async () => {
    await client.close();
    await mockAgent.close();
  });

  it('should return the body of a successful response', async () => {
    mockAgent.get(ORIGIN).intercept({ path: PAGE, method: 'GET' }).reply(200, '<p>ok</p>');

    await expect(client.fetchHtml(`${ORIGIN}${PAGE}`)).resolves.toBe('<p>ok</p>');
    expect(sleeps).toEqual([]);
  });

  it('should back off 1+2+4+8 seconds when the fifth attempt succeeds', async () => {
    const pool = mockAgent.get(ORIGIN);
    pool.intercept({ path: PAGE, method: 'GET' }).reply(429, 'slow down').times(4);
    pool.intercept({ path: PAGE, method: 'GET' }).reply(200, '<h1>Card</h1>');

    const $ = await client.fetchDocument(`${ORIGIN}${PAGE}`);

    expect($('h1').text()).toBe('Card');
    expect(sleeps).toEqual([1000, 2000, 4000, 8000]);
    expect(sleeps.reduce((sum, ms) => sum + ms, 0)).toBe(15000);
  });

  it('should make one final attempt after exhausting retries and then fail', async () => {
    mockAgent.get(ORIGIN).intercept({ path: PAGE, method: 'GET' }).reply(429, '').times(6);

    const error = await client.fetchHtml(`${ORIGIN}${PAGE}`).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransientFetchError);
    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ status: 429, attempts: 6, url: `${ORIGIN}${PAGE}` });
    expect(sleeps).toEqual([1000, 2000, 4000, 8000, 16000]);
  });

  it('should succeed on the final unconditional attempt', async () => {
    const pool = mockAgent.get(ORIGIN);
    pool.intercept({ path: PAGE, method: 'GET' }).reply(429, '').times(5);
    pool.intercept({ path: PAGE, method: 'GET' }).reply(200, 'late');

    await expect(client.fetchHtml(`${ORIGIN}${PAGE}`)).resolves.toBe('late');
    expect(sleeps).toHaveLength(5);
  });

  it('should not retry other error statuses', async () => {
    mockAgent.get(ORIGIN).intercept({ path: PAGE, method: 'GET' }).reply(404, 'missing');

    const error = await client.fetchHtml(`${ORIGIN}${PAGE}`).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).not.toBeInstanceOf(TransientFetchError);
    expect(error).toMatchObject({ status: 404 });
    expect(sleeps).toEqual([]);
  });

  it('should stop retrying when a rate limit turns into a server error', async () => {
    const pool = mockAgent.get(ORIGIN);
    pool.intercept({ path: PAGE, method: 'GET' }).reply(429, '');
    pool.intercept({ path: PAGE, method: 'GET' }).reply(503, '');

    const error = await client.fetchHtml(`${ORIGIN}${PAGE}`).catch((err: unknown) => err);

    expect(error).toMatchObject({ name: 'FetchError', status: 503 });
    expect(sleeps).toEqual([1000]);
  });

  it('should wrap transport failures', async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: PAGE, method: 'GET' })
      .replyWithError(new Error('connection reset'));

    const error = await client.fetchHtml(`${ORIGIN}${PAGE}`).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ status: null });
    expect(error instanceof Error && error.message).toContain('connection reset');
  });

  it('should follow redirects to the moved page', async () => {
    const pool = mockAgent.get(ORIGIN);
    pool
      .intercept({ path: '/event-details/moved', method: 'GET' })
      .reply(301, '', { headers: { location: `${ORIGIN}${PAGE}` } });
    pool.intercept({ path: PAGE, method: 'GET' }).reply(200, '<p>moved here</p>');

    await expect(client.fetchHtml(`${ORIGIN}/event-details/moved`)).resolves.toBe(
      '<p>moved here</p>',
    );
    expect(sleeps).toEqual([]);
  });
});

describe('backoffDelay', () => {
  it('should double from the base delay', () => {
    expect([0, 1, 2, 3, 4].map((attempt) => backoffDelay(1000, attempt))).toEqual([
      1000, 2000, 4000, 8000, 16000,
    ]);
  });
});
