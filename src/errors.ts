/**
 * A request that could not produce a usable page: a non-success status or a
 * transport failure. Never retried by the fetcher; the harvest treats it as a
 * failure of the single item that requested the page.
 */
export class FetchError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/** The source kept answering 429 after every backoff step. */
export class TransientFetchError extends FetchError {
  constructor(url: string, public readonly attempts: number) {
    super(`Rate limited after ${attempts} attempts`, url, 429);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
