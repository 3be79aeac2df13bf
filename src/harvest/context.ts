import path from 'node:path';
import type { Dispatcher } from 'undici';
import type { Config } from '../config.js';
import { createHttpClient, type HttpClient } from '../workers/http-client.js';
import { logger, type Logger } from '../utils/logger.js';

/**
 * Everything a harvest run needs, built once and passed down explicitly:
 * the shared transport, pool sizes, output location and clock.
 */
export interface HarvestContext {
  baseUrl: string;
  /** Partition directory holding this run's datasets. */
  outputDir: string;
  workerPoolSize: number;
  enumerationPoolSize: number;
  http: HttpClient;
  log: Logger;
  now: () => Date;
}

export interface HarvestContextOverrides {
  dispatcher?: Dispatcher;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  log?: Logger;
}

export function createHarvestContext(
  config: Config,
  overrides: HarvestContextOverrides = {},
): HarvestContext {
  const http = createHttpClient({
    maxRetries: config.MAX_RETRIES,
    backoffBaseMs: config.BACKOFF_BASE_MS,
    timeoutMs: config.REQUEST_TIMEOUT_MS,
    userAgent: config.USER_AGENT,
    dispatcher: overrides.dispatcher,
    sleep: overrides.sleep,
  });

  return {
    baseUrl: config.HARVEST_BASE_URL,
    outputDir: path.resolve(config.OUTPUT_DIR, config.OUTPUT_PARTITION),
    workerPoolSize: config.WORKER_POOL_SIZE,
    enumerationPoolSize: config.ENUMERATION_POOL_SIZE,
    http,
    log: overrides.log ?? logger,
    now: overrides.now ?? (() => new Date()),
  };
}
