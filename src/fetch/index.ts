import { FetchError } from '../errors';
import type { Logger } from '../utils/logger';
import { defaultLogger } from '../utils/logger';

export const DEFAULT_API_URL = 'https://api.bmrb.io/v2';

type FetchLike = (url: string, init?: { headers?: Record<string, string> }) => Promise<{
  ok: boolean;
  status: number;
  text(): Promise<string>;
}>;

export interface FetchOptions {
  baseUrl?: string;
  /** Defaults to the global `fetch`. */
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
  /** First back-off in milliseconds; each retry waits five times longer. */
  initialDelayMs?: number;
  /** Give up once the next wait would exceed this. */
  maxDelayMs?: number;
}

const RATE_LIMITED = new Set([403, 429]);

function defaultSleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * GET `url` as text. Rate-limit responses are retried with exponential
 * back-off; any other failure is reported as a FetchError.
 */
export async function fetchText(url: string, options: FetchOptions = {}): Promise<string> {
  const fetchImpl: FetchLike = options.fetchImpl ?? fetch;
  const sleep = options.sleep ?? defaultSleep;
  const logger = options.logger ?? defaultLogger;
  const maxDelay = options.maxDelayMs ?? 25_000;
  let delay = options.initialDelayMs ?? 5_000;

  for (;;) {
    const res = await fetchImpl(url, { headers: { Application: 'nmrstar-kit' } });
    if (res.ok) return res.text();

    if (res.status === 404) {
      throw new FetchError(`Server returned 404 for ${url}.`, url, 404);
    }
    if (!RATE_LIMITED.has(res.status)) {
      throw new FetchError(`Request failed with status ${res.status}.`, url, res.status);
    }
    if (delay > maxDelay) {
      throw new FetchError(`Continued to receive ${res.status} after multiple wait times.`, url, res.status);
    }
    logger.warn(`We were rate limited. Sleeping for ${delay / 1000} seconds.`);
    await sleep(delay);
    delay *= 5;
  }
}

/** Normalise an accession such as `bmr15000` to the archive's ID form. */
export function normalizeEntryId(entryId: string | number): string {
  const id = String(entryId).trim().toLowerCase();
  return id.startsWith('bmr') ? id.slice(3) : id;
}

export function entryUrl(entryId: string | number, baseUrl = DEFAULT_API_URL): string {
  return `${baseUrl.replace(/\/+$/, '')}/entry/${encodeURIComponent(normalizeEntryId(entryId))}?format=rawnmrstar`;
}

export async function fetchEntryText(entryId: string | number, options: FetchOptions = {}): Promise<string> {
  const url = entryUrl(entryId, options.baseUrl);
  try {
    return await fetchText(url, options);
  } catch (error) {
    if (error instanceof FetchError && error.status === 404) {
      throw new FetchError(`Entry ${normalizeEntryId(entryId)} does not exist in the public database.`, url, 404);
    }
    throw error;
  }
}
