import fetch, { FetchError, RequestInit, Response } from 'node-fetch';
import { ProviderError, TransientIOError } from '../errors.js';

const USER_AGENT = 'price-drop-watch/0.1 (automated price tracking)';

/**
 * Default headers for all requests
 */
const DEFAULT_HEADERS = {
  'User-Agent': USER_AGENT,
  'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
};

export const DEFAULT_TIMEOUT_MS = 15_000;

/**
 * HTTP statuses worth another attempt
 */
const TRANSIENT_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504]);

export interface HttpOptions {
  /** Per-request timeout; expiry surfaces as a TransientIOError */
  timeoutMs?: number;
  /** Caller cancellation, e.g. the run deadline */
  signal?: AbortSignal;
  headers?: Record<string, string>;
}

function requestSignal(options: HttpOptions): AbortSignal {
  const timeout = AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
  return options.signal ? AbortSignal.any([timeout, options.signal]) : timeout;
}

/**
 * Fetch with custom User-Agent, timeout and error classification.
 * Network errors and timeouts become TransientIOError; a caller abort is rethrown as is.
 */
export async function fetchWithUserAgent(
  url: string,
  init: RequestInit = {},
  options: HttpOptions = {}
): Promise<Response> {
  const headers = {
    ...DEFAULT_HEADERS,
    ...options.headers,
  };

  try {
    return await fetch(url, {
      ...init,
      headers,
      signal: requestSignal(options),
    });
  } catch (error) {
    if (options.signal?.aborted) {
      throw error;
    }
    if (error instanceof FetchError || (error instanceof Error && error.name === 'AbortError')) {
      throw new TransientIOError(`Request to ${url} failed: ${error.message}`, undefined, { cause: error });
    }
    throw error;
  }
}

/**
 * Turn a non-2xx response into the matching error
 */
export async function assertOk(response: Response, label: string): Promise<void> {
  if (response.ok) {
    return;
  }
  const text = await response.text().catch(() => '');
  const message = `${label} failed: ${response.status} ${response.statusText}${text ? ` - ${text.slice(0, 200)}` : ''}`;
  if (TRANSIENT_STATUSES.has(response.status)) {
    throw new TransientIOError(message, response.status);
  }
  throw new ProviderError(message, response.status);
}

/**
 * Fetch HTML content from a URL
 */
export async function fetchHtml(url: string, options: HttpOptions = {}): Promise<string> {
  const response = await fetchWithUserAgent(url, {}, options);
  await assertOk(response, `GET ${url}`);
  return response.text();
}

/**
 * POST a JSON body and parse the JSON answer
 */
export async function postJson<T>(url: string, body: unknown, options: HttpOptions = {}): Promise<T> {
  const response = await fetchWithUserAgent(
    url,
    {
      method: 'POST',
      body: JSON.stringify(body),
    },
    {
      ...options,
      headers: {
        'Accept': 'application/json',
        'Content-Type': 'application/json',
        ...options.headers,
      },
    }
  );
  await assertOk(response, `POST ${url}`);
  return (await response.json()) as T;
}

/**
 * POST a form-encoded body and parse the JSON answer
 */
export async function postForm<T>(
  url: string,
  form: Record<string, string>,
  options: HttpOptions = {}
): Promise<T> {
  const response = await fetchWithUserAgent(
    url,
    {
      method: 'POST',
      body: new URLSearchParams(form).toString(),
    },
    {
      ...options,
      headers: {
        'Accept': 'application/json',
        'Content-Type': 'application/x-www-form-urlencoded',
        ...options.headers,
      },
    }
  );
  await assertOk(response, `POST ${url}`);
  return (await response.json()) as T;
}

/**
 * Sleep for a given number of milliseconds
 * Used for backoff between attempts; an abort ends the wait early
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
