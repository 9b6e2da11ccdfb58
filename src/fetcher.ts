/**
 * Document fetchers: turn a URL into a parsed DOM Document
 */

import { parseDocument } from "./dom.js";
import { FetchError, errorMessage } from "./errors.js";

/** Renders a URL into a parsed document */
export interface DocumentFetcher {
  /**
   * @param url - Page to load
   * @param waitHint - Milliseconds to let client-side scripts render; fetchers without scripts ignore it
   */
  fetch(url: string, waitHint: number): Promise<Document>;
  close?(): Promise<void>;
}

// Retry with exponential backoff + jitter for transient failures

export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  retryableStatuses?: number[];
  /** Timeout of each attempt in milliseconds; every attempt gets a fresh signal */
  timeoutMs?: number;
  /** Called before each retry with a description of what failed */
  onRetry?: (message: string) => void;
}

const DEFAULT_RETRY_OPTIONS: Required<Omit<RetryOptions, "onRetry" | "timeoutMs">> = {
  maxAttempts: 3,
  baseDelayMs: 250,
  maxDelayMs: 10000,
  retryableStatuses: [429, 500, 502, 503, 504],
};

function isRetryableError(error: unknown): boolean {
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes("network") ||
      message.includes("timeout") ||
      message.includes("econnreset") ||
      message.includes("econnrefused") ||
      message.includes("socket hang up") ||
      message.includes("fetch failed")
    );
  }
  return false;
}

function calculateBackoff(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const jitter = Math.random() * baseDelayMs;
  return Math.min(exponentialDelay + jitter, maxDelayMs);
}

/**
 * Fetch a URL, retrying network errors and retryable HTTP statuses.
 * A non-retryable status is returned as is; callers check `response.ok`.
 *
 * @param url - URL to fetch
 * @param init - Request options passed to `fetch`
 * @param options - Retry behaviour
 * @returns The last response received
 * @throws The last network error once attempts are exhausted
 */
export async function fetchWithRetry(url: string, init: RequestInit = {}, options?: RetryOptions): Promise<Response> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  let lastError: Error | null = null;

  for (let attempt = 0; attempt < opts.maxAttempts; attempt++) {
    try {
      const attemptInit = opts.timeoutMs === undefined ? init : { ...init, signal: AbortSignal.timeout(opts.timeoutMs) };
      const response = await fetch(url, attemptInit);

      if (response.ok) {
        return response;
      }

      if (opts.retryableStatuses.includes(response.status) && attempt < opts.maxAttempts - 1) {
        const retryAfter = response.headers.get("retry-after");
        const retryAfterMs = retryAfter ? parseInt(retryAfter, 10) * 1000 : NaN;
        const wait = isNaN(retryAfterMs)
          ? calculateBackoff(attempt, opts.baseDelayMs, opts.maxDelayMs)
          : Math.min(retryAfterMs, opts.maxDelayMs);

        opts.onRetry?.(
          `Retryable status ${response.status} from ${url}, attempt ${attempt + 1}/${opts.maxAttempts}, waiting ${wait}ms`,
        );
        await new Promise((resolve) => setTimeout(resolve, wait));
        continue;
      }

      return response;
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (isRetryableError(error) && attempt < opts.maxAttempts - 1) {
        const wait = calculateBackoff(attempt, opts.baseDelayMs, opts.maxDelayMs);
        opts.onRetry?.(`Network error: ${lastError.message}, attempt ${attempt + 1}/${opts.maxAttempts}, waiting ${wait}ms`);
        await new Promise((resolve) => setTimeout(resolve, wait));
        continue;
      }

      throw lastError;
    }
  }

  throw lastError ?? new Error(`Failed after ${opts.maxAttempts} attempts`);
}

/** Options for {@link HttpDocumentFetcher} */
export interface HttpFetcherOptions {
  userAgent?: string;
  /** Per-request timeout in milliseconds */
  timeout?: number;
  retry?: RetryOptions;
}

/** Default timeout for a single page request */
export const DEFAULT_HTTP_TIMEOUT = 30000;

/**
 * Fetch pages over plain HTTP. Client-side scripts never run, so the wait hint is ignored.
 */
export class HttpDocumentFetcher implements DocumentFetcher {
  private readonly userAgent: string | undefined;
  private readonly timeout: number;
  private readonly retry: RetryOptions | undefined;

  constructor(options: HttpFetcherOptions = {}) {
    this.userAgent = options.userAgent;
    this.timeout = options.timeout ?? DEFAULT_HTTP_TIMEOUT;
    this.retry = options.retry;
  }

  async fetch(url: string, _waitHint: number): Promise<Document> {
    const headers: Record<string, string> = { Accept: "text/html,application/xhtml+xml" };
    if (this.userAgent) headers["User-Agent"] = this.userAgent;

    let response: Response;
    try {
      response = await fetchWithRetry(url, { headers }, { ...this.retry, timeoutMs: this.timeout });
    } catch (error) {
      throw new FetchError(errorMessage(error), url, { cause: error });
    }

    if (!response.ok) {
      throw new FetchError(`HTTP ${response.status} ${response.statusText}`.trim(), url);
    }

    return parseDocument(await response.text(), response.url || url);
  }
}
