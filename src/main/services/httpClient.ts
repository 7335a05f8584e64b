/**
 * Provider HTTP Client
 *
 * Thin axios wrapper shared by the provider implementations. Every request
 * waits for a slot in a FIFO rate limiter, carries a timeout, and is retried
 * with exponential backoff on network errors, 429 and 5xx responses.
 *
 * Outcomes:
 * - 2xx: the response body
 * - 404 and other 4xx: null ("not found", never retried)
 * - retryable failure on the last attempt: ProviderError
 */

import axios from 'axios';
import { ProviderError } from './errors';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface HttpClientOptions {
  /** Provider name recorded on ProviderError */
  provider: string;
  /** Per-request timeout in ms */
  timeoutMs: number;
  /** Retries after the first failed attempt */
  maxRetries: number;
  /** Minimum spacing between requests in ms (0 disables limiting) */
  requestIntervalMs: number;
  /** Base delay in ms for exponential backoff */
  baseRetryDelayMs?: number;
  /** Headers sent with every request */
  headers?: Record<string, string>;
}

/** Query parameters */
export type QueryParams = Record<string, string>;

/** Binary response body with its declared content type */
export interface BinaryResponse {
  data: Buffer;
  contentType: string;
}

/** Anything with a `waitForSlot()` gate */
export interface WaitableRateLimiter {
  waitForSlot(): Promise<void>;
}

// ─── Constants ───────────────────────────────────────────────────────────────

const DEFAULT_BASE_RETRY_DELAY = 1_000;
const USER_AGENT = 'music-sidecar/1.0';

// ─── Rate Limiter ────────────────────────────────────────────────────────────

/**
 * FIFO drain-queue rate limiter: callers are released one at a time, at least
 * `intervalMs` apart, in the order they asked.
 */
export class FifoRateLimiter implements WaitableRateLimiter {
  private lastRequestTime = 0;
  private readonly intervalMs: number;
  private readonly waitQueue: Array<() => void> = [];
  private isDraining = false;

  constructor(intervalMs: number) {
    this.intervalMs = intervalMs;
  }

  waitForSlot(): Promise<void> {
    if (this.intervalMs <= 0) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.waitQueue.push(resolve);
      if (!this.isDraining) void this.drain();
    });
  }

  private async drain(): Promise<void> {
    this.isDraining = true;
    while (this.waitQueue.length > 0) {
      const now = Date.now();
      const remaining = this.intervalMs - (now - this.lastRequestTime);
      if (remaining > 0) await new Promise<void>((r) => setTimeout(r, remaining));
      this.lastRequestTime = Date.now();
      const next = this.waitQueue.shift();
      if (next) next();
    }
    this.isDraining = false;
  }
}

// ─── Axios Error Detection ──────────────────────────────────────────────────

/** Type guard for axios-like errors (works with both real and mocked axios) */
interface AxiosLikeError extends Error {
  isAxiosError: boolean;
  code?: string;
  response?: {
    status: number;
    data?: unknown;
  };
}

export function isAxiosLikeError(error: unknown): error is AxiosLikeError {
  return (
    error instanceof Error &&
    'isAxiosError' in error &&
    error.isAxiosError === true
  );
}

/** Status codes that are worth another attempt */
export function isRetryableStatus(status: number | undefined): boolean {
  if (status === undefined) return true;
  return status === 429 || status >= 500;
}

function readContentType(headers: unknown): string {
  if (headers === null || typeof headers !== 'object') return '';
  const value: unknown = 'content-type' in headers ? headers['content-type'] : undefined;
  return typeof value === 'string' ? value : '';
}

// ─── Client ──────────────────────────────────────────────────────────────────

export class ProviderHttpClient {
  private readonly options: HttpClientOptions;
  private readonly rateLimiter: WaitableRateLimiter;

  constructor(options: HttpClientOptions, rateLimiter?: WaitableRateLimiter) {
    this.options = options;
    this.rateLimiter = rateLimiter ?? new FifoRateLimiter(options.requestIntervalMs);
  }

  /**
   * GET returning the parsed JSON body, or null on a 4xx response. The body is
   * unchecked; callers narrow it.
   */
  async getJson(url: string, params?: QueryParams): Promise<unknown> {
    const response = await this.request(url, params, 'json');
    if (response === null) return null;
    return response.data;
  }

  /**
   * GET returning the body as text, or null on a 4xx response.
   */
  async getText(url: string, params?: QueryParams): Promise<string | null> {
    const response = await this.request(url, params, 'text');
    if (response === null) return null;
    const data: unknown = response.data;
    return typeof data === 'string' ? data : String(data);
  }

  /**
   * GET returning the raw bytes and content type, or null on a 4xx response.
   */
  async getBinary(url: string, params?: QueryParams): Promise<BinaryResponse | null> {
    const response = await this.request(url, params, 'arraybuffer');
    if (response === null) return null;
    const data: unknown = response.data;
    const bytes =
      Buffer.isBuffer(data) ? data
        : data instanceof ArrayBuffer ? Buffer.from(data)
          : Buffer.from(String(data));
    return { data: bytes, contentType: readContentType(response.headers) };
  }

  private async request(
    url: string,
    params: QueryParams | undefined,
    responseType: 'json' | 'text' | 'arraybuffer',
  ): Promise<{ data: unknown; headers: unknown } | null> {
    const { maxRetries, timeoutMs, provider } = this.options;
    const baseDelay = this.options.baseRetryDelayMs ?? DEFAULT_BASE_RETRY_DELAY;

    let lastError: ProviderError | null = null;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (attempt > 0) {
        const delay = baseDelay * Math.pow(2, attempt - 1);
        await new Promise<void>((resolve) => setTimeout(resolve, delay));
      }

      await this.rateLimiter.waitForSlot();

      try {
        const response = await axios.get<unknown>(url, {
          params,
          headers: {
            'User-Agent': USER_AGENT,
            ...this.options.headers,
          },
          timeout: timeoutMs,
          responseType,
        });
        return { data: response.data, headers: response.headers };
      } catch (error: unknown) {
        if (isAxiosLikeError(error)) {
          const status = error.response?.status;

          // 404 and other client errors = not found, don't retry
          if (!isRetryableStatus(status)) {
            return null;
          }

          lastError = new ProviderError(`${provider} request failed: ${error.message}`, {
            provider,
            statusCode: status,
            cause: error,
          });
        } else {
          lastError = new ProviderError(
            `${provider} request failed: ${error instanceof Error ? error.message : String(error)}`,
            { provider, cause: error instanceof Error ? error : undefined },
          );
        }
      }
    }

    throw lastError ?? new ProviderError(`${provider} request failed`, { provider });
  }
}
