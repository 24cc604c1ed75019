/**
 * HTTP Client
 *
 * Single fetch path for the statistics service:
 * - Increasing backoff with jitter between attempts
 * - Per-request timeout via AbortController
 * - Retry only on overload / rate-limit / transient network failures
 * - Typed errors for every failure mode
 *
 * USAGE:
 * ```typescript
 * const client = new HTTPClient({ maxRetries: 2, timeoutMs: 30000 });
 * const body = await client.fetchJSON(
 *   buildUrl('https://api.example.com/dataset/X.json', { geography: '123' })
 * );
 * ```
 */

import { logger } from './utils/logger.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface HTTPClientConfig {
  /** Maximum retry attempts after the first request (default: 2) */
  readonly maxRetries: number;

  /** Delay before the first retry in milliseconds (default: 1000) */
  readonly initialDelayMs: number;

  /** Backoff multiplier between consecutive retries (default: 3) */
  readonly backoffMultiplier: number;

  /** Maximum delay between retries in milliseconds (default: 30000) */
  readonly maxDelayMs: number;

  /** Request timeout in milliseconds (default: 30000) */
  readonly timeoutMs: number;

  /** User-Agent header */
  readonly userAgent: string;

  /** Jitter factor applied to each delay (0-1, default: 0.1) */
  readonly jitterFactor: number;
}

/**
 * Per-request fetch options (override client defaults)
 */
export interface FetchOptions {
  readonly timeoutMs?: number;
  readonly retries?: number;
}

export const DEFAULT_HTTP_CONFIG: HTTPClientConfig = {
  maxRetries: 2,
  initialDelayMs: 1000,
  backoffMultiplier: 3,
  maxDelayMs: 30000,
  timeoutMs: 30000,
  userAgent: 'transit-eqia/0.1',
  jitterFactor: 0.1,
};

// ============================================================================
// Error Types
// ============================================================================

/**
 * Non-2xx HTTP response
 */
export class HTTPError extends Error {
  readonly statusCode: number;
  readonly url: string;
  readonly bodySnippet: string;

  constructor(message: string, statusCode: number, url: string, bodySnippet = '') {
    super(message);
    this.name = 'HTTPError';
    this.statusCode = statusCode;
    this.url = url;
    this.bodySnippet = bodySnippet;
  }
}

/**
 * Request timeout error (AbortController triggered)
 */
export class HTTPTimeoutError extends Error {
  readonly url: string;
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms: ${url}`);
    this.name = 'HTTPTimeoutError';
    this.url = url;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Network error (connection failed, DNS resolution, etc.)
 */
export class HTTPNetworkError extends Error {
  readonly url: string;
  readonly cause: Error;

  constructor(url: string, cause: Error) {
    super(`Network error: ${cause.message}`);
    this.name = 'HTTPNetworkError';
    this.url = url;
    this.cause = cause;
  }
}

/**
 * 2xx response with an empty body
 */
export class HTTPEmptyBodyError extends Error {
  readonly url: string;

  constructor(url: string) {
    super(`Empty response body: ${url}`);
    this.name = 'HTTPEmptyBodyError';
    this.url = url;
  }
}

/**
 * JSON parse error
 */
export class HTTPJSONParseError extends Error {
  readonly url: string;
  readonly responseText: string;
  readonly cause: Error;

  constructor(url: string, responseText: string, cause: Error) {
    super(`Failed to parse JSON response: ${cause.message}`);
    this.name = 'HTTPJSONParseError';
    this.url = url;
    this.responseText = responseText.slice(0, 500);
    this.cause = cause;
  }
}

// ============================================================================
// URL helpers
// ============================================================================

/**
 * Append query parameters to a base URL, skipping undefined values
 */
export function buildUrl(
  base: string,
  params: Readonly<Record<string, string | undefined>>
): string {
  const url = new URL(base);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      url.searchParams.set(key, value);
    }
  }
  return url.toString();
}

// ============================================================================
// HTTP Client Implementation
// ============================================================================

const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([408, 429, 500, 502, 503, 504]);

export class HTTPClient {
  private readonly config: HTTPClientConfig;

  constructor(config?: Partial<HTTPClientConfig>) {
    this.config = { ...DEFAULT_HTTP_CONFIG, ...config };
  }

  /**
   * Fetch and parse a JSON response
   *
   * @throws {HTTPError} For non-retryable or final HTTP error responses
   * @throws {HTTPTimeoutError} If the final attempt exceeds the timeout
   * @throws {HTTPNetworkError} For network failures on the final attempt
   * @throws {HTTPEmptyBodyError} If the body is blank
   * @throws {HTTPJSONParseError} If the body is not valid JSON
   */
  async fetchJSON(url: string, options?: FetchOptions): Promise<unknown> {
    const response = await this.fetchWithRetry(url, options);
    const text = await response.text();

    if (text.trim() === '') {
      throw new HTTPEmptyBodyError(url);
    }

    try {
      const body: unknown = JSON.parse(text);
      return body;
    } catch (error) {
      throw new HTTPJSONParseError(
        url,
        text,
        error instanceof Error ? error : new Error(String(error))
      );
    }
  }

  /**
   * Fetch raw response with retry logic. The final attempt's error is thrown
   * as is.
   */
  async fetchWithRetry(url: string, options?: FetchOptions): Promise<Response> {
    const maxRetries = options?.retries ?? this.config.maxRetries;

    for (let attempt = 1; ; attempt++) {
      const isLastAttempt = attempt === maxRetries + 1;

      try {
        const response = await this.fetchWithTimeout(url, options);

        if (response.ok) {
          return response;
        }

        const snippet = await this.readSnippet(response);
        const error = new HTTPError(
          `HTTP ${response.status}: ${response.statusText}`,
          response.status,
          url,
          snippet
        );

        if (!RETRYABLE_STATUSES.has(response.status) || isLastAttempt) {
          throw error;
        }

        logger.warn('HTTPClient attempt failed', {
          attempt,
          maxAttempts: maxRetries + 1,
          statusCode: response.status,
          url,
        });
      } catch (error) {
        const failure = error instanceof Error ? error : new Error(String(error));

        if (!this.isRetryableError(failure) || isLastAttempt) {
          throw failure;
        }

        logger.warn('HTTPClient attempt failed', {
          attempt,
          maxAttempts: maxRetries + 1,
          error: failure.message,
          url,
        });
      }

      await this.sleep(this.calculateBackoffDelay(attempt));
    }
  }

  private async fetchWithTimeout(url: string, options?: FetchOptions): Promise<Response> {
    const timeoutMs = options?.timeoutMs ?? this.config.timeoutMs;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      return await fetch(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.config.userAgent,
          Accept: 'application/json',
        },
        signal: controller.signal,
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new HTTPTimeoutError(url, timeoutMs);
      }

      throw new HTTPNetworkError(
        url,
        error instanceof Error ? error : new Error(String(error))
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async readSnippet(response: Response): Promise<string> {
    try {
      return (await response.text()).slice(0, 500);
    } catch (error) {
      logger.debug('Could not read error response body', {
        error: error instanceof Error ? error.message : String(error),
      });
      return '';
    }
  }

  /**
   * initialDelay * multiplier^(attempt - 1), capped, with jitter
   */
  private calculateBackoffDelay(attempt: number): number {
    const exponentialDelay =
      this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);
    const jitterRange = cappedDelay * this.config.jitterFactor;
    const jitter = Math.random() * 2 * jitterRange - jitterRange;

    return Math.max(0, Math.floor(cappedDelay + jitter));
  }

  private isRetryableError(error: Error): boolean {
    if (error instanceof HTTPTimeoutError || error instanceof HTTPNetworkError) {
      return true;
    }
    if (error instanceof HTTPError) {
      return RETRYABLE_STATUSES.has(error.statusCode);
    }
    return false;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
