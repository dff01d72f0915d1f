/**
 * HTTP Client for external lookups
 *
 * Thin wrapper over native fetch used by the geocoder:
 * - Exponential backoff with jitter on retryable failures
 * - Per-request timeout via AbortController
 * - Typed errors for HTTP status, timeout, network and JSON failures
 *
 * USAGE:
 * ```typescript
 * const client = new HTTPClient({ maxRetries: 2, timeoutMs: 10000 });
 * const hits = await client.fetchJSON<unknown>('https://nominatim.example/search?q=cafe');
 * ```
 */

import { createLogger } from './utils/logger.js';

const logger = createLogger({ module: 'http-client' });

// ============================================================================
// Configuration Types
// ============================================================================

export interface HTTPClientConfig {
  /** Maximum retry attempts (default: 3) */
  readonly maxRetries: number;

  /** Delay before the first retry in milliseconds (default: 1000) */
  readonly initialDelayMs: number;

  /** Exponential backoff multiplier (default: 2) */
  readonly backoffMultiplier: number;

  /** Upper bound for a single backoff delay (default: 30000) */
  readonly maxDelayMs: number;

  /** Request timeout in milliseconds (default: 30000) */
  readonly timeoutMs: number;

  /** User-Agent header; Nominatim refuses anonymous clients */
  readonly userAgent: string;

  /** Jitter factor 0-1 (default: 0.1) */
  readonly jitterFactor: number;
}

// ============================================================================
// Error Types
// ============================================================================

export class HTTPError extends Error {
  readonly statusCode: number;
  readonly url: string;

  constructor(message: string, statusCode: number, url: string) {
    super(message);
    this.name = 'HTTPError';
    this.statusCode = statusCode;
    this.url = url;
  }
}

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

export class HTTPRetryExhaustedError extends Error {
  readonly url: string;
  readonly attempts: number;
  readonly lastError: Error;

  constructor(url: string, attempts: number, lastError: Error) {
    super(`Retry exhausted after ${attempts} attempts: ${lastError.message}`);
    this.name = 'HTTPRetryExhaustedError';
    this.url = url;
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

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
// HTTP Client Implementation
// ============================================================================

const RETRYABLE_STATUS = new Set([408, 429, 500, 502, 503, 504]);

export class HTTPClient {
  private readonly config: HTTPClientConfig;

  constructor(config?: Partial<HTTPClientConfig>) {
    this.config = {
      maxRetries: 3,
      initialDelayMs: 1000,
      backoffMultiplier: 2,
      maxDelayMs: 30000,
      timeoutMs: 30000,
      userAgent: 'kd-places/1.0',
      jitterFactor: 0.1,
      ...config,
    };
  }

  /**
   * Fetch and parse a JSON response
   *
   * @throws {HTTPError} For non-retryable or final 4xx/5xx responses
   * @throws {HTTPTimeoutError} If the request exceeds its timeout
   * @throws {HTTPNetworkError} For connection failures
   * @throws {HTTPJSONParseError} If the body is not valid JSON
   */
  async fetchJSON<T = unknown>(url: string): Promise<T> {
    const response = await this.fetchWithRetry(url);
    const text = await response.text();

    try {
      return JSON.parse(text) as T;
    } catch (error) {
      throw new HTTPJSONParseError(
        url,
        text,
        error instanceof Error ? error : new Error(String(error))
      );
    }
  }

  /**
   * Fetch a raw response, retrying transient failures
   */
  private async fetchWithRetry(url: string): Promise<Response> {
    const { maxRetries } = this.config;
    let lastError: Error | null = null;

    for (let attempt = 1; attempt <= maxRetries + 1; attempt++) {
      const isLastAttempt = attempt === maxRetries + 1;

      try {
        const response = await this.fetchWithTimeout(url);

        if (response.ok) {
          return response;
        }

        const error = new HTTPError(
          `HTTP ${response.status}: ${response.statusText}`,
          response.status,
          url
        );

        if (!RETRYABLE_STATUS.has(response.status) || isLastAttempt) {
          throw error;
        }

        lastError = error;
        logger.warn('HTTPClient attempt failed', {
          attempt,
          maxAttempts: maxRetries + 1,
          statusCode: response.status,
          url,
        });
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (!this.isRetryableError(lastError) || isLastAttempt) {
          throw lastError;
        }

        logger.warn('HTTPClient attempt failed', {
          attempt,
          maxAttempts: maxRetries + 1,
          error: lastError.message,
          url,
        });
      }

      await this.sleep(this.calculateBackoffDelay(attempt));
    }

    throw new HTTPRetryExhaustedError(url, maxRetries + 1, lastError ?? new Error('Unknown error'));
  }

  private async fetchWithTimeout(url: string): Promise<Response> {
    const { timeoutMs } = this.config;
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
      if (error instanceof Error && error.name === 'AbortError' && controller.signal.aborted) {
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

  private calculateBackoffDelay(attempt: number): number {
    const exponentialDelay =
      this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);
    const jitterRange = cappedDelay * this.config.jitterFactor;
    const jitter = Math.random() * 2 * jitterRange - jitterRange;

    return Math.max(0, Math.floor(cappedDelay + jitter));
  }

  private isRetryableError(error: Error): boolean {
    if (error instanceof HTTPError) {
      return RETRYABLE_STATUS.has(error.statusCode);
    }
    return error instanceof HTTPTimeoutError || error instanceof HTTPNetworkError;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
