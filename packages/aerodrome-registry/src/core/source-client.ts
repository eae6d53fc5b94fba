/**
 * Source Feed HTTP Client
 *
 * Retrieves the raw primary and secondary feeds as text with:
 * - Configurable timeouts via AbortController
 * - Error classification (HTTP status, timeout, network)
 * - A single `SourceUnavailableError` surface for callers
 *
 * There is no retry: a failed fetch aborts the sync and the operator
 * re-runs it.
 *
 * USAGE:
 * ```typescript
 * const client = new SourceClient({ timeoutMs: 60000 });
 * const csv = await client.fetchText('https://example.org/airports.csv');
 * ```
 */

import { SourceUnavailableError } from './errors.js';
import { logger as defaultLogger, type Logger } from './utils/logger.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface SourceClientConfig {
  /** Request timeout in milliseconds (default: 60000) */
  readonly timeoutMs: number;

  /** User-Agent header */
  readonly userAgent: string;
}

/**
 * Text retrieval capability, injectable for tests
 */
export type FetchText = (url: string) => Promise<string>;

// ============================================================================
// Error Types
// ============================================================================

/**
 * Non-2xx HTTP response
 */
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

  constructor(url: string, cause: Error) {
    super(`Network error: ${cause.message}`, { cause });
    this.name = 'HTTPNetworkError';
    this.url = url;
  }
}

// ============================================================================
// Client Implementation
// ============================================================================

export class SourceClient {
  private readonly config: SourceClientConfig;
  private readonly logger: Logger;

  constructor(config?: Partial<SourceClientConfig>, logger: Logger = defaultLogger) {
    this.config = {
      timeoutMs: 60000,
      userAgent: 'aerodrome-registry/1.0',
      ...config,
    };
    this.logger = logger;
  }

  /**
   * Fetch a feed as UTF-8 text
   *
   * @throws {SourceUnavailableError} wrapping HTTPError, HTTPTimeoutError or HTTPNetworkError
   */
  async fetchText(url: string): Promise<string> {
    try {
      const response = await this.fetchWithTimeout(url);

      if (!response.ok) {
        throw new HTTPError(
          `HTTP ${response.status}: ${response.statusText}`,
          response.status,
          url
        );
      }

      const text = await response.text();
      this.logger.debug('Fetched source', { url, bytes: text.length });
      return text;
    } catch (error) {
      this.logger.error('Source fetch failed', {
        url,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new SourceUnavailableError(url, error);
    }
  }

  /**
   * Fetch with timeout using AbortController
   */
  private async fetchWithTimeout(url: string): Promise<Response> {
    const timeoutMs = this.config.timeoutMs;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      return await fetch(url, {
        method: 'GET',
        headers: { 'User-Agent': this.config.userAgent },
        redirect: 'follow',
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
}
