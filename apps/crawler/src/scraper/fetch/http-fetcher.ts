/**
 * HTTP Fetcher Implementation
 *
 * Uses native fetch API for HTTP requests.
 * Supports timeout, size limits, retries with exponential backoff and jitter,
 * cancellation and a configurable User-Agent.
 */

import type { ILogger } from '@cratedigger/logger'
import { silentLogger } from '@cratedigger/logger'
import type { Fetcher, FetchOptions, FetchResult, RetryPolicy } from '../types.js'
import { DEFAULT_FETCH_HEADERS, DEFAULT_FETCH_OPTIONS, DEFAULT_RETRY_POLICY } from '../types.js'
import { looksLikeChallengeHtml } from './challenge.js'
import type { AttemptResult } from './retry.js'
import { abortableSleep, isRetryableStatus, withRetries } from './retry.js'

export interface HttpFetcherOptions {
  /** Retry policy for transient failures */
  retryPolicy?: RetryPolicy

  /** Headers sent with every request (merged over the defaults) */
  headers?: Record<string, string>

  logger?: ILogger

  /** Injected for tests; defaults to setTimeout */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>

  /** Injected for tests; defaults to Math.random */
  random?: () => number

  /** Injected for tests; defaults to the global fetch */
  fetchImpl?: typeof fetch
}

export { computeRetryDelay, isRetryableStatus } from './retry.js'

/**
 * HTTP-based fetcher using native fetch.
 */
export class HttpFetcher implements Fetcher {
  private readonly retryPolicy: RetryPolicy
  private readonly headers: Record<string, string>
  private readonly logger: ILogger
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>
  private readonly random: () => number
  private readonly fetchImpl: typeof fetch

  constructor(options: HttpFetcherOptions = {}) {
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.headers = { ...DEFAULT_FETCH_HEADERS, ...(options.headers ?? {}) }
    this.logger = options.logger ?? silentLogger
    this.sleep = options.sleep ?? abortableSleep
    this.random = options.random ?? Math.random
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init))
  }

  /**
   * Fetch a URL and return the HTML content. Never throws; exhaustion and
   * cancellation come back as non-ok results.
   */
  async fetch(url: string, options?: FetchOptions): Promise<FetchResult> {
    const timeoutMs = options?.timeoutMs ?? DEFAULT_FETCH_OPTIONS.timeoutMs
    const maxSizeBytes = options?.maxSizeBytes ?? DEFAULT_FETCH_OPTIONS.maxSizeBytes
    const headers = { ...this.headers, ...(options?.headers ?? {}) }
    const signal = options?.signal

    return withRetries(() => this.fetchOnce(url, headers, timeoutMs, maxSizeBytes, signal), {
      url,
      policy: this.retryPolicy,
      sleep: this.sleep,
      random: this.random,
      logger: this.logger,
      signal,
    })
  }

  /**
   * Single fetch attempt (no retries).
   */
  private async fetchOnce(
    url: string,
    headers: Record<string, string>,
    timeoutMs: number,
    maxSizeBytes: number,
    outerSignal?: AbortSignal
  ): Promise<AttemptResult> {
    const startTime = Date.now()
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs)
    const onOuterAbort = () => controller.abort()
    outerSignal?.addEventListener('abort', onOuterAbort, { once: true })

    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers,
        signal: controller.signal,
        redirect: 'follow',
      })

      if (!response.ok) {
        const text = await response.text()
        const challenge = looksLikeChallengeHtml(text)
        return {
          status: challenge ? 'challenge' : response.status === 403 ? 'blocked' : 'error',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: challenge ? 'Anti-bot challenge page' : `HTTP ${response.status}: ${response.statusText}`,
          retryable: isRetryableStatus(this.retryPolicy, response.status),
        }
      }

      // Check content length header for early size check
      const contentLength = response.headers.get('content-length')
      if (contentLength && parseInt(contentLength, 10) > maxSizeBytes) {
        return {
          status: 'too_large',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: `Response too large: ${contentLength} bytes`,
          retryable: false,
        }
      }

      const html = await this.readBodyWithLimit(response, maxSizeBytes)
      if (html === null) {
        return {
          status: 'too_large',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: 'Response exceeded size limit',
          retryable: false,
        }
      }

      // A 200 interstitial is not retried here; a renderer may get past it
      if (looksLikeChallengeHtml(html)) {
        return {
          status: 'challenge',
          statusCode: response.status,
          html,
          durationMs: Date.now() - startTime,
          error: 'Anti-bot challenge page',
          retryable: false,
        }
      }

      return {
        status: 'ok',
        statusCode: response.status,
        html,
        durationMs: Date.now() - startTime,
        retryable: false,
      }
    } catch (error) {
      if (outerSignal?.aborted) {
        return {
          status: 'aborted',
          durationMs: Date.now() - startTime,
          error: 'Fetch cancelled',
          retryable: false,
        }
      }

      if (error instanceof Error && error.name === 'AbortError') {
        return {
          status: 'timeout',
          durationMs: Date.now() - startTime,
          error: `Request timed out after ${timeoutMs}ms`,
          retryable: true,
        }
      }

      return {
        status: 'error',
        durationMs: Date.now() - startTime,
        error: error instanceof Error ? error.message : String(error),
        retryable: true,
      }
    } finally {
      clearTimeout(timeoutId)
      outerSignal?.removeEventListener('abort', onOuterAbort)
    }
  }

  /**
   * Read response body with size limit.
   * Returns null if size exceeds limit.
   */
  private async readBodyWithLimit(response: Response, maxBytes: number): Promise<string | null> {
    const reader = response.body?.getReader()
    if (!reader) {
      return ''
    }

    const chunks: Uint8Array[] = []
    let totalSize = 0

    try {
      while (true) {
        const { done, value } = await reader.read()
        if (done) break

        totalSize += value.length
        if (totalSize > maxBytes) {
          await reader.cancel()
          return null
        }

        chunks.push(value)
      }

      return new TextDecoder('utf-8').decode(Buffer.concat(chunks))
    } finally {
      reader.releaseLock()
    }
  }
}
