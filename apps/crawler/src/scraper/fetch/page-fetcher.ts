/**
 * Page Fetcher
 *
 * Rate limiter → HTTP fetcher or renderer → parsed document.
 *
 * Abstraction the traversal controller talks to, so tests can serve canned
 * documents without any of the network layers.
 */

import type { ILogger } from '@cratedigger/logger'
import { silentLogger } from '@cratedigger/logger'
import { loadHtml } from '../extract/html.js'
import type { Fetcher, PageRenderer, PageResult, PageSource, RateLimiter } from '../types.js'

export interface PageFetcherOptions {
  fetcher: Fetcher
  rateLimiter: RateLimiter
  /** Needed for `requiresJs` and as the fallback for challenge pages */
  renderer?: PageRenderer
  timeoutMs?: number
  logger?: ILogger
}

export class PageFetcher implements PageSource {
  private readonly fetcher: Fetcher
  private readonly rateLimiter: RateLimiter
  private readonly renderer?: PageRenderer
  private readonly timeoutMs?: number
  private readonly logger: ILogger

  constructor(options: PageFetcherOptions) {
    this.fetcher = options.fetcher
    this.rateLimiter = options.rateLimiter
    this.renderer = options.renderer
    this.timeoutMs = options.timeoutMs
    this.logger = options.logger ?? silentLogger
  }

  async fetchPage(url: string, options: { requiresJs?: boolean; signal?: AbortSignal } = {}): Promise<PageResult> {
    const { requiresJs = false, signal } = options

    if (requiresJs && !this.renderer) {
      return { ok: false, url, reason: 'error', error: 'JS rendering requested but no renderer configured', attempts: 0 }
    }

    const renderer = this.renderer
    let result = await this.rateLimiter.schedule(url, () =>
      requiresJs && renderer
        ? renderer.render(url, { signal, timeoutMs: this.timeoutMs })
        : this.fetcher.fetch(url, { signal, timeoutMs: this.timeoutMs })
    )

    if (result.status === 'challenge' && !requiresJs && renderer) {
      this.logger.info('Challenge page, retrying through renderer', { url })
      result = await this.rateLimiter.schedule(url, () => renderer.render(url, { signal, timeoutMs: this.timeoutMs }))
    }

    if (result.status !== 'ok' || result.html === undefined) {
      this.logger.debug('Fetch failed', { url, status: result.status, statusCode: result.statusCode })
      return {
        ok: false,
        url,
        reason: result.status,
        error: result.error ?? `Fetch ended with status ${result.status}`,
        statusCode: result.statusCode,
        attempts: result.attempts,
      }
    }

    return { ok: true, url, html: result.html, $: loadHtml(result.html), attempts: result.attempts }
  }

  async close(): Promise<void> {
    await this.renderer?.close()
  }
}
