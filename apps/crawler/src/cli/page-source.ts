import type { CrawlerConfig } from '../config/crawl-config.js'
import { loggers } from '../config/logger.js'
import { PlaywrightRenderer } from '../scraper/fetch/browser-renderer.js'
import { HttpFetcher } from '../scraper/fetch/http-fetcher.js'
import { PageFetcher } from '../scraper/fetch/page-fetcher.js'
import { InMemoryRateLimiter } from '../scraper/fetch/rate-limiter.js'
import { DEFAULT_FETCH_HEADERS, DEFAULT_RETRY_POLICY } from '../scraper/types.js'
import type { PageSource } from '../scraper/types.js'

export interface PageSourceOptions {
  /** Attach a headless browser for JS pages and challenge fallback */
  render?: boolean
}

export type PageSourceFactory = (config: CrawlerConfig, options: PageSourceOptions) => PageSource

/**
 * The production fetch stack: rate limiter, HTTP fetcher with retries and an
 * optional browser renderer.
 */
export const createPageSource: PageSourceFactory = (config, options) => {
  const headers = { ...DEFAULT_FETCH_HEADERS, 'User-Agent': config.userAgent }

  const retryPolicy = {
    ...DEFAULT_RETRY_POLICY,
    maxAttempts: config.maxRetries + 1,
    baseDelayMs: config.retryBaseDelayMs,
  }

  const fetcher = new HttpFetcher({
    retryPolicy,
    headers,
    logger: loggers.fetcher,
  })

  const rateLimiter = new InMemoryRateLimiter({
    defaultConfig: { minDelayMs: config.minDelayMs, maxDelayMs: config.maxDelayMs },
  })

  const renderer = options.render
    ? new PlaywrightRenderer({
        executablePath: config.browserExecutablePath,
        headless: config.browserHeadless,
        userAgent: config.userAgent,
        retryPolicy,
        logger: loggers.fetcher,
      })
    : undefined

  return new PageFetcher({
    fetcher,
    rateLimiter,
    renderer,
    timeoutMs: config.timeoutMs,
    logger: loggers.fetcher,
  })
}
