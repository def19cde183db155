/**
 * Headless-browser renderer for pages that need JavaScript or sit behind an
 * anti-bot interstitial.
 *
 * Uses playwright-core, which ships no browser: point BROWSER_EXECUTABLE_PATH
 * at an installed Chromium/Chrome. At most one browser per renderer; it is
 * launched on the first render and released by close().
 */

import { chromium } from 'playwright-core'
import type { ILogger } from '@cratedigger/logger'
import { silentLogger } from '@cratedigger/logger'
import type { FetchResult, PageRenderer, RetryPolicy } from '../types.js'
import { DEFAULT_FETCH_HEADERS, DEFAULT_FETCH_OPTIONS, DEFAULT_RETRY_POLICY } from '../types.js'
import { isChallengePage } from './challenge.js'
import type { AttemptResult } from './retry.js'
import { abortableSleep, isRetryableStatus, withRetries } from './retry.js'

/** Subset of a playwright Page the renderer drives */
export interface RendererPage {
  goto(url: string, options?: { timeout?: number; waitUntil?: 'domcontentloaded' | 'load' }): Promise<{ status(): number } | null>
  title(): Promise<string>
  innerText(selector: string): Promise<string>
  content(): Promise<string>
  waitForTimeout(ms: number): Promise<void>
  close(): Promise<void>
}

export interface RendererBrowser {
  newPage(options?: { userAgent?: string }): Promise<RendererPage>
  close(): Promise<void>
}

export interface BrowserLaunchOptions {
  executablePath?: string
  headless: boolean
}

export interface PlaywrightRendererOptions {
  executablePath?: string
  headless?: boolean
  userAgent?: string
  /** Times the challenge predicate is re-checked before giving up */
  maxChallengeChecks?: number
  challengeWaitMs?: number
  /** Same policy as the HTTP fetcher: error statuses and timeouts are retried */
  retryPolicy?: RetryPolicy
  logger?: ILogger
  /** Injected for tests; defaults to setTimeout */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
  /** Injected for tests; defaults to Math.random */
  random?: () => number
  /** Injected for tests; defaults to chromium.launch */
  launch?: (options: BrowserLaunchOptions) => Promise<RendererBrowser>
}

async function launchChromium(options: BrowserLaunchOptions): Promise<RendererBrowser> {
  return chromium.launch({ executablePath: options.executablePath, headless: options.headless })
}

export class PlaywrightRenderer implements PageRenderer {
  private readonly options: Required<
    Omit<PlaywrightRendererOptions, 'executablePath' | 'logger' | 'launch' | 'retryPolicy' | 'sleep' | 'random'>
  >
  private readonly executablePath?: string
  private readonly retryPolicy: RetryPolicy
  private readonly logger: ILogger
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>
  private readonly random: () => number
  private readonly launch: (options: BrowserLaunchOptions) => Promise<RendererBrowser>
  private browser: Promise<RendererBrowser> | null = null

  constructor(options: PlaywrightRendererOptions = {}) {
    this.options = {
      headless: options.headless ?? true,
      userAgent: options.userAgent ?? DEFAULT_FETCH_HEADERS['User-Agent'],
      maxChallengeChecks: options.maxChallengeChecks ?? 6,
      challengeWaitMs: options.challengeWaitMs ?? 5000,
    }
    this.executablePath = options.executablePath
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.logger = options.logger ?? silentLogger
    this.sleep = options.sleep ?? abortableSleep
    this.random = options.random ?? Math.random
    this.launch = options.launch ?? launchChromium
  }

  /**
   * Render a URL, retrying error statuses and timeouts per the retry policy.
   * A challenge that never clears or a browser that cannot start is final.
   */
  async render(url: string, options: { signal?: AbortSignal; timeoutMs?: number } = {}): Promise<FetchResult> {
    if (options.signal?.aborted) {
      return { status: 'aborted', attempts: 0, durationMs: 0, error: 'Render cancelled' }
    }

    return withRetries(() => this.renderOnce(url, options), {
      url,
      policy: this.retryPolicy,
      sleep: this.sleep,
      random: this.random,
      logger: this.logger,
      signal: options.signal,
    })
  }

  private async renderOnce(url: string, options: { signal?: AbortSignal; timeoutMs?: number }): Promise<AttemptResult> {
    const startTime = Date.now()

    let browser: RendererBrowser
    try {
      browser = await this.getBrowser()
    } catch (error) {
      return {
        status: 'error',
        durationMs: Date.now() - startTime,
        error: error instanceof Error ? error.message : String(error),
        retryable: false,
      }
    }

    let page: RendererPage | null = null
    try {
      page = await browser.newPage({ userAgent: this.options.userAgent })

      const response = await page.goto(url, {
        timeout: options.timeoutMs ?? DEFAULT_FETCH_OPTIONS.timeoutMs,
        waitUntil: 'domcontentloaded',
      })
      const statusCode = response?.status()

      let checks = 0
      while (isChallengePage(await page.title(), await page.innerText('body'))) {
        if (checks >= this.options.maxChallengeChecks || options.signal?.aborted) {
          return {
            status: options.signal?.aborted ? 'aborted' : 'challenge',
            statusCode,
            durationMs: Date.now() - startTime,
            error: `Challenge did not clear after ${checks} checks`,
            retryable: false,
          }
        }
        checks++
        this.logger.debug('Waiting for challenge to clear', { url, check: checks })
        await page.waitForTimeout(this.options.challengeWaitMs)
      }

      if (statusCode !== undefined && statusCode >= 400) {
        return {
          status: statusCode === 403 ? 'blocked' : 'error',
          statusCode,
          durationMs: Date.now() - startTime,
          error: `HTTP ${statusCode}`,
          retryable: isRetryableStatus(this.retryPolicy, statusCode),
        }
      }

      return {
        status: 'ok',
        statusCode,
        html: await page.content(),
        durationMs: Date.now() - startTime,
        retryable: false,
      }
    } catch (error) {
      const timedOut = error instanceof Error && error.name === 'TimeoutError'
      return {
        status: timedOut ? 'timeout' : 'error',
        durationMs: Date.now() - startTime,
        error: error instanceof Error ? error.message : String(error),
        retryable: true,
      }
    } finally {
      if (page) {
        await page.close().catch((error: unknown) => this.logger.debug('Page close failed', { url, error: String(error) }))
      }
    }
  }

  async close(): Promise<void> {
    const pending = this.browser
    this.browser = null
    if (!pending) return

    try {
      const browser = await pending
      await browser.close()
    } catch (error) {
      this.logger.warn('Browser shutdown failed', {}, error)
    }
  }

  private getBrowser(): Promise<RendererBrowser> {
    if (!this.browser) {
      this.logger.info('Launching browser', { headless: this.options.headless, executablePath: this.executablePath })
      const launching = this.launch({ executablePath: this.executablePath, headless: this.options.headless })
      // a failed launch is not cached; the next render tries again
      void launching.catch(() => {
        if (this.browser === launching) this.browser = null
      })
      this.browser = launching
    }
    return this.browser
  }
}
