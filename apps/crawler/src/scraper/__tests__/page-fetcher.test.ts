import { describe, expect, it, vi } from 'vitest'
import { PageFetcher } from '../fetch/page-fetcher.js'
import { PlaywrightRenderer } from '../fetch/browser-renderer.js'
import type { RendererBrowser, RendererPage } from '../fetch/browser-renderer.js'
import { InMemoryRateLimiter } from '../fetch/rate-limiter.js'
import { DEFAULT_RETRY_POLICY } from '../types.js'
import type { Fetcher, FetchResult, PageRenderer } from '../types.js'

const limiter = () =>
  new InMemoryRateLimiter({ defaultConfig: { minDelayMs: 0, maxDelayMs: 0 }, sleep: async () => undefined })

function fixedFetcher(result: FetchResult) {
  const fetch = vi.fn(async () => result)
  const fetcher: Fetcher = { fetch }
  return Object.assign(fetcher, { fetch })
}

function fixedRenderer(result: FetchResult) {
  const render = vi.fn(async () => result)
  const close = vi.fn(async () => undefined)
  const renderer: PageRenderer = { render, close }
  return Object.assign(renderer, { render, close })
}

const okHtml = '<html><head><title>Glass Harbor</title></head><body><h1>Glass Harbor</h1></body></html>'

describe('PageFetcher', () => {
  it('returns a parsed document for a successful fetch', async () => {
    const pages = new PageFetcher({
      fetcher: fixedFetcher({ status: 'ok', statusCode: 200, html: okHtml, attempts: 1, durationMs: 5 }),
      rateLimiter: limiter(),
    })

    const page = await pages.fetchPage('https://example.com/album/1-a.php')

    expect(page.ok).toBe(true)
    if (page.ok) {
      expect(page.$('h1').text()).toBe('Glass Harbor')
      expect(page.attempts).toBe(1)
    }
  })

  it('maps a failed fetch to a failed page with the reason', async () => {
    const pages = new PageFetcher({
      fetcher: fixedFetcher({ status: 'timeout', attempts: 4, durationMs: 5, error: 'Request timed out after 30000ms' }),
      rateLimiter: limiter(),
    })

    const page = await pages.fetchPage('https://example.com/album/1-a.php')

    expect(page).toEqual({
      ok: false,
      url: 'https://example.com/album/1-a.php',
      reason: 'timeout',
      error: 'Request timed out after 30000ms',
      statusCode: undefined,
      attempts: 4,
    })
  })

  it('fails JS pages when no renderer is configured', async () => {
    const fetcher = fixedFetcher({ status: 'ok', html: okHtml, attempts: 1, durationMs: 1 })
    const pages = new PageFetcher({ fetcher, rateLimiter: limiter() })

    const page = await pages.fetchPage('https://example.com/', { requiresJs: true })

    expect(page.ok).toBe(false)
    expect(fetcher.fetch).not.toHaveBeenCalled()
  })

  it('retries a challenge page through the renderer', async () => {
    const fetcher = fixedFetcher({ status: 'challenge', statusCode: 200, attempts: 1, durationMs: 1, error: 'Anti-bot challenge page' })
    const renderer = fixedRenderer({ status: 'ok', statusCode: 200, html: okHtml, attempts: 1, durationMs: 1 })
    const pages = new PageFetcher({ fetcher, rateLimiter: limiter(), renderer })

    const page = await pages.fetchPage('https://example.com/album/1-a.php')

    expect(page.ok).toBe(true)
    expect(renderer.render).toHaveBeenCalledTimes(1)
  })

  it('closes the renderer on close', async () => {
    const renderer = fixedRenderer({ status: 'ok', html: okHtml, attempts: 1, durationMs: 1 })
    const pages = new PageFetcher({ fetcher: fixedFetcher({ status: 'ok', html: okHtml, attempts: 1, durationMs: 1 }), rateLimiter: limiter(), renderer })

    await pages.close()

    expect(renderer.close).toHaveBeenCalledTimes(1)
  })
})

/**
 * Browser double: `titles` are returned by successive title() calls, the
 * last one repeating.
 */
function fakeBrowser(titles: string[], status = 200) {
  let titleCalls = 0
  const page: RendererPage = {
    goto: vi.fn(async () => ({ status: () => status })),
    title: vi.fn(async () => titles[Math.min(titleCalls++, titles.length - 1)]),
    innerText: vi.fn(async () => 'page body'),
    content: vi.fn(async () => okHtml),
    waitForTimeout: vi.fn(async () => undefined),
    close: vi.fn(async () => undefined),
  }
  const browser: RendererBrowser = {
    newPage: vi.fn(async () => page),
    close: vi.fn(async () => undefined),
  }
  return { page, browser }
}

describe('PlaywrightRenderer', () => {
  it('launches one browser lazily and reuses it', async () => {
    const { browser } = fakeBrowser(['Glass Harbor'])
    const launch = vi.fn(async () => browser)
    const renderer = new PlaywrightRenderer({ launch })

    expect(launch).not.toHaveBeenCalled()
    const first = await renderer.render('https://example.com/a')
    const second = await renderer.render('https://example.com/b')

    expect(first).toMatchObject({ status: 'ok', html: okHtml, statusCode: 200 })
    expect(second.status).toBe('ok')
    expect(launch).toHaveBeenCalledTimes(1)

    await renderer.close()
    expect(browser.close).toHaveBeenCalledTimes(1)
  })

  it('waits for a challenge to clear', async () => {
    const { browser, page } = fakeBrowser(['Just a moment...', 'Just a moment...', 'Glass Harbor'])
    const renderer = new PlaywrightRenderer({ launch: async () => browser, challengeWaitMs: 10 })

    const result = await renderer.render('https://example.com/a')

    expect(result.status).toBe('ok')
    expect(page.waitForTimeout).toHaveBeenCalledTimes(2)
    expect(page.close).toHaveBeenCalledTimes(1)
  })

  it('gives up after the configured number of checks', async () => {
    const { browser, page } = fakeBrowser(['Just a moment...'])
    const renderer = new PlaywrightRenderer({ launch: async () => browser, maxChallengeChecks: 3, challengeWaitMs: 10 })

    const result = await renderer.render('https://example.com/a')

    expect(result.status).toBe('challenge')
    expect(page.waitForTimeout).toHaveBeenCalledTimes(3)
  })

  it('reports a launch failure as an error result and retries the launch next time', async () => {
    const { browser } = fakeBrowser(['Glass Harbor'])
    const launch = vi
      .fn<() => Promise<RendererBrowser>>()
      .mockRejectedValueOnce(new Error('Executable not found'))
      .mockResolvedValue(browser)
    const renderer = new PlaywrightRenderer({ launch })

    const failed = await renderer.render('https://example.com/a')
    const recovered = await renderer.render('https://example.com/a')

    expect(failed).toMatchObject({ status: 'error', error: 'Executable not found' })
    expect(recovered.status).toBe('ok')
    expect(launch).toHaveBeenCalledTimes(2)
  })

  it('retries a server error with the retry policy before giving up', async () => {
    const { browser, page } = fakeBrowser(['Glass Harbor'])
    const statuses = [503, 200]
    page.goto = vi.fn(async () => {
      const status = statuses.shift() ?? 200
      return { status: () => status }
    })
    const sleep = vi.fn(async () => undefined)
    const renderer = new PlaywrightRenderer({
      launch: async () => browser,
      retryPolicy: { ...DEFAULT_RETRY_POLICY, maxAttempts: 3, baseDelayMs: 100 },
      sleep,
      random: () => 0,
    })
    const pages = new PageFetcher({ fetcher: fixedFetcher({ status: 'error', attempts: 1, durationMs: 1 }), rateLimiter: limiter(), renderer })

    const result = await pages.fetchPage('https://example.com/a', { requiresJs: true })

    expect(result.ok).toBe(true)
    expect(result.attempts).toBe(2)
    expect(page.goto).toHaveBeenCalledTimes(2)
    expect(sleep).toHaveBeenCalledTimes(1)
    expect(sleep).toHaveBeenCalledWith(100, undefined)
  })

  it('does not retry a client error', async () => {
    const { browser, page } = fakeBrowser(['Glass Harbor'], 404)
    const sleep = vi.fn(async () => undefined)
    const renderer = new PlaywrightRenderer({ launch: async () => browser, sleep })

    const result = await renderer.render('https://example.com/a')

    expect(result).toMatchObject({ status: 'error', statusCode: 404, error: 'HTTP 404', attempts: 1 })
    expect(page.goto).toHaveBeenCalledTimes(1)
    expect(sleep).not.toHaveBeenCalled()
  })
})
