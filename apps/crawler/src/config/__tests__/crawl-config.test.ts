import { join, resolve } from 'node:path'
import { describe, expect, it } from 'vitest'
import { ConfigError, loadCrawlerConfig } from '../crawl-config.js'

describe('loadCrawlerConfig', () => {
  it('falls back to the site registry and built-in defaults', () => {
    const config = loadCrawlerConfig({})

    expect(config).toMatchObject({
      baseUrl: 'https://www.albumoftheyear.org',
      outputDir: resolve('data', 'output'),
      genreCatalogPath: join(resolve('data', 'output'), 'genres_catalog.json'),
      minDelayMs: 1500,
      maxDelayMs: 4500,
      maxRetries: 3,
      retryBaseDelayMs: 3000,
      timeoutMs: 30000,
      browserHeadless: true,
    })
    expect(config.browserExecutablePath).toBeUndefined()
    expect(config.site.id).toBe('aoty')
  })

  it('reads overrides from the environment', () => {
    const config = loadCrawlerConfig({
      CRAWL_BASE_URL: 'http://localhost:8080/',
      OUTPUT_DIR: '/tmp/crawl-out',
      GENRE_CATALOG_PATH: '/tmp/catalog.json',
      CRAWL_MIN_DELAY_MS: '0',
      CRAWL_MAX_DELAY_MS: '10',
      CRAWL_MAX_RETRIES: '1',
      CRAWL_USER_AGENT: 'test-agent',
      BROWSER_EXECUTABLE_PATH: '/usr/bin/chromium',
      BROWSER_HEADLESS: 'off',
    })

    expect(config).toMatchObject({
      baseUrl: 'http://localhost:8080',
      outputDir: '/tmp/crawl-out',
      genreCatalogPath: '/tmp/catalog.json',
      minDelayMs: 0,
      maxDelayMs: 10,
      maxRetries: 1,
      userAgent: 'test-agent',
      browserExecutablePath: '/usr/bin/chromium',
      browserHeadless: false,
    })
  })

  it('prefers an explicit output directory and puts the catalog inside it', () => {
    const config = loadCrawlerConfig({ OUTPUT_DIR: '/tmp/ignored' }, { outputDir: '/tmp/chosen' })

    expect(config.outputDir).toBe('/tmp/chosen')
    expect(config.genreCatalogPath).toBe('/tmp/chosen/genres_catalog.json')
  })

  it.each([
    [{ CRAWL_MAX_RETRIES: 'three' }, 'CRAWL_MAX_RETRIES must be an integer, got "three"'],
    [{ CRAWL_MAX_RETRIES: '-1' }, 'CRAWL_MAX_RETRIES must be >= 0, got -1'],
    [{ CRAWL_TIMEOUT_MS: '0' }, 'CRAWL_TIMEOUT_MS must be >= 1, got 0'],
    [{ CRAWL_MIN_DELAY_MS: '500', CRAWL_MAX_DELAY_MS: '100' }, 'CRAWL_MAX_DELAY_MS (100) is below CRAWL_MIN_DELAY_MS (500)'],
    [{ BROWSER_HEADLESS: 'maybe' }, 'BROWSER_HEADLESS must be a boolean, got "maybe"'],
    [{ CRAWL_BASE_URL: 'ftp://example.com' }, 'CRAWL_BASE_URL is not a valid http(s) URL: "ftp://example.com"'],
  ])('rejects %o', (env, message) => {
    expect(() => loadCrawlerConfig(env)).toThrow(new ConfigError(message))
  })

  it('carries exit code 2', () => {
    expect(new ConfigError('bad').exitCode).toBe(2)
  })
})
