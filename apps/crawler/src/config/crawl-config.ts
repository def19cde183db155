/**
 * Crawler configuration from environment variables.
 *
 * | Variable                   | Default                      |
 * |----------------------------|------------------------------|
 * | CRAWL_BASE_URL             | site registry base URL       |
 * | OUTPUT_DIR                 | data/output                  |
 * | GENRE_CATALOG_PATH         | {OUTPUT_DIR}/genres_catalog.json |
 * | CRAWL_MIN_DELAY_MS         | 1500                         |
 * | CRAWL_MAX_DELAY_MS         | 4500                         |
 * | CRAWL_MAX_RETRIES          | 3                            |
 * | CRAWL_RETRY_BASE_DELAY_MS  | 3000                         |
 * | CRAWL_TIMEOUT_MS           | 30000                        |
 * | CRAWL_USER_AGENT           | built-in crawler UA          |
 * | BROWSER_EXECUTABLE_PATH    | unset                        |
 * | BROWSER_HEADLESS           | true                         |
 */

import { join, resolve } from 'node:path'
import { DEFAULT_SITE_ID, getSite } from '@cratedigger/site-registry'
import type { SiteRegistryEntry } from '@cratedigger/site-registry'
import { DEFAULT_FETCH_HEADERS } from '../scraper/types.js'
import { isValidUrl } from '../scraper/utils/url.js'

/**
 * Invalid flags or configuration. Raised before any crawl task runs; the
 * CLI maps it to exit code 2.
 */
export class ConfigError extends Error {
  readonly exitCode = 2

  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export interface CrawlerConfig {
  site: SiteRegistryEntry
  baseUrl: string
  outputDir: string
  genreCatalogPath: string
  minDelayMs: number
  maxDelayMs: number
  /** Retries after the first attempt */
  maxRetries: number
  retryBaseDelayMs: number
  timeoutMs: number
  userAgent: string
  browserExecutablePath?: string
  browserHeadless: boolean
}

type Env = Record<string, string | undefined>

function readInt(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name]?.trim()
  if (raw === undefined || raw === '') {
    return fallback
  }
  if (!/^-?\d+$/.test(raw)) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`)
  }
  const value = Number.parseInt(raw, 10)
  if (value < min) {
    throw new ConfigError(`${name} must be >= ${min}, got ${value}`)
  }
  return value
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase()
  if (raw === undefined || raw === '') {
    return fallback
  }
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true
  if (['0', 'false', 'no', 'off'].includes(raw)) return false
  throw new ConfigError(`${name} must be a boolean, got "${raw}"`)
}

export interface ConfigOverrides {
  outputDir?: string
}

/**
 * Resolve configuration. Paths are made absolute against the working
 * directory.
 */
export function loadCrawlerConfig(env: Env = process.env, overrides: ConfigOverrides = {}): CrawlerConfig {
  const site = getSite(DEFAULT_SITE_ID)
  if (!site) {
    throw new ConfigError(`Unknown site "${DEFAULT_SITE_ID}"`)
  }

  const baseUrl = (env.CRAWL_BASE_URL?.trim() || site.baseUrls[0]).replace(/\/+$/, '')
  if (!isValidUrl(baseUrl)) {
    throw new ConfigError(`CRAWL_BASE_URL is not a valid http(s) URL: "${baseUrl}"`)
  }

  const outputDir = resolve(overrides.outputDir ?? (env.OUTPUT_DIR?.trim() || join('data', 'output')))
  const genreCatalogPath = resolve(env.GENRE_CATALOG_PATH?.trim() || join(outputDir, 'genres_catalog.json'))

  const minDelayMs = readInt(env, 'CRAWL_MIN_DELAY_MS', site.rateLimit.minDelayMs)
  const maxDelayMs = readInt(env, 'CRAWL_MAX_DELAY_MS', site.rateLimit.maxDelayMs)
  if (maxDelayMs < minDelayMs) {
    throw new ConfigError(`CRAWL_MAX_DELAY_MS (${maxDelayMs}) is below CRAWL_MIN_DELAY_MS (${minDelayMs})`)
  }

  return {
    site,
    baseUrl,
    outputDir,
    genreCatalogPath,
    minDelayMs,
    maxDelayMs,
    maxRetries: readInt(env, 'CRAWL_MAX_RETRIES', 3),
    retryBaseDelayMs: readInt(env, 'CRAWL_RETRY_BASE_DELAY_MS', 3000),
    timeoutMs: readInt(env, 'CRAWL_TIMEOUT_MS', 30000, 1),
    userAgent: env.CRAWL_USER_AGENT?.trim() || DEFAULT_FETCH_HEADERS['User-Agent'],
    browserExecutablePath: env.BROWSER_EXECUTABLE_PATH?.trim() || undefined,
    browserHeadless: readBool(env, 'BROWSER_HEADLESS', true),
  }
}
