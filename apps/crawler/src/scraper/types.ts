/**
 * Crawler Core Types
 *
 * Records, fetch contracts, crawl tasks and run summaries.
 */

import type { ILogger } from '@cratedigger/logger'
import type { CheerioAPI } from 'cheerio'

// ═══════════════════════════════════════════════════════════════════════════════
// Records
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One album as extracted from its detail page.
 *
 * Field names are snake_case because they are the on-disk contract of the
 * JSON/CSV output files that later runs read back for resume.
 */
export interface AlbumRecord {
  /** `{digits}-{slug}` from the album URL; unique key */
  aoty_id: string
  title: string | null
  artist_name: string | null
  /** Canonical URL; secondary unique key */
  url: string
  /** Free text "Month Day, Year"; the site's format is not consistent enough for a date type */
  release_date: string | null
  critic_score: number | null
  user_score: number | null
  critic_review_count: number | null
  user_review_count: number | null
  /** Ordered set, first-seen order, case-sensitive as scraped */
  genres: string[]
  genre_tags: string[]
  cover_image_url: string | null
  description: string | null
  /** Genre slug the album was discovered under (provenance, not ground truth) */
  scrape_genre: string | null
  /** Ratings year the album was discovered under */
  scrape_year: number | null
  /** ISO timestamp of extraction */
  scraped_at: string
}

export interface GenreDescriptor {
  name: string
  /** `{id}-{name}` segment of the site's `/genre/{slug}/` link */
  slug: string
  url: string
  parent?: string
}

/**
 * A genre as written to the `genres_*` output files.
 */
export interface GenreRecord {
  name: string
  slug: string
  url: string
  discovered_at: string
}

export type OutputCategory = 'albums' | 'genres'

// ═══════════════════════════════════════════════════════════════════════════════
// Fetcher
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Turns a URL into HTML. Implemented by plain HTTP and by the browser renderer.
 */
export interface Fetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchResult>
}

export interface FetchOptions {
  /** Request timeout in ms (default: 30000) */
  timeoutMs?: number

  /** Maximum response size in bytes (default: 10MB) */
  maxSizeBytes?: number

  /** Custom headers (merged with defaults) */
  headers?: Record<string, string>

  signal?: AbortSignal
}

export const DEFAULT_FETCH_HEADERS = {
  'User-Agent': 'Cratedigger/1.0 (personal music catalogue; low-rate crawler)',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
} as const

export const DEFAULT_FETCH_OPTIONS = {
  timeoutMs: 30000,
  maxSizeBytes: 10 * 1024 * 1024,
} as const satisfies FetchOptions

export type FetchResultStatus =
  | 'ok'
  | 'error'
  | 'blocked'
  | 'timeout'
  | 'too_large'
  | 'challenge'
  | 'aborted'

export interface FetchResult {
  status: FetchResultStatus
  statusCode?: number
  html?: string
  error?: string
  /** Attempts made, including the successful one */
  attempts: number
  durationMs: number
}

// ═══════════════════════════════════════════════════════════════════════════════
// Retry policy
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Delay before retry n (0-based):
 * min(baseDelayMs * 2^n, maxDelayMs) + uniform(jitterMs.min, jitterMs.max)
 */
export interface RetryPolicy {
  maxAttempts: number
  baseDelayMs: number
  maxDelayMs: number
  /** Statuses retried besides every 5xx */
  retryableStatusCodes: number[]
  jitterMs: { min: number; max: number }
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  baseDelayMs: 3000,
  maxDelayMs: 60000,
  retryableStatusCodes: [500, 502, 503, 504, 522, 524, 408, 429, 403],
  jitterMs: { min: 0, max: 1000 },
}

// ═══════════════════════════════════════════════════════════════════════════════
// Rate limiting
// ═══════════════════════════════════════════════════════════════════════════════

export interface RateLimitConfig {
  /** Lower bound of the randomized gap between requests */
  minDelayMs: number
  /** Upper bound of the randomized gap between requests */
  maxDelayMs: number
}

/**
 * Serializes requests per registrable domain. `schedule` holds the single
 * slot for the whole task, so the gap is measured from the end of one
 * request to the start of the next.
 */
export interface RateLimiter {
  schedule<T>(url: string, task: () => Promise<T>): Promise<T>
}

export const DEFAULT_RATE_LIMIT: RateLimitConfig = {
  minDelayMs: 1500,
  maxDelayMs: 4500,
}

// ═══════════════════════════════════════════════════════════════════════════════
// Rendering
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * JS-rendering capability: final HTML after scripts ran and any challenge
 * interstitial cleared. One session per run; `close` releases it.
 */
export interface PageRenderer {
  render(url: string, options?: { signal?: AbortSignal; timeoutMs?: number }): Promise<FetchResult>
  close(): Promise<void>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Parsed pages
// ═══════════════════════════════════════════════════════════════════════════════

export type PageResult =
  | { ok: true; url: string; html: string; $: CheerioAPI; attempts: number }
  | { ok: false; url: string; reason: FetchResultStatus; error: string; statusCode?: number; attempts: number }

export interface PageSource {
  fetchPage(url: string, options?: { requiresJs?: boolean; signal?: AbortSignal }): Promise<PageResult>
  close(): Promise<void>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Crawl tasks
// ═══════════════════════════════════════════════════════════════════════════════

export interface GenreIndexTask {
  kind: 'genre-index'
  url: string
}

export interface RatingsPageTask {
  kind: 'ratings-page'
  url: string
  genre: GenreDescriptor
  year: number
  /** Listing links already taken for this (genre, year), quota-wise */
  takenThisYear: number
  page: number
}

export interface AlbumTask {
  kind: 'album'
  url: string
  genre: GenreDescriptor
  year: number
  /** 1-based rank within the (genre, year) listing */
  rank: number
}

export type CrawlTask = GenreIndexTask | RatingsPageTask | AlbumTask

export type CrawlTaskKind = CrawlTask['kind']

// ═══════════════════════════════════════════════════════════════════════════════
// Run parameters and summary
// ═══════════════════════════════════════════════════════════════════════════════

export interface CrawlParams {
  targetGenre?: string
  startYear: number
  yearsBack: number
  albumsPerYear: number
  /** First matched genre and first year only */
  testMode?: boolean
  requiresJs?: boolean
}

export interface CrawlSummary {
  albumsScraped: number
  albumsSkipped: number
  genresProcessed: number
  ratingsPagesFetched: number
  failures: number
  failuresByKind: Record<CrawlTaskKind, number>
  cancelled: boolean
  durationMs: number
}

export interface ExtractContext {
  genreSlug: string | null
  year: number | null
  now: Date
  logger: ILogger
}
