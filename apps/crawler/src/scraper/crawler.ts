/**
 * Traversal Controller
 *
 * Breadth-first walk over three page kinds:
 * 1. Genre index: discover genres, filter, emit one ratings task per
 *    (genre, year)
 * 2. Ratings page: take album links in rank order up to the per-year quota,
 *    emit album tasks, maybe emit the next page
 * 3. Album page: extract, hand the record to the sink, remember the URL
 *
 * Tasks run one at a time. A failing task is logged and counted; it never
 * ends the run. Cancellation is checked between tasks and after every fetch,
 * so an abandoned task never reaches the sink.
 */

import type { ILogger } from '@cratedigger/logger'
import { silentLogger } from '@cratedigger/logger'
import { buildRatingsPath } from '@cratedigger/site-registry'
import type { SiteRegistryEntry } from '@cratedigger/site-registry'
import { ConfigError } from '../config/crawl-config.js'
import { extractAlbum } from './extract/album-extractor.js'
import { parseGenreIndex, parseRatingsPage } from './extract/listing.js'
import type { GenreCatalog } from './genre-catalog.js'
import { filterGenres } from './genre-match.js'
import type { OutputSink } from './process/writer.js'
import type { ResumeLedger } from './resume-ledger.js'
import type {
  AlbumTask,
  CrawlParams,
  CrawlSummary,
  CrawlTask,
  CrawlTaskKind,
  GenreDescriptor,
  GenreIndexTask,
  PageSource,
  RatingsPageTask,
} from './types.js'

export interface CrawlerOptions {
  pages: PageSource
  sink: OutputSink
  ledger: ResumeLedger
  site: SiteRegistryEntry
  baseUrl: string
  /** Source of fallback genres and sink for newly seen ones */
  catalog?: GenreCatalog
  logger?: ILogger
  /** Receives per-field extraction misses (default: `logger`) */
  extractLogger?: ILogger
  now?: () => Date
}

/** Progress of one (genre, year) listing across its pages */
interface ListingState {
  /** Listing links seen on any page so far */
  seen: Set<string>
  /** Links counted against the quota, fetched or skipped */
  taken: number
}

/**
 * Years from `startYear` down through `yearsBack` years.
 */
export function yearRange(startYear: number, yearsBack: number): number[] {
  const years: number[] = []
  for (let year = startYear; year > startYear - yearsBack; year--) {
    years.push(year)
  }
  return years
}

export class Crawler {
  private readonly pages: PageSource
  private readonly sink: OutputSink
  private readonly ledger: ResumeLedger
  private readonly site: SiteRegistryEntry
  private readonly baseUrl: string
  private readonly catalog?: GenreCatalog
  private readonly logger: ILogger
  private readonly extractLogger: ILogger
  private readonly now: () => Date
  private readonly params: CrawlParams

  private readonly queue: CrawlTask[] = []
  private readonly listings = new Map<string, ListingState>()
  private summary: CrawlSummary = Crawler.emptySummary()

  constructor(options: CrawlerOptions, params: CrawlParams) {
    if (!Number.isInteger(params.albumsPerYear) || params.albumsPerYear < 1) {
      throw new ConfigError(`albumsPerYear must be a positive integer, got ${params.albumsPerYear}`)
    }
    if (!Number.isInteger(params.yearsBack) || params.yearsBack < 1) {
      throw new ConfigError(`yearsBack must be a positive integer, got ${params.yearsBack}`)
    }
    if (!Number.isInteger(params.startYear)) {
      throw new ConfigError(`startYear must be an integer, got ${params.startYear}`)
    }

    this.pages = options.pages
    this.sink = options.sink
    this.ledger = options.ledger
    this.site = options.site
    this.baseUrl = options.baseUrl
    this.catalog = options.catalog
    this.logger = options.logger ?? silentLogger
    this.extractLogger = options.extractLogger ?? this.logger
    this.now = options.now ?? (() => new Date())
    this.params = params
  }

  private static emptySummary(): CrawlSummary {
    return {
      albumsScraped: 0,
      albumsSkipped: 0,
      genresProcessed: 0,
      ratingsPagesFetched: 0,
      failures: 0,
      failuresByKind: { 'genre-index': 0, 'ratings-page': 0, album: 0 },
      cancelled: false,
      durationMs: 0,
    }
  }

  /**
   * Run until the queue is empty or the signal fires. The page source is
   * closed before returning, whatever happened.
   *
   * @throws ConfigError when no genre can be found at all
   */
  async run(signal?: AbortSignal): Promise<CrawlSummary> {
    const startTime = Date.now()
    this.summary = Crawler.emptySummary()
    this.queue.length = 0
    this.listings.clear()

    this.logger.info('Crawl started', {
      targetGenre: this.params.targetGenre ?? null,
      startYear: this.params.startYear,
      yearsBack: this.params.yearsBack,
      albumsPerYear: this.params.albumsPerYear,
      testMode: this.params.testMode ?? false,
      resumeUrls: this.ledger.size,
    })

    try {
      this.queue.push({ kind: 'genre-index', url: new URL(this.site.paths.genreIndex, this.baseUrl).toString() })

      while (this.queue.length > 0) {
        if (signal?.aborted) {
          this.summary.cancelled = true
          this.logger.warn('Crawl cancelled', { pendingTasks: this.queue.length })
          break
        }

        const task = this.queue.shift()
        if (!task) break

        try {
          await this.runTask(task, signal)
        } catch (error) {
          if (error instanceof ConfigError) {
            throw error
          }
          this.recordFailure(task.kind, task.url, error instanceof Error ? error.message : String(error))
        }
      }
    } finally {
      await this.pages.close()
    }

    this.summary.durationMs = Date.now() - startTime
    this.logger.info('Crawl finished', { ...this.summary })
    return this.summary
  }

  private async runTask(task: CrawlTask, signal?: AbortSignal): Promise<void> {
    switch (task.kind) {
      case 'genre-index':
        return this.discoverGenres(task, signal)
      case 'ratings-page':
        return this.processRatingsPage(task, signal)
      case 'album':
        return this.processAlbum(task, signal)
    }
  }

  private recordFailure(kind: CrawlTaskKind, url: string, error: string): void {
    this.summary.failures++
    this.summary.failuresByKind[kind]++
    this.logger.warn('Task failed', { kind, url, error })
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Genre discovery
  // ═══════════════════════════════════════════════════════════════════════════

  private async discoverGenres(task: GenreIndexTask, signal?: AbortSignal): Promise<void> {
    const page = await this.pages.fetchPage(task.url, { requiresJs: this.params.requiresJs, signal })
    if (signal?.aborted) return

    let genres: GenreDescriptor[] = []
    if (page.ok) {
      genres = parseGenreIndex(page.$, task.url)
      for (const genre of genres) {
        this.sink.addGenre(genre)
        this.catalog?.addDiscovered(genre)
      }
      this.logger.info('Genre index parsed', { genres: genres.length })
    } else {
      this.recordFailure('genre-index', task.url, page.error)
    }

    if (genres.length === 0) {
      genres = this.catalog?.fallbackDescriptors(this.baseUrl) ?? []
      if (genres.length === 0) {
        throw new ConfigError(`Genre index unavailable at ${task.url} and no fallback genres are configured`)
      }
      this.logger.warn('Using fallback genre list', { genres: genres.length })
    }

    let selected = filterGenres(genres, this.params.targetGenre)
    if (selected.length === 0) {
      this.logger.warn('No genre matched the filter', { targetGenre: this.params.targetGenre })
      return
    }

    let years = yearRange(this.params.startYear, this.params.yearsBack)
    if (this.params.testMode) {
      selected = selected.slice(0, 1)
      years = years.slice(0, 1)
    }

    for (const genre of selected) {
      this.summary.genresProcessed++
      this.logger.info('Genre selected', { genre: genre.name, slug: genre.slug, years })
      for (const year of years) {
        this.queue.push({
          kind: 'ratings-page',
          url: new URL(buildRatingsPath(this.site, year, genre.slug), this.baseUrl).toString(),
          genre,
          year,
          takenThisYear: 0,
          page: 1,
        })
      }
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Ratings pages
  // ═══════════════════════════════════════════════════════════════════════════

  private listingState(genre: GenreDescriptor, year: number): ListingState {
    const key = `${genre.slug}\u0000${year}`
    let state = this.listings.get(key)
    if (!state) {
      state = { seen: new Set(), taken: 0 }
      this.listings.set(key, state)
    }
    return state
  }

  private async processRatingsPage(task: RatingsPageTask, signal?: AbortSignal): Promise<void> {
    const page = await this.pages.fetchPage(task.url, { requiresJs: this.params.requiresJs, signal })
    if (signal?.aborted) return

    if (!page.ok) {
      this.recordFailure('ratings-page', task.url, page.error)
      return
    }
    this.summary.ratingsPagesFetched++

    const { albumUrls, nextPageUrl } = parseRatingsPage(page.$, task.url)
    const state = this.listingState(task.genre, task.year)

    const newLinks = albumUrls.filter(url => !state.seen.has(url))
    for (const url of newLinks) {
      state.seen.add(url)
    }

    const remaining = Math.max(0, this.params.albumsPerYear - state.taken)
    const taken = newLinks.slice(0, remaining)
    let skipped = 0

    for (const url of taken) {
      state.taken++
      if (this.ledger.has(url)) {
        skipped++
        continue
      }
      this.queue.push({ kind: 'album', url, genre: task.genre, year: task.year, rank: state.taken })
    }
    this.summary.albumsSkipped += skipped

    this.logger.info('Ratings page processed', {
      genre: task.genre.slug,
      year: task.year,
      page: task.page,
      takenBefore: task.takenThisYear,
      links: albumUrls.length,
      newLinks: newLinks.length,
      taken: taken.length,
      skipped,
      takenThisYear: state.taken,
      quota: this.params.albumsPerYear,
    })

    const quotaMet = state.taken >= this.params.albumsPerYear
    if (!quotaMet && nextPageUrl && newLinks.length > 0) {
      this.queue.push({
        kind: 'ratings-page',
        url: nextPageUrl,
        genre: task.genre,
        year: task.year,
        takenThisYear: state.taken,
        page: task.page + 1,
      })
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Album pages
  // ═══════════════════════════════════════════════════════════════════════════

  private async processAlbum(task: AlbumTask, signal?: AbortSignal): Promise<void> {
    // Listed under more than one genre and already fetched this run
    if (this.ledger.has(task.url)) {
      this.summary.albumsSkipped++
      return
    }

    const page = await this.pages.fetchPage(task.url, { requiresJs: this.params.requiresJs, signal })
    if (signal?.aborted) return

    if (!page.ok) {
      this.recordFailure('album', task.url, page.error)
      return
    }

    const record = extractAlbum(page.$, task.url, {
      genreSlug: task.genre.slug,
      year: task.year,
      now: this.now(),
      logger: this.extractLogger,
    })
    if (!record) {
      this.recordFailure('album', task.url, 'URL carries no album id')
      return
    }

    this.sink.add(record)
    this.ledger.add(task.url)
    this.ledger.add(record.url)
    this.catalog?.addFromAlbum(record, task.genre.name)
    this.summary.albumsScraped++

    this.logger.debug('Album extracted', {
      aotyId: record.aoty_id,
      title: record.title,
      artist: record.artist_name,
      genre: task.genre.slug,
      year: task.year,
      rank: task.rank,
    })
  }
}
