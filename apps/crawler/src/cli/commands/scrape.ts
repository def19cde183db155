import { loadCrawlerConfig, ConfigError } from '../../config/crawl-config.js'
import type { CrawlerConfig } from '../../config/crawl-config.js'
import { loggers } from '../../config/logger.js'
import { Crawler } from '../../scraper/crawler.js'
import { GenreCatalog } from '../../scraper/genre-catalog.js'
import { OutputSink } from '../../scraper/process/writer.js'
import { loadResumeLedger, ResumeLedger } from '../../scraper/resume-ledger.js'
import { createPageSource } from '../page-source.js'
import type { PageSourceFactory } from '../page-source.js'

export interface ScrapeCommandArgs {
  genre?: string
  startYear?: number
  yearsBack?: number
  albumsPerYear?: number
  outputDir?: string
  resume: boolean
  resumeFile?: string
  testMode: boolean
  /** Albums per year in test mode */
  limit?: number
  render: boolean
}

export interface ScrapeCommandDeps {
  env?: Record<string, string | undefined>
  signal?: AbortSignal
  createPages?: PageSourceFactory
  now?: () => Date
}

export const DEFAULT_YEARS_BACK = 1
export const DEFAULT_ALBUMS_PER_YEAR = 250
export const DEFAULT_TEST_LIMIT = 10

export async function runScrapeCommand(args: ScrapeCommandArgs, deps: ScrapeCommandDeps = {}): Promise<number> {
  const now = deps.now ?? (() => new Date())
  const log = loggers.cli

  let config: CrawlerConfig
  try {
    config = loadCrawlerConfig(deps.env ?? process.env, { outputDir: args.outputDir })
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message)
      return error.exitCode
    }
    throw error
  }

  // --render sends every page through the browser, as does a site flagged as JS-only
  const renderPages = args.render || config.site.requiresJsRendering
  const albumsPerYear = args.testMode ? args.limit ?? DEFAULT_TEST_LIMIT : args.albumsPerYear ?? DEFAULT_ALBUMS_PER_YEAR
  const params = {
    targetGenre: args.genre,
    startYear: args.startYear ?? now().getUTCFullYear(),
    yearsBack: args.yearsBack ?? DEFAULT_YEARS_BACK,
    albumsPerYear,
    testMode: args.testMode,
    requiresJs: renderPages,
  }

  const ledger =
    args.resume || args.resumeFile
      ? await loadResumeLedger(config.outputDir, { resumeFile: args.resumeFile, logger: log })
      : new ResumeLedger()

  const catalog = await GenreCatalog.load({ path: config.genreCatalogPath, now, logger: loggers.crawler })
  const sink = new OutputSink({ outputDir: config.outputDir, now, logger: loggers.sink })

  let crawler: Crawler
  try {
    crawler = new Crawler(
      {
        pages: (deps.createPages ?? createPageSource)(config, { render: renderPages }),
        sink,
        ledger,
        site: config.site,
        baseUrl: config.baseUrl,
        catalog,
        logger: loggers.crawler,
        extractLogger: loggers.extractor,
        now,
      },
      params
    )
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message)
      return error.exitCode
    }
    throw error
  }

  const outcome = await crawler.run(deps.signal).then(
    summary => ({ ok: true as const, summary }),
    (error: unknown) => ({ ok: false as const, error })
  )

  // whatever was scraped before a failure or cancellation is still written
  const newCatalogGenres = catalog.addedCount
  log.info('Flushing output', {
    pendingAlbums: sink.pendingAlbums,
    pendingGenres: sink.pendingGenres,
    newCatalogGenres,
  })
  const flushed = await sink.flush()
  await catalog.save()
  log.info('Output flushed', {
    albumsWritten: flushed.albumsWritten,
    albumsDropped: flushed.albumsDropped,
    filesWritten: flushed.filesWritten,
    filesFailed: flushed.filesFailed,
  })

  if (!outcome.ok) {
    if (outcome.error instanceof ConfigError) {
      console.error(outcome.error.message)
      return outcome.error.exitCode
    }
    throw outcome.error
  }
  const { summary } = outcome

  console.log('')
  console.log(`Albums scraped:        ${summary.albumsScraped}`)
  console.log(`Albums written:        ${flushed.albumsWritten}`)
  console.log(`Albums skipped:        ${summary.albumsSkipped}`)
  console.log(`Genres processed:      ${summary.genresProcessed}`)
  console.log(`New catalog genres:    ${newCatalogGenres}`)
  console.log(`Ratings pages fetched: ${summary.ratingsPagesFetched}`)
  console.log(`Failures:              ${summary.failures}`)
  console.log(`Output directory:      ${config.outputDir}`)

  if (summary.cancelled) {
    return 130
  }
  return flushed.success ? 0 : 1
}
