import { loadCrawlerConfig, ConfigError } from '../../config/crawl-config.js'
import type { CrawlerConfig } from '../../config/crawl-config.js'
import { loggers } from '../../config/logger.js'
import { parseGenreIndex } from '../../scraper/extract/listing.js'
import { GenreCatalog } from '../../scraper/genre-catalog.js'
import type { GenreDescriptor } from '../../scraper/types.js'
import { createPageSource } from '../page-source.js'
import type { PageSourceFactory } from '../page-source.js'

export interface ListGenresCommandArgs {
  outputDir?: string
  /** Fetch the live genre index instead of reading the catalog */
  refresh: boolean
  render: boolean
}

export interface ListGenresCommandDeps {
  env?: Record<string, string | undefined>
  signal?: AbortSignal
  createPages?: PageSourceFactory
  now?: () => Date
}

async function fetchLiveGenres(
  config: CrawlerConfig,
  args: ListGenresCommandArgs,
  deps: ListGenresCommandDeps
): Promise<GenreDescriptor[]> {
  const requiresJs = args.render || config.site.requiresJsRendering
  const pages = (deps.createPages ?? createPageSource)(config, { render: requiresJs })
  const url = new URL(config.site.paths.genreIndex, config.baseUrl).toString()
  try {
    const page = await pages.fetchPage(url, { requiresJs, signal: deps.signal })
    if (!page.ok) {
      loggers.cli.warn('Genre index unavailable', { url, reason: page.reason, error: page.error })
      return []
    }
    return parseGenreIndex(page.$, url)
  } finally {
    await pages.close()
  }
}

function printCatalog(catalog: GenreCatalog): void {
  const parents = catalog.parentNames()
  console.log(`${catalog.size} genres in catalog (${parents.length} top-level)`)
  console.log('')
  for (const name of parents) {
    const entry = catalog.get(name)
    const children = entry?.children ?? []
    console.log(children.length > 0 ? `${name} (${children.length} subgenres)` : name)
    for (const child of children) {
      console.log(`  - ${child}`)
    }
  }
}

export async function runListGenresCommand(
  args: ListGenresCommandArgs,
  deps: ListGenresCommandDeps = {}
): Promise<number> {
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

  const catalog = await GenreCatalog.load({ path: config.genreCatalogPath, now: deps.now, logger: loggers.cli })

  if (!args.refresh) {
    printCatalog(catalog)
    return 0
  }

  let genres = await fetchLiveGenres(config, args, deps)
  if (genres.length > 0) {
    const added = genres.filter(genre => catalog.addDiscovered(genre)).length
    await catalog.save()
    console.log(`${genres.length} genres on the genre index (${added} new to the catalog)`)
  } else {
    genres = catalog.fallbackDescriptors(config.baseUrl)
    console.log(`Genre index unavailable; ${genres.length} genres from the fallback list`)
  }

  console.log('')
  for (const genre of genres) {
    console.log(`${genre.name.padEnd(32)} ${genre.slug}`)
  }
  return 0
}
