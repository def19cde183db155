import { loadCrawlerConfig } from '../../config/crawl-config.js'
import { loggers } from '../../config/logger.js'
import { filterAlbums, loadAlbums } from '../../scraper/catalog/album-store.js'
import type { AlbumCriteria } from '../../scraper/catalog/album-store.js'
import { formatAlbum } from '../format.js'

export interface SearchCommandArgs {
  outputDir?: string
  genres?: string[]
  /** Require every listed genre instead of any */
  matchAll: boolean
  minScore?: number
  maxScore?: number
  minUserScore?: number
  minReviews?: number
  year?: number
  query?: string
  limit: number
  showAll: boolean
}

export const DEFAULT_SEARCH_LIMIT = 20

export function toCriteria(args: SearchCommandArgs): AlbumCriteria {
  return {
    genres: args.matchAll ? undefined : args.genres,
    genresAll: args.matchAll ? args.genres : undefined,
    minScore: args.minScore,
    maxScore: args.maxScore,
    minUserScore: args.minUserScore,
    minReviews: args.minReviews,
    year: args.year,
    search: args.query,
  }
}

export async function runSearchCommand(
  args: SearchCommandArgs,
  env: Record<string, string | undefined> = process.env
): Promise<number> {
  const config = loadCrawlerConfig(env, { outputDir: args.outputDir })
  const albums = await loadAlbums(config.outputDir, { logger: loggers.cli })

  if (albums.length === 0) {
    console.log(`No albums in ${config.outputDir}. Run "cratedigger scrape" first.`)
    return 0
  }

  const matches = filterAlbums(albums, toCriteria(args))
  const shown = args.showAll ? matches : matches.slice(0, args.limit)

  if (shown.length === 0) {
    console.log('No albums match those criteria.')
    return 0
  }

  console.log(`${matches.length} of ${albums.length} albums match${shown.length < matches.length ? ` (showing ${shown.length})` : ''}`)
  console.log('-'.repeat(80))
  for (const album of shown) {
    console.log(formatAlbum(album))
    console.log('')
  }
  return 0
}
