import { loadCrawlerConfig } from '../../config/crawl-config.js'
import { loggers } from '../../config/logger.js'
import { computeStats, loadAlbums } from '../../scraper/catalog/album-store.js'
import { formatAverage } from '../format.js'

export interface StatsCommandArgs {
  outputDir?: string
}

export async function runStatsCommand(
  args: StatsCommandArgs,
  env: Record<string, string | undefined> = process.env
): Promise<number> {
  const config = loadCrawlerConfig(env, { outputDir: args.outputDir })
  const albums = await loadAlbums(config.outputDir, { logger: loggers.cli })

  if (albums.length === 0) {
    console.log(`No albums in ${config.outputDir}. Run "cratedigger scrape" first.`)
    return 0
  }

  const stats = computeStats(albums)

  console.log('Collection')
  console.log('='.repeat(40))
  console.log(`Albums:               ${stats.albums}`)
  console.log(`Artists:              ${stats.artists}`)
  console.log(`Genres:               ${stats.genres}`)
  console.log(`With critic score:    ${stats.withCriticScore}`)
  console.log(`With user score:      ${stats.withUserScore}`)
  console.log(`Average critic score: ${formatAverage(stats.averageCriticScore)}`)
  console.log(`Average user score:   ${formatAverage(stats.averageUserScore)}`)

  if (stats.byYear.length > 0) {
    console.log('')
    console.log('By year')
    for (const { year, albums: count } of stats.byYear) {
      console.log(`  ${year}: ${count}`)
    }
  }

  if (stats.topGenres.length > 0) {
    console.log('')
    console.log('Top genres')
    for (const { genre, albums: count } of stats.topGenres) {
      console.log(`  ${genre}: ${count}`)
    }
  }

  if (stats.topByCriticScore.length > 0) {
    console.log('')
    console.log('Top albums by critic score')
    stats.topByCriticScore.forEach((album, index) => {
      console.log(`  ${index + 1}. ${album.title ?? 'Unknown'} by ${album.artist_name ?? 'Unknown'} (${album.critic_score})`)
    })
  }

  return 0
}
